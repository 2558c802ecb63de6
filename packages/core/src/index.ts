/**
 * Core module exports for @rxmacro/core
 *
 * This package provides:
 * - Diagnostic catalog and CLI renderer
 * - Configuration system (defaults, config files, RXMACRO_* variables)
 * - Scoped logger
 * - Runtime safety primitives (invariant, unreachable)
 */

// Diagnostics System
export * from "./diagnostics.js";

// Configuration System
export {
  config,
  defineConfig,
  ConfigError,
  DEFAULT_LIMITS,
  type RxMacroConfig,
  type LimitsConfig,
  type ResolvedLimits,
  type DialectSetting,
} from "./config.js";

// Logging
export { createLogger, type Logger, type LoggerOptions, type LogLevel } from "./logger.js";

// Runtime Safety Primitives
export { invariant, unreachable } from "./safety.js";
