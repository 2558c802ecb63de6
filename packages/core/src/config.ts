/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: RXMACRO_* (for CI overrides)
 * 3. Config files found by cosmiconfig: package.json#rxmacro, .rxmacrorc, etc.
 * 4. Defaults (lowest priority)
 *
 * The compiler never reads this store itself; front ends such as the CLI read it
 * and pass the resolved values to `compile()`.
 *
 * @example
 * ```typescript
 * import { config } from "@rxmacro/core";
 *
 * config.getLimits().maxMacros     // → 10000
 * config.set({ debug: true });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

export interface LimitsConfig {
  /** Maximum number of macro definitions in one grammar */
  maxMacros?: number;
  /** Maximum sum of raw body lengths */
  maxTotalBodyLength?: number;
  /** Maximum length of a single expanded macro */
  maxExpandedLength?: number;
}

export type ResolvedLimits = Required<LimitsConfig>;

/** A preset name such as "pcre", or an object of dialect profile options. */
export type DialectSetting = string | Readonly<Record<string, boolean>>;

export interface RxMacroConfig {
  debug?: boolean;
  limits?: LimitsConfig;
  dialect?: DialectSetting;
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly filePath?: string
  ) {
    super(filePath ? `${message} (in ${filePath})` : message);
    this.name = "ConfigError";
  }
}

export const DEFAULT_LIMITS: ResolvedLimits = Object.freeze({
  maxMacros: 10_000,
  maxTotalBodyLength: 1024 * 1024,
  maxExpandedLength: 4 * 1024 * 1024,
});

const DEFAULT_DIALECT = "ecmascript";

// ============================================================================
// Global State
// ============================================================================

type ConfigRecord = Record<string, unknown>;

let configStore: ConfigRecord = {};
let overrides: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] = isRecord(sourceValue) && isRecord(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
  }

  return result;
}

// ============================================================================
// Validation
// ============================================================================

const LIMIT_KEYS = ["maxMacros", "maxTotalBodyLength", "maxExpandedLength"] as const;
const TOP_LEVEL_KEYS = new Set(["debug", "limits", "dialect"]);

/**
 * Check a config object from a file or from set(). Unknown keys are rejected so
 * that typos do not silently fall back to defaults.
 */
function validateConfig(value: unknown, filePath?: string): ConfigRecord {
  if (!isRecord(value)) {
    throw new ConfigError("configuration must be an object", filePath);
  }

  for (const key of Object.keys(value)) {
    if (!TOP_LEVEL_KEYS.has(key)) {
      throw new ConfigError(`unknown configuration key "${key}"`, filePath);
    }
  }

  if (value.debug !== undefined && typeof value.debug !== "boolean") {
    throw new ConfigError(`"debug" must be a boolean`, filePath);
  }

  const limits = value.limits;
  if (limits !== undefined) {
    if (!isRecord(limits)) {
      throw new ConfigError(`"limits" must be an object`, filePath);
    }
    for (const [key, limit] of Object.entries(limits)) {
      if (!LIMIT_KEYS.some((k) => k === key)) {
        throw new ConfigError(`unknown limit "${key}"`, filePath);
      }
      if (typeof limit !== "number" || !Number.isInteger(limit) || limit <= 0) {
        throw new ConfigError(`"limits.${key}" must be a positive integer`, filePath);
      }
    }
  }

  const dialect = value.dialect;
  if (dialect !== undefined && typeof dialect !== "string") {
    if (!isRecord(dialect) || !Object.values(dialect).every((v) => typeof v === "boolean")) {
      throw new ConfigError(`"dialect" must be a preset name or an object of boolean options`, filePath);
    }
  }

  return value;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "RXMACRO_";

/** Config paths reachable from the environment, keyed by variable suffix. */
const ENV_PATHS: ReadonlyMap<string, string> = new Map(
  ["debug", "dialect", ...LIMIT_KEYS.map((k) => `limits.${k}`)].map((path) => [
    path
      .replace(/([a-z])([A-Z])/g, "$1_$2")
      .replace(/\./g, "_")
      .toUpperCase(),
    path,
  ])
);

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   RXMACRO_DEBUG=1                     → { debug: true }
 *   RXMACRO_LIMITS_MAX_MACROS=500       → { limits: { maxMacros: 500 } }
 *   RXMACRO_DIALECT=pcre                → { dialect: "pcre" }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    const path = ENV_PATHS.get(key.slice(ENV_PREFIX.length));
    if (!path) continue;

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, path, parsedValue);
  }

  return validateConfig(envConfig, "environment");
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "rxmacro";

function loadConfigFromFiles(searchFrom?: string): ConfigRecord {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(searchFrom);
  if (!result || result.isEmpty) {
    return {};
  }
  configFilePath = result.filepath;
  const fileConfig: unknown = result.config;
  return validateConfig(fileConfig, result.filepath);
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Load configuration from all sources. Later calls replace earlier loads but keep
 * programmatic overrides.
 */
function load(searchFrom?: string, env: NodeJS.ProcessEnv = process.env): void {
  configFilePath = undefined;
  const defaults: ConfigRecord = {
    debug: false,
    limits: { ...DEFAULT_LIMITS },
    dialect: DEFAULT_DIALECT,
  };

  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv(env);

  configStore = deepMerge(deepMerge(deepMerge(defaults, fileConfig), envConfig), overrides);
  configLoaded = true;
}

function initializeConfig(): void {
  if (!configLoaded) load();
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a raw configuration value by dot path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: RxMacroConfig): void {
  const checked = validateConfig(values);
  initializeConfig();
  overrides = deepMerge(overrides, checked);
  configStore = deepMerge(configStore, checked);
}

function isDebug(): boolean {
  return get("debug") === true;
}

function getLimits(): ResolvedLimits {
  const read = (key: (typeof LIMIT_KEYS)[number]): number => {
    const value = get(`limits.${key}`);
    return typeof value === "number" ? value : DEFAULT_LIMITS[key];
  };
  return {
    maxMacros: read("maxMacros"),
    maxTotalBodyLength: read("maxTotalBodyLength"),
    maxExpandedLength: read("maxExpandedLength"),
  };
}

function getDialect(): DialectSetting {
  const value = get("dialect");
  if (typeof value === "string") return value;
  if (isRecord(value)) {
    const options: Record<string, boolean> = {};
    for (const [key, flag] of Object.entries(value)) {
      if (typeof flag === "boolean") options[key] = flag;
    }
    return options;
  }
  return DEFAULT_DIALECT;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  load,
  get,
  set,
  isDebug,
  getLimits,
  getDialect,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: RxMacroConfig): RxMacroConfig {
  return cfg;
}
