/**
 * Scoped console logger.
 *
 * Debug lines are printed only when verbose output is requested, either per
 * logger or through `config.debug`. Every line carries an `[rxmacro:<scope>]`
 * prefix so output from different stages can be told apart.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Time a synchronous step and log its duration at debug level. */
  time<T>(label: string, fn: () => T): T;
}

export interface LoggerOptions {
  /** Force debug output on or off, regardless of configuration */
  verbose?: boolean;
  /** Destination for a formatted line (default: console) */
  sink?: (level: LogLevel, line: string) => void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

function consoleSink(level: LogLevel, line: string): void {
  switch (level) {
    case "debug":
    case "info":
      console.log(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const sink = options.sink ?? consoleSink;
  const prefix = `[rxmacro:${scope}]`;
  const verbose = (): boolean => options.verbose ?? config.isDebug();

  const write = (level: LogLevel, message: string): void => {
    sink(level, `${prefix} ${message}`);
  };

  return {
    scope,
    debug(message) {
      if (verbose()) write("debug", message);
    },
    info(message) {
      write("info", message);
    },
    warn(message) {
      write("warn", message);
    },
    error(message) {
      write("error", message);
    },
    time(label, fn) {
      if (!verbose()) return fn();
      const start = performance.now();
      const result = fn();
      const elapsed = (performance.now() - start).toFixed(2);
      write("debug", `${label} (${elapsed}ms)`);
      return result;
    },
  };
}
