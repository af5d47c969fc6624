/**
 * Scoped console logging gated by the `logLevel` setting.
 *
 * @example
 * ```typescript
 * const log = createLogger("reference");
 * log.debug("composing 3 maps");   // printed only when logLevel is "debug"
 * log.warn("origin dtype differs"); // "[coordmap/reference] origin dtype differs"
 * ```
 */

import { config, LOG_LEVELS, type LogLevel } from "./config.js";

export type LogMethod = (message: string, ...details: unknown[]) => void;

export interface Logger {
  readonly scope: string;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

type EmittingLevel = Exclude<LogLevel, "silent">;

const SINKS: Record<EmittingLevel, LogMethod> = {
  debug: (message, ...details) => console.debug(message, ...details),
  info: (message, ...details) => console.info(message, ...details),
  warn: (message, ...details) => console.warn(message, ...details),
  error: (message, ...details) => console.error(message, ...details),
};

/**
 * Whether a message at `level` passes the configured threshold.
 */
export function isLevelEnabled(level: EmittingLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(config.get("logLevel"));
}

export function createLogger(scope: string): Logger {
  const prefix = `[coordmap/${scope}]`;

  const method =
    (level: EmittingLevel): LogMethod =>
    (message, ...details) => {
      if (!isLevelEnabled(level)) return;
      SINKS[level](`${prefix} ${message}`, ...details);
    };

  return {
    scope,
    debug: method("debug"),
    info: method("info"),
    warn: method("warn"),
    error: method("error"),
  };
}
