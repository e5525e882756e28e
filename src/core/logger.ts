/**
 * Levelled console logger
 *
 * Lines are written as `[<name>] <message>` to the matching console method.
 */

import type { Logger, LogLevel, LogSink } from "../types";
import { ValidationError } from "./errors";

export const LOG_LEVELS = ["DEBUG", "INFO", "WARNING", "ERROR"] as const satisfies readonly LogLevel[];

const LEVEL_RANK: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

const LEVEL_ALIASES: Record<string, LogLevel> = {
  WARN: "WARNING",
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parse a level name, case-insensitively. "WARN" is accepted for WARNING.
 */
export function parseLogLevel(value: string): LogLevel {
  const name = value.trim().toUpperCase();
  const level = LEVEL_ALIASES[name] ?? name;

  if (!isLogLevel(level)) {
    throw new ValidationError(
      `Unknown log level "${value}". Expected one of: ${LOG_LEVELS.join(", ")}`,
      "logLevel"
    );
  }
  return level;
}

export function createLogger(
  name: string,
  level: LogLevel = "INFO",
  sink: LogSink = console
): Logger {
  let current = level;

  function enabled(target: LogLevel): boolean {
    return LEVEL_RANK[target] >= LEVEL_RANK[current];
  }

  return {
    debug(message, ...args) {
      if (enabled("DEBUG")) sink.debug(`[${name}] ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled("INFO")) sink.info(`[${name}] ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("WARNING")) sink.warn(`[${name}] ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled("ERROR")) sink.error(`[${name}] ${message}`, ...args);
    },
    getLevel() {
      return current;
    },
    setLevel(next) {
      current = next;
    },
    isLevelEnabled(target) {
      return enabled(target);
    },
  };
}
