import { ENV, LOG_PREFIX } from "./constants.js";
import type { Env, LogLevel, Logger } from "./types.js";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_ALIASES: Record<string, LogLevel> = {
  debug: "debug",
  info: "info",
  warn: "warn",
  warning: "warn",
  error: "error",
  critical: "error",
  fatal: "error",
};

/** Read the log level from `SECRET_SDK_LOG_LEVEL`; unknown or missing values fall back to `info`. */
export function resolveLogLevel(env: Env = process.env): LogLevel {
  const raw = env[ENV.LOG_LEVEL]?.trim().toLowerCase();
  if (!raw) return "info";
  return LEVEL_ALIASES[raw] ?? "info";
}

/** Create a console-based logger with `[secret-ai-kit]` prefix. Pass your own Logger to override. */
export function createDefaultLogger(level: LogLevel = resolveLogLevel()): Logger {
  const enabled = (candidate: LogLevel) => LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];
  return {
    debug(msg, data) {
      if (enabled("debug")) console.debug(`${LOG_PREFIX} ${msg}`, data ?? "");
    },
    info(msg, data) {
      if (enabled("info")) console.info(`${LOG_PREFIX} ${msg}`, data ?? "");
    },
    warn(msg, data) {
      if (enabled("warn")) console.warn(`${LOG_PREFIX} ${msg}`, data ?? "");
    },
    error(msg, data) {
      if (enabled("error")) console.error(`${LOG_PREFIX} ${msg}`, data ?? "");
    },
  };
}

/** Logger that discards everything */
export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};
