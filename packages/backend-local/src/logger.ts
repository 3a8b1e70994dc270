/* eslint-disable no-console */
import type { Logger } from "./core.js";

export type LogLevel = keyof Logger;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && Object.hasOwn(LEVEL_ORDER, value);
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const configured = env["LOG_LEVEL"]?.toLowerCase();
  if (isLogLevel(configured)) {
    return configured;
  }
  return env["DEBUG"] ? "debug" : "info";
}

/**
 * Console-backed logger. Each line carries an ISO timestamp, the level and
 * the namespace; lines below `minLevel` are dropped.
 */
export function createConsoleLogger(
  namespace: string,
  minLevel: LogLevel = resolveLogLevel(),
): Logger {
  const write = (level: LogLevel, message: string, meta?: unknown): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) {
      return;
    }
    const line = `${new Date().toISOString()} ${level.toUpperCase()} [${namespace}] ${message}`;
    console[level](line, meta ?? "");
  };

  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
  } satisfies Logger;
}
