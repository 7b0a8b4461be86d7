/* eslint-disable no-console */
import type { Logger } from "./core.js";

type Level = "info" | "warn" | "error" | "debug";

export interface ConsoleLoggerOptions {
  readonly debug?: boolean;
  readonly clock?: () => Date;
  readonly sink?: Pick<Console, Level>;
}

/**
 * Namespaced console logger. Every line is prefixed with an ISO timestamp,
 * the level and the namespace; structured meta is passed through untouched
 * so the console can render errors with their stack.
 */
export function createConsoleLogger(
  namespace: string,
  { debug = false, clock = () => new Date(), sink = console }: ConsoleLoggerOptions = {},
): Logger {
  const write = (level: Level, message: string, meta: unknown): void => {
    const line = `${clock().toISOString()} ${level.toUpperCase()} [${namespace}] ${message}`;
    if (meta === undefined) {
      sink[level](line);
    } else {
      sink[level](line, meta);
    }
  };

  return {
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta),
    debug: (message, meta) => {
      if (debug) write("debug", message, meta);
    },
  } satisfies Logger;
}
