import type { Logger } from "./types.js";

export type LogLevel = keyof Logger;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export interface DefaultLoggerOptions {
  /** Tag put in front of every message (default: `chain-gateway-kit`) */
  prefix?: string | undefined;
  /** Messages below this level are dropped (default: `debug`) */
  level?: LogLevel | undefined;
}

/** Console-based logger. Pass your own Logger to the builder to override. */
export function createDefaultLogger(options?: DefaultLoggerOptions): Logger {
  const tag = `[${options?.prefix ?? "chain-gateway-kit"}]`;
  const threshold = LEVEL_ORDER[options?.level ?? "debug"];

  const write = (level: LogLevel) => (msg: string, data?: Record<string, unknown>) => {
    if (LEVEL_ORDER[level] < threshold) return;
    console[level](`${tag} ${msg}`, data ?? "");
  };

  return { debug: write("debug"), info: write("info"), warn: write("warn"), error: write("error") };
}

/** Logger that drops everything; the builder default when no logger is set */
export function createSilentLogger(): Logger {
  const noop = () => {};
  return { debug: noop, info: noop, warn: noop, error: noop };
}
