import { getErrorMessage, isStockroomError } from "@stockroom/errors";
import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

/**
 * A log call takes a message and optionally the error that caused it, so
 * callers can observe the typed error even though it is never thrown.
 */
export type LogMethod = (message: string, error?: unknown) => void;

export interface Logger {
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;
}

const SEVERITY: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const noop: LogMethod = () => {};

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

function describe(error: unknown): string {
  if (error === undefined) return "";
  if (isStockroomError(error)) return ` ${pc.dim(`[${error.code}]`)}`;
  return ` ${pc.dim(`(${getErrorMessage(error)})`)}`;
}

/**
 * Console logger with a `[tag]` prefix. Messages below `level` are dropped.
 */
export function createConsoleLogger(tag = "stockroom", level: LogLevel = "info"): Logger {
  const threshold = SEVERITY[level];
  const prefix = `[${tag}]`;
  const enabled = (l: Exclude<LogLevel, "silent">): boolean => SEVERITY[l] >= threshold;

  return {
    debug: enabled("debug")
      ? (message, error) => console.debug(pc.dim(`${prefix} ${message}`) + describe(error))
      : noop,
    info: enabled("info")
      ? (message, error) => console.info(`${pc.cyan(prefix)} ${message}${describe(error)}`)
      : noop,
    warn: enabled("warn")
      ? (message, error) =>
          console.warn(`${pc.yellow(prefix)} ${pc.yellow(message)}${describe(error)}`)
      : noop,
    error: enabled("error")
      ? (message, error) => console.error(`${pc.red(prefix)} ${pc.red(message)}${describe(error)}`)
      : noop,
  };
}
