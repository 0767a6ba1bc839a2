import type { Logger } from "@stockroom/core";

export type RecordedLevel = "debug" | "info" | "warn" | "error";

export interface LogRecord {
  readonly level: RecordedLevel;
  readonly message: string;
  readonly error: unknown;
}

/**
 * Logger that keeps every call in memory for assertions.
 */
export class RecordingLogger implements Logger {
  readonly records: LogRecord[] = [];

  readonly debug = (message: string, error?: unknown): void => this.push("debug", message, error);
  readonly info = (message: string, error?: unknown): void => this.push("info", message, error);
  readonly warn = (message: string, error?: unknown): void => this.push("warn", message, error);
  readonly error = (message: string, error?: unknown): void => this.push("error", message, error);

  /** Messages logged at one level, in order. */
  messages(level: RecordedLevel): string[] {
    return this.records.filter((r) => r.level === level).map((r) => r.message);
  }

  /** Errors passed alongside messages at one level. */
  errors(level: RecordedLevel): unknown[] {
    return this.records
      .filter((r) => r.level === level && r.error !== undefined)
      .map((r) => r.error);
  }

  clear(): void {
    this.records.length = 0;
  }

  private push(level: RecordedLevel, message: string, error: unknown): void {
    this.records.push({ level, message, error });
  }
}
