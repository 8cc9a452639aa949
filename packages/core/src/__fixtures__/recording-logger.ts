// Test fixture: logger that keeps every entry in memory

import type { Logger, LogLevel } from "../types";

export interface LogEntry {
  readonly level: LogLevel;
  readonly message: string;
  readonly data: Record<string, unknown>;
}

export class RecordingLogger implements Logger {
  constructor(
    readonly entries: LogEntry[] = [],
    private readonly context: Record<string, unknown> = {},
  ) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.record("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.record("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.record("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.record("error", message, data);
  }

  child(context: Record<string, unknown>): Logger {
    return new RecordingLogger(this.entries, { ...this.context, ...context });
  }

  at(level: LogLevel): LogEntry[] {
    return this.entries.filter((e) => e.level === level);
  }

  private record(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    this.entries.push({ level, message, data: { ...this.context, ...data } });
  }
}
