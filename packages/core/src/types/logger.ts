// Structured logging: the Logger contract and a JSON-lines implementation

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Create a child logger with additional context fields. */
  child(context: Record<string, unknown>): Logger;
}

/** Receives each formatted line. */
export type LogSink = (level: LogLevel, line: string) => void;

export interface ConsoleLoggerOptions {
  readonly level?: LogLevel;
  /** Fields stamped on every entry, e.g. service, connectionId, requestId. */
  readonly context?: Record<string, unknown>;
  /** Defaults to the console: warnings and errors on stderr, the rest on stdout. */
  readonly sink?: LogSink;
}

const REDACTED = "[redacted]";

// Tool-server tokens and model API keys must never reach a log line
const SECRET_FIELD = /authorization|api_?key|auth_?token|secret|password/i;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

function serialize(value: unknown): unknown {
  if (!(value instanceof Error)) return value;
  const code = "code" in value ? value.code : undefined;
  return code === undefined
    ? { name: value.name, message: value.message }
    : { name: value.name, message: value.message, code };
}

function scrub(fields: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = SECRET_FIELD.test(key) && value !== null && value !== undefined ? REDACTED : serialize(value);
  }
  return out;
}

/**
 * Writes one JSON object per line. Context fields come first and per-call
 * data wins on a clash. Error values keep their name, message and code.
 */
export class ConsoleLogger implements Logger {
  private readonly threshold: LogLevel;
  private readonly context: Record<string, unknown>;
  private readonly sink: LogSink;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.threshold = options.level ?? "info";
    this.context = scrub(options.context ?? {});
    this.sink = options.sink ?? consoleSink;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger({
      level: this.threshold,
      context: { ...this.context, ...context },
      sink: this.sink,
    });
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.threshold)) return;

    const entry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...(data ? scrub(data) : {}),
    };
    this.sink(level, JSON.stringify(entry));
  }
}
