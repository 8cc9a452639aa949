// Error types and Result monad for explicit error handling

import type { ProviderErrorCode } from "./provider";

export type Result<T, E = TidechatError> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export class TidechatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "TidechatError";
  }
}

/** Malformed client request. No turn is started. */
export class ValidationError extends TidechatError {
  constructor(message: string, cause?: unknown) {
    super(message, "VALIDATION_ERROR", cause);
    this.name = "ValidationError";
  }
}

/** Tool server unreachable or the connection dropped. Invalidates the session. */
export class TransportError extends TidechatError {
  constructor(message: string, cause?: unknown, code = "TRANSPORT_ERROR") {
    super(message, code, cause);
    this.name = "TransportError";
  }
}

/** A tool-server handshake or tool listing outlived its deadline. */
export class ToolServerTimeoutError extends TransportError {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message, undefined, "TOOL_SERVER_TIMEOUT");
    this.name = "ToolServerTimeoutError";
  }
}

/** The tool server answered with something that is not valid JSON-RPC. */
export class ProtocolError extends TidechatError {
  constructor(message: string, cause?: unknown) {
    super(message, "PROTOCOL_ERROR", cause);
    this.name = "ProtocolError";
  }
}

/** Credentials rejected by a tool server. */
export class AuthError extends TidechatError {
  constructor(message: string, cause?: unknown) {
    super(message, "AUTH_ERROR", cause);
    this.name = "AuthError";
  }
}

export class ToolNotFoundError extends TidechatError {
  constructor(public readonly toolName: string, detail?: string) {
    super(detail ?? `Unknown tool "${toolName}"`, "TOOL_NOT_FOUND");
    this.name = "ToolNotFoundError";
  }
}

export class ToolTimeoutError extends TidechatError {
  constructor(
    public readonly toolName: string,
    public readonly timeoutMs: number,
  ) {
    super(`Tool "${toolName}" timed out after ${timeoutMs}ms`, "TOOL_TIMEOUT");
    this.name = "ToolTimeoutError";
  }
}

/** The tool ran and reported a failure. */
export class ToolExecutionError extends TidechatError {
  constructor(message: string, cause?: unknown) {
    super(message, "TOOL_EXECUTION_ERROR", cause);
    this.name = "ToolExecutionError";
  }
}

export class ProviderError extends TidechatError {
  constructor(
    message: string,
    public readonly providerCode?: ProviderErrorCode,
    cause?: unknown,
  ) {
    super(message, "PROVIDER_ERROR", cause);
    this.name = "ProviderError";
  }
}

export class ToolLoopLimitError extends TidechatError {
  constructor(public readonly maxToolRounds: number) {
    super(`Model kept requesting tools after ${maxToolRounds} rounds`, "TOOL_LOOP_LIMIT");
    this.name = "ToolLoopLimitError";
  }
}

/** A turn-level deadline or a model wait elapsed. */
export class TurnTimeoutError extends TidechatError {
  constructor(message: string) {
    super(message, "TURN_TIMEOUT");
    this.name = "TurnTimeoutError";
  }
}

export class ConfigError extends TidechatError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_ERROR", cause);
    this.name = "ConfigError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
