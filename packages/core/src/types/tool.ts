// Tool system types -- definitions, calls, results, sources

/**
 * JSON Schema describing a tool the model can call.
 * Sent to the provider as part of every model round.
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>; // JSON Schema object
}

/**
 * A tool invocation requested by the model.
 */
export interface ToolCall {
  readonly id: string;
  readonly name: string;
  readonly args: Record<string, unknown>;
}

export type ToolResultStatus = "ok" | "error";

/**
 * The outcome of one tool call, fed back to the model as a synthetic turn.
 * Failures are results too: the model sees them and can react.
 */
export interface ToolResult {
  readonly toolCallId: string;
  readonly name: string;
  readonly status: ToolResultStatus;
  readonly content: string;
}

export interface ToolInvokeOptions {
  readonly signal?: AbortSignal;
  /** Call id the result is correlated with. Generated when absent. */
  readonly callId?: string;
}

/**
 * A tool implemented inside this process. Registered explicitly at startup.
 */
export interface LocalTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: Record<string, unknown>;
  invoke(args: Record<string, unknown>, options: { readonly signal?: AbortSignal }): Promise<string>;
}

export type ToolTransportKind = "streamable-http" | "in-process";

/**
 * Anything the registry can list tools from and dispatch calls to:
 * a remote tool-server transport or the in-process tool set.
 */
export interface ToolSource {
  readonly name: string;
  readonly kind: ToolTransportKind;
  listTools(): Promise<ToolDefinition[]>;
  callTool(
    name: string,
    args: Record<string, unknown>,
    options?: ToolInvokeOptions,
  ): Promise<ToolResult>;
}
