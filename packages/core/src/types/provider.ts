// Model streaming contract: one streamTurn call per model round

import type { Message } from "./message";
import type { ToolCall, ToolDefinition } from "./tool";

export type ProviderErrorCode =
  | "throttled"
  | "auth_failed"
  | "invalid_request"
  | "context_length_exceeded"
  | "transient_network"
  | "cancelled"
  | "unknown";

export interface StreamTurnOptions {
  readonly signal?: AbortSignal;
  readonly tools?: ToolDefinition[];
}

/**
 * Events yielded by a provider while it generates.
 * - "text_delta": a piece of the response text
 * - "tool_call": the model wants a tool invoked (zero, one or many per round)
 * - "turn_complete": the round finished normally
 * - "turn_error": the round failed; nothing follows
 */
export type GenerationEvent =
  | { readonly type: "text_delta"; readonly text: string }
  | { readonly type: "tool_call"; readonly toolCall: ToolCall }
  | { readonly type: "turn_complete" }
  | { readonly type: "turn_error"; readonly kind: string; readonly message: string };

/**
 * The sequence is finite, ordered and single-pass. Abandoning it (iterator
 * return) or aborting the signal must cancel the upstream request.
 */
export interface Provider {
  readonly name: string;
  streamTurn(conversation: Message[], options?: StreamTurnOptions): AsyncIterable<GenerationEvent>;
}
