// OpenAICompatibleProvider: streaming Chat Completions over SSE
//
// Handles:
//   • Base URL normalization (with or without /v1, full endpoint URLs)
//   • Message conversion, including assistant tool calls and tool results
//   • SSE streaming with tolerant chunk parsing
//   • Tool call accumulation across streaming chunks
//   • Unified error classification

import type { Message, StreamTurnOptions, ToolCall, ToolDefinition } from "@tidechat/core";
import { AbstractProvider, ProviderError, errorMessage, type StreamedEvent } from "@tidechat/core";
import type { WireMessage, WireToolDef } from "./wire";
import { processSSEBuffer } from "./sse";
import { buildErrorHint, classifyError, classifyStatus } from "./errors";

// ── Config ───────────────────────────────────────────────────────────────────

export interface OpenAICompatibleConfig {
  /** Provider name used in error messages and logs. */
  readonly name: string;
  /** Model identifier. Pass null/undefined to omit from the request body. */
  readonly model?: string | null;
  /**
   * Base URL for the API. Accepts any of:
   *   https://api.openai.com
   *   https://api.openai.com/v1
   *   https://api.openai.com/v1/chat/completions   (trailing endpoint stripped)
   * All are normalized to https://api.openai.com/v1 internally.
   */
  readonly baseUrl: string;
  /** API key. If empty/undefined, the Authorization header is omitted. */
  readonly apiKey?: string;
  readonly temperature?: number;
  /** Nucleus sampling. Sent as top_p when set. */
  readonly topP?: number;
  readonly maxTokens?: number;
}

// ── Helpers ──────────────────────────────────────────────────────────────────

export function normalizeBaseUrl(raw: string): string {
  let url = raw.replace(/\/+$/, "");
  // Strip full endpoint path if the complete URL was pasted
  url = url.replace(/\/chat\/completions$/, "");
  if (!url.endsWith("/v1")) url += "/v1";
  return url;
}

export function toWireMessages(messages: Message[]): WireMessage[] {
  return messages.map((msg): WireMessage => {
    switch (msg.role) {
      case "system":
        return { role: "system", content: msg.content };
      case "tool":
        return { role: "tool", tool_call_id: msg.toolCallId ?? "", content: msg.content };
      case "assistant":
        if (msg.toolCalls?.length) {
          return {
            role: "assistant",
            content: msg.content || null,
            tool_calls: msg.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.name, arguments: JSON.stringify(tc.args) },
            })),
          };
        }
        return { role: "assistant", content: msg.content };
      case "user":
        return { role: "user", content: msg.content };
    }
  });
}

function toWireTools(tools: ToolDefinition[]): WireToolDef[] {
  return tools.map((t) => ({
    type: "function" as const,
    function: { name: t.name, description: t.description, parameters: t.inputSchema },
  }));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function generateCallId(): string {
  return `call_${Date.now().toString(36)}_${Math.random().toString(36).slice(2, 8)}`;
}

interface PendingToolCall {
  id: string;
  name: string;
  arguments: string;
}

// ── Provider ─────────────────────────────────────────────────────────────────

export class OpenAICompatibleProvider extends AbstractProvider {
  readonly name: string;
  readonly model: string | null;
  readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly temperature: number | undefined;
  private readonly topP: number | undefined;
  private readonly maxTokens: number | undefined;

  constructor(config: OpenAICompatibleConfig) {
    super();
    this.name = config.name;
    this.model = config.model ?? null;
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.apiKey = config.apiKey ?? "";
    this.temperature = config.temperature;
    this.topP = config.topP;
    this.maxTokens = config.maxTokens;
  }

  protected async *_stream(messages: Message[], options?: StreamTurnOptions): AsyncIterable<StreamedEvent> {
    const signal = options?.signal;
    if (signal?.aborted) return;

    const tools = options?.tools ?? [];
    const body: Record<string, unknown> = {
      messages: toWireMessages(messages),
      stream: true,
    };
    if (this.model != null) body.model = this.model;
    if (this.temperature !== undefined) body.temperature = this.temperature;
    if (this.topP !== undefined) body.top_p = this.topP;
    if (this.maxTokens !== undefined) body.max_tokens = this.maxTokens;
    if (tools.length > 0) body.tools = toWireTools(tools);

    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.apiKey) {
      headers["Authorization"] = `Bearer ${this.apiKey}`;
    }

    // Aborted by the caller's signal, or when the consumer abandons the stream
    const upstream = new AbortController();
    const onAbort = () => upstream.abort(signal?.reason);
    signal?.addEventListener("abort", onAbort, { once: true });

    const accumulator = new Map<number, PendingToolCall>();

    try {
      const response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: upstream.signal,
      });

      if (!response.ok) {
        const detail = (await response.text()).slice(0, 500);
        const code = classifyStatus(response.status);
        throw new ProviderError(
          `${this.name} error (${code}): HTTP ${response.status}${detail ? `: ${detail}` : ""}`,
          code,
        );
      }

      if (!response.body) {
        throw new ProviderError(`${this.name} error (unknown): no response body`, "unknown");
      }

      const reader = response.body.getReader();
      const decoder = new TextDecoder();
      let buffer = "";
      let done = false;

      while (!done) {
        const chunk = await reader.read();
        if (chunk.done) break;

        const { events, remaining } = processSSEBuffer(buffer, decoder.decode(chunk.value, { stream: true }));
        buffer = remaining;

        for (const event of events) {
          if (event.type === "done") {
            done = true;
            break;
          }

          if (event.type === "text") {
            yield { type: "text_delta", text: event.text };
          }

          if (event.type === "tool_delta") {
            const existing = accumulator.get(event.index);
            if (existing) {
              if (event.id && !existing.id) existing.id = event.id;
              if (event.name && !existing.name) existing.name = event.name;
              if (event.arguments) existing.arguments += event.arguments;
            } else {
              accumulator.set(event.index, {
                id: event.id ?? "",
                name: event.name ?? "",
                arguments: event.arguments ?? "",
              });
            }
          }

          if (event.type === "finish" && accumulator.size > 0) {
            yield* this.flushToolCalls(accumulator);
          }
        }
      }

      // Emit any tool calls not yet flushed by a finish event
      if (accumulator.size > 0) {
        yield* this.flushToolCalls(accumulator);
      }
    } catch (err) {
      if (signal?.aborted) return;
      if (err instanceof ProviderError) throw err;

      const code = classifyError(err);
      const hint = buildErrorHint(code, this.name, this.baseUrl);
      throw new ProviderError(`${this.name} error (${code}): ${errorMessage(err)}${hint}`, code, err);
    } finally {
      signal?.removeEventListener("abort", onAbort);
      upstream.abort();
    }
  }

  /** Yield accumulated calls in index order and clear the accumulator. */
  private *flushToolCalls(accumulator: Map<number, PendingToolCall>): Generator<StreamedEvent> {
    const ordered = [...accumulator.entries()].sort(([a], [b]) => a - b);
    accumulator.clear();

    for (const [, pending] of ordered) {
      const toolCall: ToolCall = {
        id: pending.id || generateCallId(),
        name: pending.name,
        args: this.parseArguments(pending),
      };
      yield { type: "tool_call", toolCall };
    }
  }

  private parseArguments(pending: PendingToolCall): Record<string, unknown> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(pending.arguments || "{}");
    } catch (err) {
      throw new ProviderError(
        `${this.name} error (invalid_request): malformed arguments for tool "${pending.name}"`,
        "invalid_request",
        err,
      );
    }
    if (!isRecord(parsed)) {
      throw new ProviderError(
        `${this.name} error (invalid_request): arguments for tool "${pending.name}" are not an object`,
        "invalid_request",
      );
    }
    return parsed;
  }
}
