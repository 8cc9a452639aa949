// Tolerant SSE line parser for OpenAI-compatible streaming responses.
//
// Malformed lines are skipped rather than thrown. Text is read from
// delta.content or message.content, and [DONE] ends the stream.

import { WireChunkSchema, type WireChunk } from "./wire";

export type SSEEvent =
  | { type: "text"; text: string }
  | { type: "tool_delta"; index: number; id?: string; name?: string; arguments?: string }
  | { type: "finish"; reason: string }
  | { type: "done" };

/**
 * Parse the payload of one "data:" line, or return null to skip it.
 */
function parseChunk(data: string): WireChunk | null {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return null;
  }
  const parsed = WireChunkSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/**
 * Process a buffer of raw SSE text into discrete events.
 * Returns the events and the leftover (incomplete) line.
 */
export function processSSEBuffer(
  buffer: string,
  incoming: string,
): { events: SSEEvent[]; remaining: string } {
  const combined = buffer + incoming;
  const lines = combined.split("\n");
  const remaining = lines.pop() ?? "";
  const events: SSEEvent[] = [];

  for (const line of lines) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("data:")) continue;

    const data = trimmed.slice(5).trimStart();
    if (data === "[DONE]") {
      events.push({ type: "done" });
      continue;
    }

    const chunk = parseChunk(data);
    const choice = chunk?.choices?.[0];
    if (!choice) continue;

    // Prefer delta.content, fall back to message.content
    const text = choice.delta?.content ?? choice.message?.content ?? null;
    if (text) {
      events.push({ type: "text", text });
    }

    for (const tc of choice.delta?.tool_calls ?? []) {
      events.push({
        type: "tool_delta",
        index: tc.index,
        id: tc.id,
        name: tc.function?.name,
        arguments: tc.function?.arguments,
      });
    }

    if (choice.finish_reason) {
      events.push({ type: "finish", reason: choice.finish_reason });
    }
  }

  return { events, remaining };
}
