// Abstract base class for model providers.
//
// Subclasses implement _stream() and only yield text deltas and tool calls.
// The base class turns a normal end into "turn_complete", a thrown error into
// "turn_error", and ends silently once the caller's signal has aborted.

import type { GenerationEvent, Message, Provider, StreamTurnOptions } from "./types";
import { ProviderError, errorMessage } from "./types";

export type StreamedEvent = Extract<GenerationEvent, { type: "text_delta" | "tool_call" }>;

export abstract class AbstractProvider implements Provider {
  abstract readonly name: string;

  async *streamTurn(
    conversation: Message[],
    options?: StreamTurnOptions,
  ): AsyncIterable<GenerationEvent> {
    try {
      for await (const event of this._stream(conversation, options)) {
        if (options?.signal?.aborted) return;
        yield event;
      }
    } catch (e) {
      if (options?.signal?.aborted) return;
      const message = e instanceof ProviderError ? e.message : `${this.name} error: ${errorMessage(e)}`;
      yield { type: "turn_error", kind: "ProviderError", message };
      return;
    }

    if (options?.signal?.aborted) return;
    yield { type: "turn_complete" };
  }

  protected abstract _stream(
    conversation: Message[],
    options?: StreamTurnOptions,
  ): AsyncIterable<StreamedEvent>;
}
