// Test fixture: provider that replays scripted model rounds

import type {
  GenerationEvent,
  Message,
  Provider,
  StreamTurnOptions,
  ToolCall,
  ToolDefinition,
} from "../types";

export type ScriptStep =
  | GenerationEvent
  | { readonly type: "wait"; readonly ms: number }
  /** Block until the caller aborts. */
  | { readonly type: "hang" };

export interface RecordedCall {
  readonly conversation: Message[];
  readonly tools?: ToolDefinition[];
}

function untilAborted(signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (!signal) return;
    if (signal.aborted) return resolve();
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      "abort",
      () => {
        clearTimeout(timer);
        resolve();
      },
      { once: true },
    );
  });
}

export class ScriptedProvider implements Provider {
  readonly name = "scripted";
  readonly calls: RecordedCall[] = [];
  /** Streams that ended early because the consumer aborted or abandoned them. */
  abandoned = 0;

  constructor(private readonly script: ScriptStep[][] | ((round: number) => ScriptStep[])) {}

  async *streamTurn(
    conversation: Message[],
    options?: StreamTurnOptions,
  ): AsyncIterable<GenerationEvent> {
    const round = this.calls.length;
    this.calls.push({ conversation: [...conversation], tools: options?.tools });
    const steps =
      typeof this.script === "function"
        ? this.script(round)
        : (this.script[round] ?? [{ type: "turn_complete" }]);

    let completed = false;
    try {
      for (const step of steps) {
        if (options?.signal?.aborted) return;
        if (step.type === "wait") {
          await sleep(step.ms, options?.signal);
          continue;
        }
        if (step.type === "hang") {
          await untilAborted(options?.signal);
          return;
        }
        yield step;
      }
      completed = true;
    } finally {
      if (!completed) this.abandoned++;
    }
  }

  lastCall(): RecordedCall | undefined {
    return this.calls.at(-1);
  }
}

export function text(t: string): GenerationEvent {
  return { type: "text_delta", text: t };
}

export function toolCall(id: string, name: string, args: Record<string, unknown> = {}): GenerationEvent {
  const call: ToolCall = { id, name, args };
  return { type: "tool_call", toolCall: call };
}

export const done: GenerationEvent = { type: "turn_complete" };
