// TurnOrchestrator: one chat turn as an explicit state machine
//
// Flow: list tools → processing → stream a model round → if tool calls,
//   run the batch concurrently → append results in request order →
//   stream the next round → repeat until the model finishes without
//   asking for tools (or maxToolRounds is hit).

import type {
  ErrorKind,
  Logger,
  Message,
  Provider,
  ServerEvent,
  ToolCall,
  ToolResult,
} from "./types";
import {
  ProviderError,
  ToolLoopLimitError,
  TurnTimeoutError,
  ValidationError,
  errorMessage,
} from "./types";
import type { EventBus } from "./events";
import type { ToolCatalogue, ToolRegistry } from "./tool-registry";
import { linkAbort, raceAbort, withTimeout } from "./deadline";

function generateId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}

export type TurnState =
  | "started"
  | "awaiting_model"
  | "streaming_text"
  | "awaiting_tools"
  | "complete"
  | "failed"
  | "cancelled";

const TRANSITIONS: Record<TurnState, readonly TurnState[]> = {
  started: ["awaiting_model", "failed", "cancelled"],
  awaiting_model: ["streaming_text", "awaiting_tools", "complete", "failed", "cancelled"],
  streaming_text: ["awaiting_tools", "complete", "failed", "cancelled"],
  awaiting_tools: ["awaiting_model", "failed", "cancelled"],
  complete: [],
  failed: [],
  cancelled: [],
};

const ERROR_KINDS: readonly ErrorKind[] = [
  "ValidationError",
  "Busy",
  "ProviderError",
  "ToolLoopLimitExceeded",
  "Timeout",
  "InternalError",
];

export function isTerminal(state: TurnState): boolean {
  return TRANSITIONS[state].length === 0;
}

export interface TurnLimits {
  /** Tool batches a single turn may run before the next request fails the turn. */
  readonly maxToolRounds: number;
  readonly turnTimeoutMs: number;
  /** Longest wait for the next event from the model stream. */
  readonly modelEventTimeoutMs: number;
}

export const DEFAULT_TURN_LIMITS: TurnLimits = {
  maxToolRounds: 8,
  turnTimeoutMs: 120_000,
  modelEventTimeoutMs: 60_000,
};

export interface TurnDeps {
  readonly provider: Provider;
  readonly toolRegistry: ToolRegistry;
  readonly logger: Logger;
  readonly eventBus?: EventBus;
  readonly systemPrompt?: string;
  readonly limits?: Partial<TurnLimits>;
}

export type EventSink = (event: ServerEvent) => void;

type RoundOutcome =
  | { readonly type: "complete"; readonly text: string; readonly calls: ToolCall[] }
  | { readonly type: "error"; readonly kind: ErrorKind; readonly message: string };

/**
 * Drives a single turn from the user's text to `complete`, `failed` or
 * `cancelled`. Every outbound event goes through the sink; nothing is sent
 * once the turn has reached a terminal state.
 */
export class TurnOrchestrator {
  private readonly logger: Logger;
  private readonly limits: TurnLimits;
  private readonly controller = new AbortController();
  private current: TurnState = "started";
  private readonly history: TurnState[] = ["started"];
  private toolCallCount = 0;

  constructor(
    private readonly deps: TurnDeps,
    readonly requestId: string,
    private readonly sink: EventSink,
  ) {
    this.logger = deps.logger.child({ component: "TurnOrchestrator", requestId });
    this.limits = { ...DEFAULT_TURN_LIMITS, ...deps.limits };
  }

  get state(): TurnState {
    return this.current;
  }

  /** Every state this turn has been in, in order. */
  get transitions(): readonly TurnState[] {
    return this.history;
  }

  get isTerminal(): boolean {
    return isTerminal(this.current);
  }

  /**
   * Run the turn to a terminal state. Never rejects: failures become an
   * `error` event and the `failed` state.
   */
  async run(text: string): Promise<TurnState> {
    const startTime = Date.now();
    const { turnTimeoutMs } = this.limits;
    const deadline = linkAbort(
      this.controller.signal,
      turnTimeoutMs,
      () => new TurnTimeoutError(`Turn exceeded ${turnTimeoutMs}ms`),
    );

    this.deps.eventBus?.emit("turn:started", { requestId: this.requestId, text });

    try {
      const rounds = await this.execute(text, deadline.signal);
      if (this.current === "complete") {
        this.deps.eventBus?.emit("turn:completed", {
          requestId: this.requestId,
          rounds,
          toolCalls: this.toolCallCount,
          durationMs: Date.now() - startTime,
        });
      }
    } catch (e) {
      if (this.current === "cancelled") {
        this.logger.debug("Turn unwound after cancellation", { error: errorMessage(e) });
      } else {
        this.fail(this.classify(e), errorMessage(e));
      }
    } finally {
      this.release();
      deadline.dispose();
    }

    return this.current;
  }

  /**
   * Abort the model stream and in-flight tool calls. Silent: no event is
   * sent for this turn afterwards.
   */
  cancel(): void {
    if (this.isTerminal) return;
    this.transition("cancelled");
    this.release();
    this.logger.info("Turn cancelled");
    this.deps.eventBus?.emit("turn:cancelled", { requestId: this.requestId });
  }

  private async execute(text: string, signal: AbortSignal): Promise<number> {
    const catalogue = await raceAbort(this.deps.toolRegistry.listAll(), signal);

    this.send({
      request_id: this.requestId,
      status: "processing",
      chunk: { metadata: { user_message: text } },
    });

    const conversation: Message[] = [];
    if (this.deps.systemPrompt) {
      conversation.push({
        id: generateId(),
        role: "system",
        content: this.deps.systemPrompt,
        timestamp: Date.now(),
      });
    }
    conversation.push({ id: generateId(), role: "user", content: text, timestamp: Date.now() });

    let toolRounds = 0;

    for (let round = 0; ; round++) {
      this.transition("awaiting_model");

      const outcome = await this.streamRound(conversation, catalogue, signal);

      if (outcome.type === "error") {
        this.fail(outcome.kind, outcome.message);
        return round + 1;
      }

      // ── No tool calls → the turn is done ──
      if (outcome.calls.length === 0) {
        this.send({ request_id: this.requestId, status: "complete" });
        this.transition("complete");
        this.logger.info("Turn complete", { rounds: round + 1, toolCalls: this.toolCallCount });
        return round + 1;
      }

      if (toolRounds >= this.limits.maxToolRounds) {
        throw new ToolLoopLimitError(this.limits.maxToolRounds);
      }

      const results = await this.runToolBatch(outcome.calls, catalogue, signal);
      toolRounds++;

      conversation.push({
        id: generateId(),
        role: "assistant",
        content: outcome.text,
        timestamp: Date.now(),
        toolCalls: outcome.calls,
      });
      for (const result of results) {
        conversation.push({
          id: generateId(),
          role: "tool",
          content: result.content,
          timestamp: Date.now(),
          toolCallId: result.toolCallId,
          toolName: result.name,
          isError: result.status === "error" ? true : undefined,
        });
      }

      this.logger.debug("Tool round complete, continuing", {
        round,
        toolCalls: outcome.calls.length,
        totalToolCalls: this.toolCallCount,
      });
    }
  }

  /**
   * Consume one model round. Text is forwarded until the first tool call;
   * after that the round only collects further calls.
   */
  private async streamRound(
    conversation: Message[],
    catalogue: ToolCatalogue,
    signal: AbortSignal,
  ): Promise<RoundOutcome> {
    const { modelEventTimeoutMs } = this.limits;
    const tools = catalogue.size > 0 ? catalogue.definitions : undefined;
    const iterator = this.deps.provider
      .streamTurn([...conversation], { signal, tools })
      [Symbol.asyncIterator]();

    let text = "";
    const calls: ToolCall[] = [];
    let finished = false;

    try {
      for (;;) {
        const next = await raceAbort(
          withTimeout(
            iterator.next(),
            modelEventTimeoutMs,
            () => new TurnTimeoutError(`No model output for ${modelEventTimeoutMs}ms`),
          ),
          signal,
        );

        if (next.done) {
          finished = true;
          throw new ProviderError(`${this.deps.provider.name} stream ended without completing the turn`);
        }

        const event = next.value;
        switch (event.type) {
          case "text_delta":
            if (calls.length > 0 || event.text.length === 0) break;
            if (this.current !== "streaming_text") this.transition("streaming_text");
            text += event.text;
            this.send({
              request_id: this.requestId,
              status: "chunk",
              chunk: { type: "text", data: event.text },
            });
            break;

          case "tool_call":
            if (calls.length === 0) this.transition("awaiting_tools");
            calls.push(event.toolCall);
            break;

          case "turn_complete":
            finished = true;
            return { type: "complete", text, calls };

          case "turn_error":
            finished = true;
            return {
              type: "error",
              kind: ERROR_KINDS.find((k) => k === event.kind) ?? "ProviderError",
              message: event.message,
            };
        }
      }
    } finally {
      if (!finished) {
        // Abandon the stream so the provider drops its upstream request
        iterator.return?.().catch((e: unknown) => {
          this.logger.debug("Model stream close failed", { error: errorMessage(e) });
        });
      }
    }
  }

  private async runToolBatch(
    calls: ToolCall[],
    catalogue: ToolCatalogue,
    signal: AbortSignal,
  ): Promise<ToolResult[]> {
    for (const call of calls) {
      this.send({
        request_id: this.requestId,
        status: "tool_call",
        tool_call: { call_id: call.id, name: call.name, arguments: call.args },
      });
    }

    // Results come back in request order, whichever call finishes first
    const results = await Promise.all(calls.map((call) => this.executeTool(call, catalogue, signal)));
    signal.throwIfAborted();

    for (const result of results) {
      this.send({
        request_id: this.requestId,
        status: "chunk",
        chunk: {
          type: "data",
          data: { call_id: result.toolCallId, status: result.status, content: result.content },
        },
      });
    }
    return results;
  }

  private async executeTool(
    call: ToolCall,
    catalogue: ToolCatalogue,
    signal: AbortSignal,
  ): Promise<ToolResult> {
    this.logger.info("Executing tool", { tool: call.name, toolCallId: call.id, args: call.args });
    this.deps.eventBus?.emit("tool:calling", { requestId: this.requestId, toolCall: call });

    const toolStart = Date.now();
    let result: ToolResult;

    try {
      result = await catalogue.dispatch(call, { signal });
    } catch (e) {
      if (signal.aborted) throw e;
      this.logger.warn("Tool call failed", {
        tool: call.name,
        toolCallId: call.id,
        error: errorMessage(e),
      });
      result = {
        toolCallId: call.id,
        name: call.name,
        status: "error",
        content: `Error: ${errorMessage(e)}`,
      };
    }

    this.toolCallCount++;
    this.deps.eventBus?.emit("tool:result", {
      requestId: this.requestId,
      toolResult: result,
      durationMs: Date.now() - toolStart,
    });

    this.logger.debug("Tool result", {
      tool: call.name,
      toolCallId: call.id,
      status: result.status,
      contentLength: result.content.length,
      contentPreview: result.content.slice(0, 200),
    });

    return result;
  }

  private classify(e: unknown): ErrorKind {
    if (e instanceof TurnTimeoutError) return "Timeout";
    if (e instanceof ToolLoopLimitError) return "ToolLoopLimitExceeded";
    if (e instanceof ProviderError) return "ProviderError";
    if (e instanceof ValidationError) return "ValidationError";
    return "InternalError";
  }

  private fail(kind: ErrorKind, message: string): void {
    if (this.isTerminal) return;
    this.send({ request_id: this.requestId, status: "error", error: { kind, message } });
    this.transition("failed");
    this.logger.warn("Turn failed", { kind, error: message });
    this.deps.eventBus?.emit("turn:failed", { requestId: this.requestId, kind, message });
  }

  private send(event: ServerEvent): void {
    if (this.isTerminal) return;
    this.sink(event);
  }

  private transition(next: TurnState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Invalid turn transition: ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }

  private release(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error("Turn released"));
    }
  }
}
