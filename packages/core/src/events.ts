// EventBus: typed pub/sub for cross-cutting concerns

import type { ErrorKind, Logger, ToolCall, ToolResult } from "./types";

export interface TidechatEvents {
  "turn:started": { requestId: string; text: string };
  "turn:completed": { requestId: string; rounds: number; toolCalls: number; durationMs: number };
  "turn:failed": { requestId: string; kind: ErrorKind; message: string };
  "turn:cancelled": { requestId: string };
  "tool:calling": { requestId: string; toolCall: ToolCall };
  "tool:result": { requestId: string; toolResult: ToolResult; durationMs: number };
}

export type EventName = keyof TidechatEvents;
export type EventHandler<K extends EventName> = (data: TidechatEvents[K]) => void | Promise<void>;

export interface EventBus {
  /** Fire-and-forget emit. Listener errors are caught and logged, never block the caller. */
  emit<K extends EventName>(event: K, data: TidechatEvents[K]): void;
  on<K extends EventName>(event: K, handler: EventHandler<K>): void;
  off<K extends EventName>(event: K, handler: EventHandler<K>): void;
}

type HandlerMap = { [K in EventName]?: Set<EventHandler<K>> };

export class SimpleEventBus implements EventBus {
  private handlers: HandlerMap = {};
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: "EventBus" });
  }

  emit<K extends EventName>(event: K, data: TidechatEvents[K]): void {
    const handlers: Set<EventHandler<K>> | undefined = this.handlers[event];
    if (!handlers) return;

    for (const handler of handlers) {
      try {
        const result = handler(data);
        if (result instanceof Promise) {
          result.catch((err: unknown) => {
            this.logger.error("Async listener error (fire-and-forget)", {
              event,
              error: String(err),
            });
          });
        }
      } catch (err) {
        this.logger.error("Sync listener error", {
          event,
          error: String(err),
        });
      }
    }
  }

  on<K extends EventName>(event: K, handler: EventHandler<K>): void {
    let handlers: Set<EventHandler<K>> | undefined = this.handlers[event];
    if (!handlers) {
      handlers = new Set();
      const map: { [P in K]?: Set<EventHandler<P>> } = this.handlers;
      map[event] = handlers;
    }
    handlers.add(handler);
  }

  off<K extends EventName>(event: K, handler: EventHandler<K>): void {
    const handlers: Set<EventHandler<K>> | undefined = this.handlers[event];
    handlers?.delete(handler);
  }
}
