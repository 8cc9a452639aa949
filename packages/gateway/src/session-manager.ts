// SessionManager: live client connections, at most one in-flight turn each

import { z } from "zod";
import type { ClientRequest, ErrorKind, EventSink, Logger, TurnDeps, TurnState } from "@tidechat/core";
import { TurnOrchestrator, errorMessage } from "@tidechat/core";

function generateId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}

const ClientRequestSchema = z.object({
  request_id: z.string().min(1, "request_id must be a non-empty string"),
  action: z.literal("chat", {
    errorMap: () => ({ message: 'Unknown action, expected "chat"' }),
  }),
  payload: z.object({
    text: z.string().min(1, "text must be a non-empty string"),
  }),
});

interface Connection {
  readonly id: string;
  readonly send: EventSink;
  readonly connectedAt: number;
  /** Every request_id accepted on this connection. */
  readonly requestIds: Set<string>;
  turn: TurnOrchestrator | null;
  closed: boolean;
}

type Parsed =
  | { readonly ok: true; readonly request: ClientRequest }
  | { readonly ok: false; readonly requestId: string | null; readonly message: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode one inbound frame. The request id is echoed back on failure
 * whenever the frame carried a usable one.
 */
export function parseClientRequest(raw: string): Parsed {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { ok: false, requestId: null, message: "Message is not valid JSON" };
  }

  if (!isRecord(parsed)) {
    return { ok: false, requestId: null, message: "Message must be a JSON object" };
  }

  const result = ClientRequestSchema.safeParse(parsed);
  if (!result.success) {
    const requestId =
      typeof parsed.request_id === "string" && parsed.request_id.length > 0 ? parsed.request_id : null;
    const message = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    return { ok: false, requestId, message };
  }

  return { ok: true, request: result.data };
}

export interface SessionManagerDeps {
  readonly logger: Logger;
  /** Shared by every turn this manager starts. */
  readonly turn: Omit<TurnDeps, "logger">;
}

/**
 * Owns every client connection. Each connection runs its turns strictly one
 * at a time: a request that arrives while a turn is active is refused with
 * `Busy`, never queued.
 */
export class SessionManager {
  private readonly connections = new Map<string, Connection>();
  private readonly running = new Set<Promise<TurnState>>();
  private readonly logger: Logger;

  constructor(private readonly deps: SessionManagerDeps) {
    this.logger = deps.logger.child({ component: "SessionManager" });
  }

  /** Register a connection. Events for it are delivered through `send`. */
  open(send: EventSink): string {
    const id = generateId();
    this.connections.set(id, {
      id,
      send,
      connectedAt: Date.now(),
      requestIds: new Set(),
      turn: null,
      closed: false,
    });
    this.logger.debug("Connection opened", { connectionId: id, connections: this.connections.size });
    return id;
  }

  /**
   * Handle one inbound frame. Resolves once the turn it started (if any)
   * has reached a terminal state.
   */
  async handleMessage(connectionId: string, raw: string): Promise<void> {
    const conn = this.connections.get(connectionId);
    if (!conn || conn.closed) {
      this.logger.warn("Message for unknown connection dropped", { connectionId });
      return;
    }

    const parsed = parseClientRequest(raw);
    if (!parsed.ok) {
      this.logger.debug("Rejected malformed request", { connectionId, error: parsed.message });
      this.reject(conn, parsed.requestId, "ValidationError", parsed.message);
      return;
    }

    const { request_id: requestId, payload } = parsed.request;

    if (conn.requestIds.has(requestId)) {
      this.reject(conn, requestId, "ValidationError", `request_id "${requestId}" was already used on this connection`);
      return;
    }

    if (conn.turn) {
      this.logger.info("Request refused, turn in progress", {
        connectionId,
        requestId,
        activeRequestId: conn.turn.requestId,
      });
      this.reject(conn, requestId, "Busy", `Request "${conn.turn.requestId}" is still in progress`);
      return;
    }

    conn.requestIds.add(requestId);
    const turn = new TurnOrchestrator(
      { ...this.deps.turn, logger: this.logger.child({ connectionId }) },
      requestId,
      (event) => {
        if (!conn.closed) conn.send(event);
      },
    );
    conn.turn = turn;

    const run = turn.run(payload.text);
    this.running.add(run);
    try {
      await run;
    } finally {
      this.running.delete(run);
      if (conn.turn === turn) conn.turn = null;
    }
  }

  /** Drop a connection, cancelling its active turn. */
  close(connectionId: string): void {
    const conn = this.connections.get(connectionId);
    if (!conn) return;

    conn.closed = true;
    conn.turn?.cancel();
    this.connections.delete(connectionId);
    this.logger.debug("Connection closed", {
      connectionId,
      connections: this.connections.size,
      durationMs: Date.now() - conn.connectedAt,
    });
  }

  /** Close every connection and wait for cancelled turns to unwind. */
  async closeAll(): Promise<void> {
    for (const id of [...this.connections.keys()]) {
      this.close(id);
    }
    const results = await Promise.allSettled([...this.running]);
    for (const result of results) {
      if (result.status === "rejected") {
        this.logger.error("Turn failed while shutting down", { error: errorMessage(result.reason) });
      }
    }
  }

  get size(): number {
    return this.connections.size;
  }

  get activeTurns(): number {
    let count = 0;
    for (const conn of this.connections.values()) {
      if (conn.turn) count++;
    }
    return count;
  }

  private reject(conn: Connection, requestId: string | null, kind: ErrorKind, message: string): void {
    conn.send({ request_id: requestId, status: "error", error: { kind, message } });
  }
}
