// Client-facing WebSocket protocol

export type ClientAction = "chat";

export interface ClientRequest {
  readonly request_id: string;
  readonly action: ClientAction;
  readonly payload: { readonly text: string };
}

/** Error kinds a client can branch on. */
export type ErrorKind =
  | "ValidationError"
  | "Busy"
  | "ProviderError"
  | "ToolLoopLimitExceeded"
  | "Timeout"
  | "InternalError";

export type ChunkPayload =
  | { readonly type: "text"; readonly data: string; readonly metadata?: Record<string, unknown> }
  | { readonly type: "data"; readonly data: unknown; readonly metadata?: Record<string, unknown> };

export type ServerEvent =
  | {
      readonly request_id: string;
      readonly status: "processing";
      readonly chunk: { readonly metadata: Record<string, unknown> };
    }
  | { readonly request_id: string; readonly status: "chunk"; readonly chunk: ChunkPayload }
  | {
      readonly request_id: string;
      readonly status: "tool_call";
      readonly tool_call: {
        readonly call_id: string;
        readonly name: string;
        readonly arguments: Record<string, unknown>;
      };
    }
  | { readonly request_id: string; readonly status: "complete" }
  | {
      // null only when the inbound frame was too malformed to carry an id
      readonly request_id: string | null;
      readonly status: "error";
      readonly error: { readonly kind: ErrorKind; readonly message: string };
    };

export type ServerEventStatus = ServerEvent["status"];
