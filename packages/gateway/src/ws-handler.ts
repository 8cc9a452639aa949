// WebSocket handler: bridges client sockets to the SessionManager

import { WebSocket, type RawData } from "ws";
import type { Logger, ServerEvent } from "@tidechat/core";
import { errorMessage } from "@tidechat/core";
import type { SessionManager } from "./session-manager";

export interface WsHandlerDeps {
  readonly logger: Logger;
  readonly sessions: SessionManager;
}

/** The part of a `ws` socket the handler writes to. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
}

function send(socket: ClientSocket, event: ServerEvent): void {
  // Events for a socket that is already closing are dropped
  if (socket.readyState !== WebSocket.OPEN) return;
  socket.send(JSON.stringify(event));
}

function decode(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * Create the WebSocket handlers. The gateway calls `open` once per upgraded
 * socket and routes that socket's frames and close through the returned id.
 */
export function createWsHandler(deps: WsHandlerDeps) {
  const { sessions } = deps;
  const log = deps.logger.child({ component: "WebSocket" });

  return {
    open(socket: ClientSocket, remoteAddress?: string): string {
      const connectionId = sessions.open((event) => send(socket, event));
      log.debug("Client connected", { connectionId, remoteAddress });
      return connectionId;
    },

    message(connectionId: string, data: RawData): void {
      sessions.handleMessage(connectionId, decode(data)).catch((err: unknown) => {
        log.error("Handler error", { connectionId, error: errorMessage(err) });
      });
    },

    close(connectionId: string, code: number): void {
      sessions.close(connectionId);
      log.debug("Client disconnected", { connectionId, code });
    },
  };
}

export type WsHandler = ReturnType<typeof createWsHandler>;
