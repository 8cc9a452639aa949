// Test fixture: in-process MCP server behind a fetch stand-in

import { vi } from "vitest";

export interface RecordedRequest {
  readonly url: URL;
  readonly httpMethod: string;
  readonly headers: Headers;
  readonly rpcMethod: string | null;
  readonly id: number | string | null;
  readonly params: Record<string, unknown> | undefined;
}

export interface FakeTool {
  readonly name: string;
  readonly description?: string;
  readonly inputSchema?: Record<string, unknown>;
  readonly run: (args: Record<string, unknown>) => string;
}

type Override = (request: RecordedRequest, init: RequestInit | undefined) => Promise<Response> | Response | undefined;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400;
}

export function jsonResponse(body: unknown, headers: Record<string, string> = {}, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

/** An event-stream body delivered in the given chunks. */
export function sseResponse(chunks: string[], headers: Record<string, string> = {}): Response {
  const encoder = new TextEncoder();
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      for (const chunk of chunks) controller.enqueue(encoder.encode(chunk));
      controller.close();
    },
  });
  return new Response(stream, {
    status: 200,
    headers: { "content-type": "text/event-stream", ...headers },
  });
}

export function sseFrame(message: unknown): string {
  return `event: message\ndata: ${JSON.stringify(message)}\n\n`;
}

/** A fetch that never settles until its signal aborts. */
export function hangUntilAborted(init: RequestInit | undefined): Promise<Response> {
  return new Promise((_, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

/**
 * Answers JSON-RPC over POST the way a streamable HTTP server does. The
 * optional GET stream is refused with 405. Redirects are followed unless the
 * request asks for "manual" or "error", as fetch does.
 */
export class FakeMcpServer {
  /** POST and DELETE requests, in order. */
  readonly requests: RecordedRequest[] = [];
  /** Session id issued on each initialize, in order. */
  sessionIds: string[] = ["sess-1"];
  protocolVersion = "2025-03-26";
  tools: FakeTool[] = [];
  /** Answer requests as text/event-stream instead of JSON. */
  streaming = false;
  override: Override | null = null;
  streamOpens = 0;
  private handshakes = 0;

  readonly fetch = vi.fn<typeof fetch>(async (input, init) => this.handle(this.urlOf(input), init));

  /** Requests with the given JSON-RPC method, in order. */
  calls(rpcMethod: string): RecordedRequest[] {
    return this.requests.filter((r) => r.rpcMethod === rpcMethod);
  }

  /** Requests that reached the given host. */
  hits(host: string): RecordedRequest[] {
    return this.requests.filter((r) => r.url.host === host);
  }

  private urlOf(input: string | URL | Request): URL {
    if (input instanceof URL) return input;
    return new URL(typeof input === "string" ? input : input.url);
  }

  private async handle(url: URL, init: RequestInit | undefined): Promise<Response> {
    const httpMethod = init?.method ?? "GET";
    if (httpMethod === "GET") {
      this.streamOpens++;
      return new Response(null, { status: 405 });
    }

    const raw: unknown = typeof init?.body === "string" ? JSON.parse(init.body) : null;
    const body = isRecord(raw) ? raw : {};
    const id = typeof body.id === "number" || typeof body.id === "string" ? body.id : null;
    const request: RecordedRequest = {
      url,
      httpMethod,
      headers: new Headers(init?.headers),
      rpcMethod: typeof body.method === "string" ? body.method : null,
      id,
      params: isRecord(body.params) ? body.params : undefined,
    };
    this.requests.push(request);

    const response = (await this.override?.(request, init)) ?? this.route(request);

    const location = response.headers.get("location");
    if (isRedirect(response.status) && location) {
      if (init?.redirect === "error") throw new TypeError("fetch failed");
      if (init?.redirect !== "manual") return this.handle(new URL(location, url), init);
    }
    return response;
  }

  private route(request: RecordedRequest): Response {
    const { id } = request;
    if (request.httpMethod === "DELETE") return new Response(null, { status: 200 });
    if (id === null) return new Response(null, { status: 202 });

    switch (request.rpcMethod) {
      case "initialize": {
        const sessionId = this.sessionIds[Math.min(this.handshakes, this.sessionIds.length - 1)];
        this.handshakes++;
        return this.reply(
          id,
          {
            protocolVersion: this.protocolVersion,
            capabilities: { tools: {} },
            serverInfo: { name: "fake", version: "1.0.0" },
          },
          { "Mcp-Session-Id": sessionId },
        );
      }
      case "tools/list":
        return this.reply(id, {
          tools: this.tools.map(({ name, description, inputSchema }) => ({ name, description, inputSchema })),
        });
      case "tools/call": {
        const name = request.params?.name;
        const tool = this.tools.find((t) => t.name === name);
        if (!tool) {
          return jsonResponse({
            jsonrpc: "2.0",
            id,
            error: { code: -32602, message: `Unknown tool: ${String(name)}` },
          });
        }
        const rawArgs = request.params?.arguments;
        const args = isRecord(rawArgs) ? rawArgs : {};
        return this.reply(id, { content: [{ type: "text", text: tool.run(args) }] });
      }
      default:
        return jsonResponse({ jsonrpc: "2.0", id, error: { code: -32601, message: "Method not found" } });
    }
  }

  private reply(id: number | string, result: unknown, headers: Record<string, string> = {}): Response {
    const message = { jsonrpc: "2.0", id, result };
    if (!this.streaming) return jsonResponse(message, headers);
    return sseResponse(
      [sseFrame({ jsonrpc: "2.0", method: "notifications/message", params: { level: "info", data: "working" } }), sseFrame(message)],
      headers,
    );
  }
}
