// StreamableHttpTransport: MCP tool server over streamable HTTP
//
// The SDK client speaks the protocol and keeps the Mcp-Session-Id. This class
// owns what sits around it: one client per session, rebuilt after the
// connection fails, the local-only rule, deadlines, and the mapping of
// failures onto the gateway's error types.

import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";
import { CallToolResultSchema, ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import type { Logger, ToolDefinition, ToolInvokeOptions, ToolResult, ToolSource } from "@tidechat/core";
import {
  AuthError,
  ConfigError,
  PRODUCT_NAME,
  ProtocolError,
  TidechatError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolServerTimeoutError,
  ToolTimeoutError,
  TransportError,
  VERSION,
  abortReason,
  errorMessage,
  linkAbort,
  withTimeout,
} from "@tidechat/core";
import { renderContent } from "./content";
import { isLoopbackHost } from "./loopback";

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_HANDSHAKE_TIMEOUT_MS = 10_000;
const MAX_LIST_PAGES = 50;
const MAX_ERROR_DETAIL = 200;

export interface StreamableHttpTransportOptions {
  readonly name: string;
  /** Endpoint URL. null means no remote tools: listing is empty and never dials. */
  readonly url: string | null;
  readonly logger: Logger;
  /** Per-request timeout for tools/list and tools/call. */
  readonly timeoutMs?: number;
  readonly handshakeTimeoutMs?: number;
  readonly authToken?: string;
  /** Refuse to dial anything but a loopback address, redirects included. */
  readonly localOnly?: boolean;
}

/** One initialized SDK client and the HTTP transport it owns. */
interface Connection {
  readonly client: Client;
  readonly http: StreamableHTTPClientTransport;
}

interface Guard {
  readonly what: string;
  readonly connection: Connection | null;
  readonly signal?: AbortSignal;
  readonly timeoutMs: number;
  readonly onTimeout: () => Error;
  /** Maps an error the server answered with. Defaults to ProtocolError. */
  readonly rejected?: (e: McpError) => Error;
}

function isSchemaError(e: unknown): boolean {
  return e instanceof Error && e.name === "ZodError";
}

export class StreamableHttpTransport implements ToolSource {
  readonly name: string;
  readonly kind = "streamable-http" as const;
  readonly url: string | null;

  private readonly logger: Logger;
  private readonly endpointUrl: URL | null = null;
  private readonly timeoutMs: number;
  private readonly handshakeTimeoutMs: number;
  private readonly authToken: string | undefined;
  private readonly localOnly: boolean;
  private readonly refusal: string | null = null;

  private connection: Connection | null = null;
  private connecting: Promise<Connection> | null = null;
  private callCount = 0;

  constructor(options: StreamableHttpTransportOptions) {
    this.name = options.name;
    this.url = options.url;
    this.logger = options.logger.child({ component: "McpTransport", server: options.name });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.handshakeTimeoutMs = options.handshakeTimeoutMs ?? DEFAULT_HANDSHAKE_TIMEOUT_MS;
    this.authToken = options.authToken || undefined;
    this.localOnly = options.localOnly ?? false;

    if (this.url !== null) {
      let endpoint: URL;
      try {
        endpoint = new URL(this.url);
      } catch (e) {
        throw new ConfigError(`Invalid URL for tool server "${this.name}": ${this.url}`, e);
      }
      this.endpointUrl = endpoint;

      const { hostname } = endpoint;
      if (this.localOnly && !isLoopbackHost(hostname)) {
        this.refusal = `Tool server "${this.name}" is local-only but ${hostname} is not a loopback address`;
        this.logger.warn("Non-loopback URL on a local-only tool server, refusing to dial", {
          url: this.url,
        });
      }
    }
  }

  get sessionId(): string | null {
    return this.connection?.http.sessionId ?? null;
  }

  get protocolVersion(): string | null {
    return this.connection?.http.protocolVersion ?? null;
  }

  get initialized(): boolean {
    return this.connection !== null;
  }

  /**
   * Handshake with the server. No-op once initialized; concurrent callers
   * share one in-flight handshake.
   */
  async initialize(): Promise<void> {
    if (this.url === null) return;
    await this.connect();
  }

  async listTools(): Promise<ToolDefinition[]> {
    if (this.url === null) return [];
    const connection = await this.connect();

    const ms = this.timeoutMs;
    const tools: ToolDefinition[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_LIST_PAGES; page++) {
      const params = cursor ? { cursor } : undefined;
      const result = await this.guarded(
        {
          what: "tools/list",
          connection,
          timeoutMs: ms,
          onTimeout: () => new ToolServerTimeoutError(`tools/list on "${this.name}" timed out after ${ms}ms`, ms),
        },
        (options) => connection.client.listTools(params, options),
      );

      for (const tool of result.tools) {
        tools.push({
          name: tool.name,
          description: tool.description ?? "",
          inputSchema: { ...tool.inputSchema },
        });
      }

      cursor = result.nextCursor;
      if (!cursor) return tools;
    }

    this.logger.warn("tools/list pagination limit reached, using tools listed so far", {
      pages: MAX_LIST_PAGES,
      tools: tools.length,
    });
    return tools;
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    options?: ToolInvokeOptions,
  ): Promise<ToolResult> {
    if (this.url === null) {
      throw new ToolNotFoundError(name, `Tool server "${this.name}" has no endpoint, cannot call "${name}"`);
    }
    const callId = options?.callId ?? `call-${++this.callCount}`;
    const connection = await this.connect();

    const ms = this.timeoutMs;
    const result = await this.guarded(
      {
        what: "tools/call",
        connection,
        signal: options?.signal,
        timeoutMs: ms,
        onTimeout: () => new ToolTimeoutError(name, ms),
        rejected: (e) => this.toolRejected(name, e),
      },
      (requestOptions) =>
        connection.client.request(
          { method: "tools/call", params: { name, arguments: args } },
          CallToolResultSchema,
          requestOptions,
        ),
    );

    const content = renderContent(result.content);
    if (result.isError) {
      throw new ToolExecutionError(`Tool "${name}" reported an error: ${content}`);
    }

    return {
      toolCallId: callId,
      name,
      status: "ok",
      content,
    };
  }

  /**
   * Best-effort session teardown. The connection is forgotten either way.
   */
  async close(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    if (!connection) return;

    const sessionId = connection.http.sessionId ?? null;
    try {
      await withTimeout(
        connection.http.terminateSession(),
        this.handshakeTimeoutMs,
        () => new TransportError(`Session close on "${this.name}" timed out`),
      );
      this.logger.debug("Session closed", { sessionId });
    } catch (e) {
      this.logger.debug("Session close failed", { sessionId, error: errorMessage(e) });
    }

    await this.release(connection);
  }

  // ── Connection ───────────────────────────────────────────────────────

  private connect(): Promise<Connection> {
    if (this.connection) return Promise.resolve(this.connection);
    if (!this.connecting) {
      this.connecting = this.handshake().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async handshake(): Promise<Connection> {
    const url = this.endpoint();
    const http = new StreamableHTTPClientTransport(url, {
      requestInit: this.authToken ? { headers: { Authorization: `Bearer ${this.authToken}` } } : undefined,
      fetch: this.dial,
    });
    const client = new Client({ name: PRODUCT_NAME, version: VERSION }, { capabilities: {} });
    client.onerror = (e) => {
      this.logger.debug("Tool server client error", { error: errorMessage(e) });
    };

    const ms = this.handshakeTimeoutMs;
    await this.guarded(
      {
        what: "initialize",
        connection: null,
        timeoutMs: ms,
        onTimeout: () => new ToolServerTimeoutError(`Handshake with "${this.name}" timed out after ${ms}ms`, ms),
      },
      (options) => client.connect(http, options),
    );

    const connection: Connection = { client, http };
    this.connection = connection;
    this.logger.info("Tool server initialized", {
      sessionId: http.sessionId ?? null,
      protocolVersion: http.protocolVersion,
      serverName: client.getServerVersion()?.name,
    });
    return connection;
  }

  private endpoint(): URL {
    if (this.refusal) throw new TransportError(this.refusal);
    if (this.endpointUrl === null) throw new TransportError(`Tool server "${this.name}" has no endpoint`);
    return this.endpointUrl;
  }

  /** Drop a failed connection, unless another caller already replaced it. */
  private invalidate(failed: Connection): void {
    if (this.connection !== failed) return;
    this.connection = null;
    this.logger.warn("Session invalidated, next call will re-handshake", {
      sessionId: failed.http.sessionId ?? null,
    });
    this.release(failed).catch((e: unknown) => {
      this.logger.debug("Failed to release connection", { error: errorMessage(e) });
    });
  }

  private async release(connection: Connection): Promise<void> {
    try {
      await connection.client.close();
    } catch (e) {
      this.logger.debug("Client close failed", { error: errorMessage(e) });
    }
  }

  // ── Requests ─────────────────────────────────────────────────────────

  /**
   * Run one SDK request under a deadline linked to the caller's signal.
   * A timeout or abort surfaces as the link's reason.
   */
  private async guarded<T>(guard: Guard, work: (options: RequestOptions) => Promise<T>): Promise<T> {
    const link = linkAbort(guard.signal, guard.timeoutMs, guard.onTimeout);
    try {
      return await work({ signal: link.signal, timeout: guard.timeoutMs });
    } catch (e) {
      if (link.signal.aborted) throw abortReason(link.signal);
      if (e instanceof McpError && e.code === ErrorCode.RequestTimeout) throw guard.onTimeout();
      throw this.failure(e, guard);
    } finally {
      link.dispose();
    }
  }

  private failure(e: unknown, guard: Guard): Error {
    const { what, connection } = guard;

    if (e instanceof TransportError || (e instanceof McpError && e.code === ErrorCode.ConnectionClosed)) {
      if (connection) this.invalidate(connection);
      return e instanceof TransportError ? e : new TransportError(`Connection to "${this.name}" closed`, e);
    }
    if (e instanceof TidechatError) return e;
    if (e instanceof McpError) {
      return guard.rejected?.(e) ?? new ProtocolError(`${what} rejected by "${this.name}": ${e.message}`, e);
    }
    if (isSchemaError(e)) {
      return new ProtocolError(`Malformed ${what} result from "${this.name}": ${errorMessage(e)}`, e);
    }
    return new ProtocolError(`${what} failed on "${this.name}": ${errorMessage(e)}`, e);
  }

  private toolRejected(name: string, e: McpError): Error {
    if (
      e.code === ErrorCode.MethodNotFound ||
      (e.code === ErrorCode.InvalidParams && /unknown tool|not found/i.test(e.message))
    ) {
      return new ToolNotFoundError(name, `Tool "${name}" not found on "${this.name}": ${e.message}`);
    }
    return new ToolExecutionError(`Tool "${name}" failed on "${this.name}": ${e.message}`, e);
  }

  // ── HTTP ─────────────────────────────────────────────────────────────

  /**
   * The fetch the SDK transport dials with. A local-only server may not
   * redirect, and HTTP failures on POST become typed errors before the SDK
   * sees them. Other methods (the optional GET stream, session DELETE) pass
   * through for the SDK to judge.
   */
  private readonly dial = async (url: string | URL, init?: RequestInit): Promise<Response> => {
    let response: Response;
    try {
      response = await fetch(url, this.localOnly ? { ...init, redirect: "manual" } : init);
    } catch (e) {
      if (init?.signal?.aborted) throw e;
      throw new TransportError(`Tool server "${this.name}" unreachable: ${errorMessage(e)}`, e);
    }

    if (this.localOnly && response.status >= 300 && response.status < 400) {
      await this.discard(response);
      const location = response.headers.get("location") ?? "an unknown location";
      throw new TransportError(
        `Tool server "${this.name}" redirected to ${location}, refusing to leave a local-only endpoint`,
      );
    }

    if (init?.method !== "POST" || response.ok) return response;

    if (response.status === 401 || response.status === 403) {
      await this.discard(response);
      throw new AuthError(`Tool server "${this.name}" rejected credentials (HTTP ${response.status})`);
    }

    const sessionId = new Headers(init?.headers).get("mcp-session-id");
    if (response.status === 404 && sessionId) {
      await this.discard(response);
      throw new TransportError(`Tool server "${this.name}" no longer knows session ${sessionId}`);
    }

    const detail = await this.readDetail(response);
    throw new TransportError(
      `Tool server "${this.name}" answered HTTP ${response.status}${detail ? `: ${detail}` : ""}`,
    );
  };

  private async readDetail(response: Response): Promise<string> {
    try {
      return (await response.text()).slice(0, MAX_ERROR_DETAIL);
    } catch (e) {
      this.logger.debug("Failed to read error body", { error: errorMessage(e) });
      return "";
    }
  }

  private async discard(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (e) {
      this.logger.debug("Failed to discard response body", { error: errorMessage(e) });
    }
  }
}
