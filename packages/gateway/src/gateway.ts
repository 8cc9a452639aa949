// Gateway: composition root that wires all dependencies and manages lifecycle

import { createServer, STATUS_CODES, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import type { Duplex } from "node:stream";
import { WebSocketServer } from "ws";
import {
  type EventBus,
  type Lifecycle,
  type LifecycleStatus,
  type LocalTool,
  type Logger,
  type Provider,
  ConsoleLogger,
  PRODUCT_NAME,
  SimpleEventBus,
  ToolRegistry,
  VERSION,
  errorMessage,
  withTimeout,
} from "@tidechat/core";
import { type TidechatConfig, loadConfig, redactConfig } from "@tidechat/config";
import { StreamableHttpTransport } from "@tidechat/mcp";
import { OpenAICompatibleProvider } from "@tidechat/provider-openai-compat";
import { SessionManager } from "./session-manager";
import { createWsHandler } from "./ws-handler";

/** How long stop() waits for clients to finish the close handshake. */
const CLOSE_GRACE_MS = 2_000;

export interface GatewayDeps {
  readonly config: TidechatConfig;
  readonly logger: Logger;
  readonly eventBus: EventBus;
  readonly provider: Provider;
  readonly toolRegistry: ToolRegistry;
  readonly transports: readonly StreamableHttpTransport[];
  readonly sessions: SessionManager;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "content-type": "application/json; charset=utf-8",
    "content-length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

function rejectUpgrade(socket: Duplex, status: number): void {
  socket.end(`HTTP/1.1 ${status} ${STATUS_CODES[status] ?? ""}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
}

export class Gateway implements Lifecycle {
  private _status: LifecycleStatus = "stopped";
  private server: Server | null = null;
  private wss: WebSocketServer | null = null;
  private readonly logger: Logger;

  readonly deps: GatewayDeps;

  constructor(deps: GatewayDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: "Gateway" });
  }

  get status(): LifecycleStatus {
    return this._status;
  }

  /** The bound address once running. Useful when the configured port is 0. */
  get address(): AddressInfo | null {
    const address = this.server?.address();
    return address && typeof address === "object" ? address : null;
  }

  async start(): Promise<void> {
    if (this._status === "running" || this._status === "starting") return;
    this._status = "starting";

    const { config, sessions } = this.deps;
    const wsHandler = createWsHandler({ logger: this.deps.logger, sessions });

    const wss = new WebSocketServer({ noServer: true });
    wss.on("connection", (socket, req: IncomingMessage) => {
      const connectionId = wsHandler.open(socket, req.socket.remoteAddress);
      socket.on("message", (data) => wsHandler.message(connectionId, data));
      socket.on("close", (code) => wsHandler.close(connectionId, code));
      socket.on("error", (err) => {
        this.logger.warn("Socket error", { connectionId, error: err.message });
      });
    });

    const server = createServer((req, res) => this.handleRequest(req, res));
    server.on("upgrade", (req: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(wss, req, socket, head);
    });

    try {
      await new Promise<void>((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.server.port, config.server.host, () => {
          server.off("error", reject);
          resolve();
        });
      });
    } catch (e) {
      this._status = "stopped";
      throw e;
    }

    this.server = server;
    this.wss = wss;
    this._status = "running";

    await this.connectToolServers();

    this.logger.info("Gateway started", {
      host: config.server.host,
      port: this.address?.port ?? config.server.port,
      path: config.server.path,
      provider: this.deps.provider.name,
      model: config.ai.model,
      toolServers: this.deps.transports.length,
    });
    this.logger.debug("Effective configuration", { config: redactConfig(config) });
  }

  async stop(): Promise<void> {
    if (this._status === "stopped" || this._status === "stopping") return;
    this._status = "stopping";

    await this.deps.sessions.closeAll();

    const wss = this.wss;
    if (wss) {
      for (const client of wss.clients) {
        client.close(1001, "Server shutting down");
      }
      try {
        await withTimeout(
          new Promise<void>((resolve) => wss.close(() => resolve())),
          CLOSE_GRACE_MS,
          () => new Error("WebSocket clients did not close in time"),
        );
      } catch (e) {
        this.logger.warn("Terminating remaining WebSocket clients", { error: errorMessage(e) });
        for (const client of wss.clients) client.terminate();
      }
      this.wss = null;
    }

    const server = this.server;
    if (server) {
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
      this.server = null;
    }

    await Promise.all(this.deps.transports.map((transport) => transport.close()));

    this.logger.info("Gateway stopped");
    this._status = "stopped";
  }

  /**
   * Handshake with every tool server up front. A server that is down now is
   * retried when the next turn lists tools.
   */
  private async connectToolServers(): Promise<void> {
    await Promise.all(
      this.deps.transports.map(async (transport) => {
        try {
          await transport.initialize();
          if (transport.initialized) {
            this.logger.info("Tool server connected", {
              server: transport.name,
              protocolVersion: transport.protocolVersion,
            });
          }
        } catch (e) {
          this.logger.warn("Tool server unavailable, will retry on the next turn", {
            server: transport.name,
            error: errorMessage(e),
          });
        }
      }),
    );
  }

  private handleUpgrade(wss: WebSocketServer, req: IncomingMessage, socket: Duplex, head: Buffer): void {
    const { server } = this.deps.config;
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    if (pathname !== server.path) {
      rejectUpgrade(socket, 404);
      return;
    }

    // Browsers always send Origin; other clients may omit it
    const origin = req.headers.origin;
    if (origin && server.allowedOrigins.length > 0 && !server.allowedOrigins.includes(origin)) {
      this.logger.warn("WebSocket upgrade from disallowed origin", { origin });
      rejectUpgrade(socket, 403);
      return;
    }

    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    if (pathname !== "/" && pathname !== "/health") {
      sendJson(res, 404, { error: "Not found" });
      return;
    }

    if (req.method !== "GET") {
      res.setHeader("allow", "GET");
      sendJson(res, 405, { error: "Method not allowed" });
      return;
    }

    if (pathname === "/") {
      sendJson(res, 200, { name: PRODUCT_NAME, version: VERSION, status: this._status });
      return;
    }

    const { sessions, transports } = this.deps;
    sendJson(res, 200, {
      status: "ok",
      connections: sessions.size,
      activeTurns: sessions.activeTurns,
      toolServers: transports.map((transport) => ({
        name: transport.name,
        connected: transport.initialized,
      })),
    });
  }
}

export interface GatewayOverrides {
  readonly config?: TidechatConfig;
  readonly provider?: Provider;
  readonly logger?: Logger;
  /** In-process tools registered ahead of every tool server. */
  readonly tools?: readonly LocalTool[];
}

/**
 * Create a fully-wired Gateway from config. Anything in `overrides` replaces
 * what would otherwise be built from config.
 */
export async function createGateway(overrides: GatewayOverrides = {}): Promise<Gateway> {
  let config = overrides.config;
  if (!config) {
    const loaded = await loadConfig({ env: process.env });
    if (!loaded.ok) throw loaded.error;
    config = loaded.value.config;
  }

  const logger = overrides.logger ?? new ConsoleLogger({ level: config.logLevel, context: { service: PRODUCT_NAME } });
  const eventBus = new SimpleEventBus(logger);
  const { ai, limits } = config;

  const provider =
    overrides.provider ??
    new OpenAICompatibleProvider({
      name: "openai",
      baseUrl: ai.baseUrl,
      model: ai.model,
      apiKey: ai.apiKey ?? undefined,
      temperature: ai.temperature,
      maxTokens: ai.maxTokens,
      topP: ai.topP,
    });

  const toolRegistry = new ToolRegistry({
    logger,
    maxResultChars: limits.maxResultChars,
    callTimeoutMs: limits.toolCallTimeoutMs,
  });

  for (const tool of overrides.tools ?? []) {
    toolRegistry.register(tool);
  }

  const transports: StreamableHttpTransport[] = [];
  if (config.mcp.enabled) {
    for (const server of config.mcp.servers) {
      const transport = new StreamableHttpTransport({
        name: server.name,
        url: server.url,
        logger,
        timeoutMs: server.timeoutMs ?? limits.toolCallTimeoutMs,
        handshakeTimeoutMs: limits.handshakeTimeoutMs,
        authToken: server.authToken ?? undefined,
        localOnly: server.localOnly,
      });
      toolRegistry.addTransport(transport);
      transports.push(transport);
    }
  }

  const sessions = new SessionManager({
    logger,
    turn: {
      provider,
      toolRegistry,
      eventBus,
      systemPrompt: ai.systemPrompt ?? undefined,
      limits: {
        maxToolRounds: limits.maxToolRounds,
        turnTimeoutMs: limits.turnTimeoutMs,
        modelEventTimeoutMs: limits.modelEventTimeoutMs,
      },
    },
  });

  return new Gateway({ config, logger, eventBus, provider, toolRegistry, transports, sessions });
}
