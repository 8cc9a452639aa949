// ToolRegistry: aggregates tool sources into one namespace, dispatches tool calls

import type {
  LocalTool,
  Logger,
  ToolCall,
  ToolDefinition,
  ToolInvokeOptions,
  ToolResult,
  ToolSource,
} from "./types";
import {
  AuthError,
  TidechatError,
  ToolExecutionError,
  ToolNotFoundError,
  ToolTimeoutError,
  errorMessage,
} from "./types";
import { linkAbort, raceAbort } from "./deadline";

const DEFAULT_MAX_RESULT_CHARS = 50_000;
const DEFAULT_CALL_TIMEOUT_MS = 30_000;

function generateId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).slice(2, 9)}`;
}

export interface ToolRegistryOptions {
  readonly logger: Logger;
  readonly maxResultChars?: number;
  /** Upper bound for a single dispatch, on top of any transport timeout. */
  readonly callTimeoutMs?: number;
}

interface Route {
  readonly definition: ToolDefinition;
  readonly source: ToolSource;
}

/**
 * In-process tools, exposed to the registry as one more source.
 */
class LocalToolSource implements ToolSource {
  readonly name = "local";
  readonly kind = "in-process" as const;
  private tools = new Map<string, LocalTool>();

  add(tool: LocalTool): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool "${tool.name}" is already registered`);
    }
    this.tools.set(tool.name, tool);
  }

  get size(): number {
    return this.tools.size;
  }

  async listTools(): Promise<ToolDefinition[]> {
    return Array.from(this.tools.values()).map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: t.inputSchema,
    }));
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    options?: ToolInvokeOptions,
  ): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) throw new ToolNotFoundError(name);

    let content: string;
    try {
      content = await tool.invoke(args, { signal: options?.signal });
    } catch (e) {
      if (e instanceof TidechatError) throw e;
      throw new ToolExecutionError(`Error executing "${name}": ${errorMessage(e)}`, e);
    }

    return { toolCallId: options?.callId ?? generateId(), name, status: "ok", content };
  }
}

function missingRequired(schema: Record<string, unknown>, args: Record<string, unknown>): string[] {
  const required = schema.required;
  if (!Array.isArray(required)) return [];
  return required.filter(
    (key): key is string => typeof key === "string" && args[key] === undefined,
  );
}

/**
 * The tools visible to one turn: a snapshot taken by ToolRegistry.listAll().
 * Routing never changes for the lifetime of the catalogue, so a turn sees the
 * same namespace in every round even if tool servers change underneath it.
 */
export class ToolCatalogue {
  readonly definitions: ToolDefinition[];
  private readonly unavailable = new Map<string, string>();

  constructor(
    private readonly routes: ReadonlyMap<string, Route>,
    private readonly options: { maxResultChars: number; callTimeoutMs: number; logger: Logger },
  ) {
    this.definitions = Array.from(routes.values()).map((r) => r.definition);
  }

  has(name: string): boolean {
    return this.routes.has(name);
  }

  get size(): number {
    return this.routes.size;
  }

  /**
   * Route a call to the source that owns the tool.
   * Throws ToolNotFoundError (without contacting any source), AuthError,
   * ToolExecutionError, ToolTimeoutError or TransportError.
   */
  async dispatch(call: ToolCall, options?: { signal?: AbortSignal }): Promise<ToolResult> {
    const route = this.routes.get(call.name);
    if (!route) {
      const available = Array.from(this.routes.keys()).join(", ") || "none";
      throw new ToolNotFoundError(
        call.name,
        `Unknown tool "${call.name}". Available tools: ${available}`,
      );
    }

    const blocked = this.unavailable.get(route.source.name);
    if (blocked) {
      throw new AuthError(`Tool "${call.name}" is unavailable: ${blocked}`);
    }

    const missing = missingRequired(route.definition.inputSchema, call.args);
    if (missing.length > 0) {
      throw new ToolExecutionError(
        `Missing required argument(s) for "${call.name}": ${missing.join(", ")}`,
      );
    }

    const { callTimeoutMs, maxResultChars } = this.options;
    const link = linkAbort(
      options?.signal,
      callTimeoutMs,
      () => new ToolTimeoutError(call.name, callTimeoutMs),
    );

    try {
      const result = await raceAbort(
        route.source.callTool(call.name, call.args, { signal: link.signal, callId: call.id }),
        link.signal,
      );

      let content = result.content;
      if (content.length > maxResultChars) {
        content = content.slice(0, maxResultChars) + "\n[truncated]";
      }
      return { toolCallId: call.id, name: call.name, status: result.status, content };
    } catch (e) {
      if (e instanceof AuthError) {
        this.unavailable.set(route.source.name, e.message);
        this.options.logger.warn("Tool source marked unavailable for this turn", {
          source: route.source.name,
          tool: call.name,
          error: e.message,
        });
      }
      throw e;
    } finally {
      link.dispose();
    }
  }
}

/**
 * Holds every tool source registered at startup: tool-server transports and
 * in-process tools. Sources are consulted in registration order, and on a name
 * collision the first registration wins.
 */
export class ToolRegistry {
  private readonly sources: ToolSource[] = [];
  private readonly localTools = new LocalToolSource();
  private readonly logger: Logger;
  private readonly maxResultChars: number;
  private readonly callTimeoutMs: number;

  constructor(options: ToolRegistryOptions) {
    this.logger = options.logger.child({ component: "ToolRegistry" });
    this.maxResultChars = options.maxResultChars ?? DEFAULT_MAX_RESULT_CHARS;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  }

  /**
   * Register an in-process tool.
   */
  register(tool: LocalTool): void {
    this.localTools.add(tool);
    if (!this.sources.includes(this.localTools)) {
      this.sources.push(this.localTools);
    }
    this.logger.debug("Local tool registered", { tool: tool.name });
  }

  /**
   * Register a tool-server transport.
   */
  addTransport(source: ToolSource): void {
    if (this.sources.some((s) => s.name === source.name)) {
      throw new Error(`Tool source "${source.name}" is already registered`);
    }
    this.sources.push(source);
  }

  /** Registered remote transports, in registration order. */
  get transports(): ToolSource[] {
    return this.sources.filter((s) => s !== this.localTools);
  }

  /**
   * List tools from every source and merge them into a fresh catalogue.
   * A source that fails to list is skipped with a warning; its tools are
   * simply absent from this turn.
   */
  async listAll(): Promise<ToolCatalogue> {
    const listings = await Promise.all(
      this.sources.map(async (source): Promise<{ source: ToolSource; tools: ToolDefinition[] }> => {
        try {
          return { source, tools: await source.listTools() };
        } catch (e) {
          this.logger.warn("Failed to list tools, source unavailable for this turn", {
            source: source.name,
            error: errorMessage(e),
          });
          return { source, tools: [] };
        }
      }),
    );

    const routes = new Map<string, Route>();
    for (const { source, tools } of listings) {
      for (const definition of tools) {
        const existing = routes.get(definition.name);
        if (existing) {
          this.logger.warn("Tool name collision, keeping first registration", {
            tool: definition.name,
            kept: existing.source.name,
            ignored: source.name,
          });
          continue;
        }
        routes.set(definition.name, { definition, source });
      }
    }

    return new ToolCatalogue(routes, {
      maxResultChars: this.maxResultChars,
      callTimeoutMs: this.callTimeoutMs,
      logger: this.logger,
    });
  }
}
