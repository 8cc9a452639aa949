// Test fixture: tool source with scripted behaviour per tool

import type { ToolDefinition, ToolInvokeOptions, ToolResult, ToolSource } from "../types";

export interface FakeToolBehaviour {
  readonly description?: string;
  readonly inputSchema?: Record<string, unknown>;
  readonly delayMs?: number;
  /** Static result, or derived from the arguments. */
  readonly result?: string | ((args: Record<string, unknown>) => string);
  readonly error?: Error;
  /** Never settle unless aborted. */
  readonly hang?: boolean;
}

export interface FakeInvocation {
  readonly name: string;
  readonly args: Record<string, unknown>;
  readonly callId?: string;
}

export class FakeToolSource implements ToolSource {
  readonly kind = "streamable-http" as const;
  readonly invocations: FakeInvocation[] = [];
  /** Calls whose signal aborted before they settled. */
  readonly aborted: string[] = [];
  listCount = 0;
  listError: Error | null = null;

  constructor(
    readonly name: string,
    private readonly tools: Record<string, FakeToolBehaviour>,
  ) {}

  async listTools(): Promise<ToolDefinition[]> {
    this.listCount++;
    if (this.listError) throw this.listError;
    return Object.entries(this.tools).map(([name, b]) => ({
      name,
      description: b.description ?? `${name} tool`,
      inputSchema: b.inputSchema ?? { type: "object", properties: {} },
    }));
  }

  async callTool(
    name: string,
    args: Record<string, unknown>,
    options?: ToolInvokeOptions,
  ): Promise<ToolResult> {
    this.invocations.push({ name, args, callId: options?.callId });
    const behaviour = this.tools[name];
    if (!behaviour) throw new Error(`FakeToolSource has no tool "${name}"`);

    const signal = options?.signal;
    if (behaviour.hang || behaviour.delayMs !== undefined) {
      await new Promise<void>((resolve, reject) => {
        const timer = behaviour.hang ? undefined : setTimeout(resolve, behaviour.delayMs);
        signal?.addEventListener(
          "abort",
          () => {
            clearTimeout(timer);
            this.aborted.push(name);
            reject(new Error(`${name} aborted`));
          },
          { once: true },
        );
      });
    }

    if (behaviour.error) throw behaviour.error;
    const content =
      typeof behaviour.result === "function" ? behaviour.result(args) : (behaviour.result ?? "");
    return { toolCallId: options?.callId ?? "unset", name, status: "ok", content };
  }
}
