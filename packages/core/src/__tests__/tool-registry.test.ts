import { describe, test, expect } from "vitest";
import { ToolRegistry } from "../tool-registry";
import type { LocalTool } from "../types";
import { AuthError, ToolExecutionError, ToolNotFoundError, ToolTimeoutError } from "../types";
import { FakeToolSource } from "../__fixtures__/mock-tools";
import { RecordingLogger } from "../__fixtures__/recording-logger";

function makeTool(
  name: string,
  invoke: LocalTool["invoke"],
  inputSchema: Record<string, unknown> = { type: "object", properties: {} },
): LocalTool {
  return { name, description: `${name} tool`, inputSchema, invoke };
}

function makeRegistry(options: { maxResultChars?: number; callTimeoutMs?: number } = {}) {
  const logger = new RecordingLogger();
  return { reg: new ToolRegistry({ logger, ...options }), logger };
}

describe("ToolRegistry", () => {
  describe("register / addTransport", () => {
    test("lists a registered local tool", async () => {
      const { reg } = makeRegistry();
      reg.register(makeTool("alpha", async () => "ok"));

      const catalogue = await reg.listAll();
      expect(catalogue.has("alpha")).toBe(true);
      expect(catalogue.has("beta")).toBe(false);
      expect(catalogue.size).toBe(1);
      const result = await catalogue.dispatch({ id: "c1", name: "alpha", args: {} });
      expect(result).toEqual({ toolCallId: "c1", name: "alpha", status: "ok", content: "ok" });
    });

    test("throws on duplicate local registration", () => {
      const { reg } = makeRegistry();
      reg.register(makeTool("dup", async () => ""));
      expect(() => reg.register(makeTool("dup", async () => ""))).toThrow(
        'Tool "dup" is already registered',
      );
    });

    test("throws on duplicate transport name", () => {
      const { reg } = makeRegistry();
      reg.addTransport(new FakeToolSource("search", {}));
      expect(() => reg.addTransport(new FakeToolSource("search", {}))).toThrow(
        'Tool source "search" is already registered',
      );
    });

    test("transports excludes the local tool set", () => {
      const { reg } = makeRegistry();
      reg.register(makeTool("alpha", async () => ""));
      const remote = new FakeToolSource("remote", {});
      reg.addTransport(remote);

      expect(reg.transports).toEqual([remote]);
    });
  });

  describe("listAll", () => {
    test("merges sources in registration order", async () => {
      const { reg } = makeRegistry();
      reg.addTransport(new FakeToolSource("one", { a: {}, b: {} }));
      reg.addTransport(new FakeToolSource("two", { c: {} }));

      const catalogue = await reg.listAll();
      expect(catalogue.definitions.map((d) => d.name)).toEqual(["a", "b", "c"]);
    });

    test("keeps the first registration on a name collision and warns", async () => {
      const { reg, logger } = makeRegistry();
      const first = new FakeToolSource("first", { search: { result: "from first" } });
      const second = new FakeToolSource("second", { search: { result: "from second" } });
      reg.addTransport(first);
      reg.addTransport(second);

      const catalogue = await reg.listAll();
      expect(catalogue.size).toBe(1);

      const warning = logger.at("warn").find((e) => e.message.includes("collision"));
      expect(warning?.data).toMatchObject({ tool: "search", kept: "first", ignored: "second" });

      const result = await catalogue.dispatch({ id: "c1", name: "search", args: {} });
      expect(result.content).toBe("from first");
      expect(second.invocations).toHaveLength(0);
    });

    test("skips a source that fails to list", async () => {
      const { reg, logger } = makeRegistry();
      const broken = new FakeToolSource("broken", { x: {} });
      broken.listError = new Error("connection refused");
      reg.addTransport(broken);
      reg.addTransport(new FakeToolSource("healthy", { y: {} }));

      const catalogue = await reg.listAll();
      expect(catalogue.definitions.map((d) => d.name)).toEqual(["y"]);
      expect(logger.at("warn")[0].data).toMatchObject({
        source: "broken",
        error: "connection refused",
      });
    });

    test("lists every source again on each call", async () => {
      const { reg } = makeRegistry();
      const source = new FakeToolSource("s", { a: {} });
      reg.addTransport(source);

      await reg.listAll();
      await reg.listAll();
      expect(source.listCount).toBe(2);
    });

    test("returns an empty catalogue with no sources", async () => {
      const { reg } = makeRegistry();
      const catalogue = await reg.listAll();
      expect(catalogue.size).toBe(0);
      expect(catalogue.definitions).toEqual([]);
    });
  });

  describe("dispatch", () => {
    test("routes a call and keeps the call id", async () => {
      const { reg } = makeRegistry();
      reg.register(makeTool("greet", async (args) => `Hello ${String(args.name)}`));

      const catalogue = await reg.listAll();
      const result = await catalogue.dispatch({ id: "call-1", name: "greet", args: { name: "World" } });

      expect(result).toEqual({
        toolCallId: "call-1",
        name: "greet",
        status: "ok",
        content: "Hello World",
      });
    });

    test("passes the call id through to a remote source", async () => {
      const { reg } = makeRegistry();
      const remote = new FakeToolSource("remote", { echo: { result: "pong" } });
      reg.addTransport(remote);

      const catalogue = await reg.listAll();
      await catalogue.dispatch({ id: "call-9", name: "echo", args: { v: 1 } });
      expect(remote.invocations).toEqual([{ name: "echo", args: { v: 1 }, callId: "call-9" }]);
    });

    test("fails an unknown tool without contacting any source", async () => {
      const { reg } = makeRegistry();
      const remote = new FakeToolSource("remote", { known: {} });
      reg.addTransport(remote);

      const catalogue = await reg.listAll();
      const attempt = catalogue.dispatch({ id: "call-2", name: "unknown_tool", args: {} });

      await expect(attempt).rejects.toBeInstanceOf(ToolNotFoundError);
      await expect(attempt).rejects.toThrow('Unknown tool "unknown_tool". Available tools: known');
      expect(remote.invocations).toHaveLength(0);
    });

    test("an earlier catalogue keeps its routes after a later listing loses a source", async () => {
      const { reg } = makeRegistry();
      const remote = new FakeToolSource("remote", { lookup: { result: "found" } });
      reg.addTransport(remote);

      const first = await reg.listAll();
      remote.listError = new Error("connection refused");
      const second = await reg.listAll();

      expect(second.has("lookup")).toBe(false);
      const result = await first.dispatch({ id: "c1", name: "lookup", args: {} });
      expect(result.content).toBe("found");
      await expect(second.dispatch({ id: "c2", name: "lookup", args: {} })).rejects.toBeInstanceOf(
        ToolNotFoundError,
      );
    });

    test("rejects missing required arguments before dispatch", async () => {
      const { reg } = makeRegistry();
      const remote = new FakeToolSource("remote", {
        search: {
          inputSchema: {
            type: "object",
            properties: { query: { type: "string" }, limit: { type: "number" } },
            required: ["query", "limit"],
          },
        },
      });
      reg.addTransport(remote);

      const catalogue = await reg.listAll();
      const attempt = catalogue.dispatch({ id: "c", name: "search", args: { limit: 3 } });

      await expect(attempt).rejects.toBeInstanceOf(ToolExecutionError);
      await expect(attempt).rejects.toThrow('Missing required argument(s) for "search": query');
      expect(remote.invocations).toHaveLength(0);
    });

    test("wraps local tool failures in ToolExecutionError", async () => {
      const { reg } = makeRegistry();
      reg.register(
        makeTool("fail", async () => {
          throw new Error("boom");
        }),
      );

      const catalogue = await reg.listAll();
      const attempt = catalogue.dispatch({ id: "c", name: "fail", args: {} });
      await expect(attempt).rejects.toBeInstanceOf(ToolExecutionError);
      await expect(attempt).rejects.toThrow('Error executing "fail": boom');
    });

    test("wraps non-Error throws", async () => {
      const { reg } = makeRegistry();
      reg.register(
        makeTool("fail2", async () => {
          throw "string error";
        }),
      );

      const catalogue = await reg.listAll();
      await expect(catalogue.dispatch({ id: "c", name: "fail2", args: {} })).rejects.toThrow(
        'Error executing "fail2": string error',
      );
    });

    test("marks a source unavailable for the catalogue after an AuthError", async () => {
      const { reg, logger } = makeRegistry();
      const secured = new FakeToolSource("secured", {
        read: { error: new AuthError("HTTP 401 from secured") },
        write: { result: "written" },
      });
      reg.addTransport(secured);

      const catalogue = await reg.listAll();
      await expect(catalogue.dispatch({ id: "c1", name: "read", args: {} })).rejects.toBeInstanceOf(
        AuthError,
      );

      const second = catalogue.dispatch({ id: "c2", name: "write", args: {} });
      await expect(second).rejects.toBeInstanceOf(AuthError);
      await expect(second).rejects.toThrow('Tool "write" is unavailable: HTTP 401 from secured');
      expect(secured.invocations.map((i) => i.name)).toEqual(["read"]);
      expect(logger.at("warn")[0].message).toBe("Tool source marked unavailable for this turn");

      // A fresh catalogue tries the source again
      const next = await reg.listAll();
      const result = await next.dispatch({ id: "c3", name: "write", args: {} });
      expect(result.content).toBe("written");
    });

    test("truncates oversized results", async () => {
      const { reg } = makeRegistry({ maxResultChars: 20 });
      reg.register(makeTool("big", async () => "a".repeat(100)));

      const catalogue = await reg.listAll();
      const result = await catalogue.dispatch({ id: "c", name: "big", args: {} });
      expect(result.content).toBe("a".repeat(20) + "\n[truncated]");
    });

    test("does not truncate results under the limit", async () => {
      const { reg } = makeRegistry({ maxResultChars: 200 });
      reg.register(makeTool("small", async () => "short result"));

      const catalogue = await reg.listAll();
      const result = await catalogue.dispatch({ id: "c", name: "small", args: {} });
      expect(result.content).toBe("short result");
    });

    test("uses default maxResultChars of 50000", async () => {
      const { reg } = makeRegistry();
      reg.register(makeTool("medium", async () => "x".repeat(50_000)));

      const catalogue = await reg.listAll();
      const result = await catalogue.dispatch({ id: "c", name: "medium", args: {} });
      expect(result.content).toBe("x".repeat(50_000));
    });

    test("times out a slow call and aborts it", async () => {
      const { reg } = makeRegistry({ callTimeoutMs: 20 });
      const slow = new FakeToolSource("slow", { wait: { hang: true } });
      reg.addTransport(slow);

      const catalogue = await reg.listAll();
      const attempt = catalogue.dispatch({ id: "c", name: "wait", args: {} });

      await expect(attempt).rejects.toBeInstanceOf(ToolTimeoutError);
      await expect(attempt).rejects.toThrow('Tool "wait" timed out after 20ms');
      expect(slow.aborted).toEqual(["wait"]);
    });

    test("rejects with the caller's abort reason", async () => {
      const { reg } = makeRegistry();
      const slow = new FakeToolSource("slow", { wait: { hang: true } });
      reg.addTransport(slow);

      const catalogue = await reg.listAll();
      const controller = new AbortController();
      const attempt = catalogue.dispatch({ id: "c", name: "wait", args: {} }, { signal: controller.signal });
      controller.abort(new Error("connection closed"));

      await expect(attempt).rejects.toThrow("connection closed");
      expect(slow.aborted).toEqual(["wait"]);
    });

    test("passes the abort signal to local tools", async () => {
      const { reg } = makeRegistry();
      let seen: AbortSignal | undefined;
      reg.register(
        makeTool("signal_check", async (_args, { signal }) => {
          seen = signal;
          return "ok";
        }),
      );

      const catalogue = await reg.listAll();
      await catalogue.dispatch({ id: "c", name: "signal_check", args: {} });
      expect(seen).toBeInstanceOf(AbortSignal);
    });
  });
});
