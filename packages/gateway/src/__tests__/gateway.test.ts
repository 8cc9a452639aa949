import { describe, test, expect, vi, afterEach } from "vitest";
import { ConsoleLogger, type GenerationEvent, type Logger } from "@tidechat/core";
import { TidechatConfigSchema } from "@tidechat/config";
import { createGateway, type Gateway } from "../gateway";

const quietLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  child: () => quietLogger,
};

function stubModelEndpoint() {
  const fetchMock = vi.fn<typeof fetch>(
    async () => new Response("data: [DONE]\n\n", { status: 200, headers: { "content-type": "text/event-stream" } }),
  );
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

async function drain(gateway: Gateway): Promise<GenerationEvent[]> {
  const events: GenerationEvent[] = [];
  for await (const event of gateway.deps.provider.streamTurn([
    { id: "m1", role: "user", content: "hi", timestamp: 0 },
  ])) {
    events.push(event);
  }
  return events;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("createGateway", () => {
  test("passes the sampling settings from config to the model provider", async () => {
    const fetchMock = stubModelEndpoint();

    const gateway = await createGateway({
      config: TidechatConfigSchema.parse({
        ai: { baseUrl: "http://127.0.0.1:1/v1", temperature: 0.3, topP: 0.8, maxTokens: 64 },
      }),
      logger: quietLogger,
    });

    await drain(gateway);

    expect(fetchMock.mock.calls[0][0]).toBe("http://127.0.0.1:1/v1/chat/completions");
    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toMatchObject({ model: "gpt-4o-mini", temperature: 0.3, top_p: 0.8, max_tokens: 64 });
  });

  test("leaves top_p at its default of 1 when config omits it", async () => {
    const fetchMock = stubModelEndpoint();

    const gateway = await createGateway({
      config: TidechatConfigSchema.parse({ ai: { baseUrl: "http://127.0.0.1:1/v1" } }),
      logger: quietLogger,
    });

    await drain(gateway);

    const body: unknown = JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
    expect(body).toMatchObject({ top_p: 1 });
  });

  test("logs the effective configuration at debug with secrets masked", async () => {
    const entries: Record<string, unknown>[] = [];
    const logger = new ConsoleLogger({
      level: "debug",
      sink: (_level, line) => {
        entries.push(JSON.parse(line));
      },
    });
    const gateway = await createGateway({
      config: TidechatConfigSchema.parse({
        server: { host: "127.0.0.1", port: 0 },
        ai: { apiKey: "test-secret" },
        mcp: { servers: [{ name: "kb", url: null, authToken: "test-secret" }] },
      }),
      logger,
    });

    await gateway.start();
    await gateway.stop();

    const logged = entries.find((e) => e.message === "Effective configuration");
    expect(logged?.component).toBe("Gateway");
    expect(logged?.config).toMatchObject({
      ai: { apiKey: "[redacted]" },
      mcp: { servers: [{ name: "kb", authToken: "[redacted]" }] },
    });
  });
});
