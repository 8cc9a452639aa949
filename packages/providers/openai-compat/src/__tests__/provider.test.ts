import { describe, test, expect, vi, afterEach } from "vitest";
import type { GenerationEvent, Message, StreamTurnOptions } from "@tidechat/core";
import { OpenAICompatibleProvider, normalizeBaseUrl, type OpenAICompatibleConfig } from "../provider";

function makeProvider(overrides: Partial<OpenAICompatibleConfig> = {}) {
  return new OpenAICompatibleProvider({ name: "openai", baseUrl: "http://localhost", model: "m1", ...overrides });
}

function msg(role: Message["role"], content: string, extra: Partial<Message> = {}): Message {
  return { id: `m-${role}`, role, content, timestamp: 0, ...extra };
}

/** A streaming Response built from SSE data payloads. */
function sseResponse(payloads: unknown[]): Response {
  const body = payloads
    .map((p) => `data: ${typeof p === "string" ? p : JSON.stringify(p)}\n\n`)
    .join("");
  return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
}

function textChunk(text: string) {
  return { choices: [{ delta: { content: text }, finish_reason: null }] };
}

function toolDelta(index: number, fn: { name?: string; arguments?: string }, id?: string) {
  return { choices: [{ delta: { tool_calls: [{ index, id, function: fn }] }, finish_reason: null }] };
}

function finish(reason: string) {
  return { choices: [{ delta: {}, finish_reason: reason }] };
}

function stubFetch(impl: (input: string | URL | Request, init?: RequestInit) => Promise<Response>) {
  const fetchMock = vi.fn<typeof fetch>(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

function requestInit(fetchMock: ReturnType<typeof stubFetch>): RequestInit | undefined {
  return fetchMock.mock.calls[0][1];
}

async function collect(
  provider: OpenAICompatibleProvider,
  conversation: Message[] = [msg("user", "hi")],
  options?: StreamTurnOptions,
): Promise<GenerationEvent[]> {
  const events: GenerationEvent[] = [];
  for await (const event of provider.streamTurn(conversation, options)) {
    events.push(event);
  }
  return events;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("normalizeBaseUrl", () => {
  test.each([
    ["http://127.0.0.1:8080", "http://127.0.0.1:8080/v1"],
    ["http://127.0.0.1:8080/v1", "http://127.0.0.1:8080/v1"],
    ["http://127.0.0.1:8080/v1///", "http://127.0.0.1:8080/v1"],
    ["http://127.0.0.1:8080/v1/chat/completions", "http://127.0.0.1:8080/v1"],
  ])("%s -> %s", (raw, expected) => {
    expect(normalizeBaseUrl(raw)).toBe(expected);
  });

  test("the provider posts to the normalized endpoint", async () => {
    const fetchMock = stubFetch(async () => sseResponse([finish("stop"), "[DONE]"]));
    await collect(makeProvider({ baseUrl: "https://api.example.com/v1/" }));
    expect(fetchMock.mock.calls[0][0]).toBe("https://api.example.com/v1/chat/completions");
  });
});

describe("OpenAICompatibleProvider.streamTurn", () => {
  test("yields text deltas then turn_complete", async () => {
    stubFetch(async () => sseResponse([textChunk("Hello "), textChunk("world"), finish("stop"), "[DONE]"]));

    expect(await collect(makeProvider())).toEqual([
      { type: "text_delta", text: "Hello " },
      { type: "text_delta", text: "world" },
      { type: "turn_complete" },
    ]);
  });

  test("accumulates tool call fragments and flushes them in index order", async () => {
    stubFetch(async () =>
      sseResponse([
        toolDelta(1, { name: "clock", arguments: "" }, "call_b"),
        toolDelta(0, { name: "search", arguments: '{"query":' }, "call_a"),
        toolDelta(0, { arguments: '"tides"}' }),
        finish("tool_calls"),
        "[DONE]",
      ]),
    );

    expect(await collect(makeProvider())).toEqual([
      { type: "tool_call", toolCall: { id: "call_a", name: "search", args: { query: "tides" } } },
      { type: "tool_call", toolCall: { id: "call_b", name: "clock", args: {} } },
      { type: "turn_complete" },
    ]);
  });

  test("flushes pending tool calls when the stream ends without a finish reason", async () => {
    stubFetch(async () => sseResponse([toolDelta(0, { name: "clock", arguments: "{}" }, "call_1")]));

    expect(await collect(makeProvider())).toEqual([
      { type: "tool_call", toolCall: { id: "call_1", name: "clock", args: {} } },
      { type: "turn_complete" },
    ]);
  });

  test("generates an id when the server omits one", async () => {
    stubFetch(async () => sseResponse([toolDelta(0, { name: "clock", arguments: "{}" }), finish("tool_calls")]));

    const [first] = await collect(makeProvider());
    expect(first.type).toBe("tool_call");
    if (first.type === "tool_call") {
      expect(first.toolCall.id).toMatch(/^call_/);
    }
  });

  test("sends the conversation, tools and sampling options", async () => {
    const fetchMock = stubFetch(async () => sseResponse([finish("stop"), "[DONE]"]));
    const provider = makeProvider({ model: "gpt-4o-mini", temperature: 0.2, topP: 0.9, maxTokens: 256 });

    await collect(
      provider,
      [
        msg("system", "be brief"),
        msg("user", "hi"),
        msg("assistant", "", { toolCalls: [{ id: "call_a", name: "search", args: { query: "tides" } }] }),
        msg("tool", "high tide at 6", { toolCallId: "call_a", toolName: "search" }),
      ],
      {
        tools: [
          {
            name: "search",
            description: "Search the web",
            inputSchema: { type: "object", properties: { query: { type: "string" } }, required: ["query"] },
          },
        ],
      },
    );

    const body: unknown = JSON.parse(String(requestInit(fetchMock)?.body));
    expect(body).toEqual({
      model: "gpt-4o-mini",
      stream: true,
      temperature: 0.2,
      top_p: 0.9,
      max_tokens: 256,
      messages: [
        { role: "system", content: "be brief" },
        { role: "user", content: "hi" },
        {
          role: "assistant",
          content: null,
          tool_calls: [
            { id: "call_a", type: "function", function: { name: "search", arguments: '{"query":"tides"}' } },
          ],
        },
        { role: "tool", tool_call_id: "call_a", content: "high tide at 6" },
      ],
      tools: [
        {
          type: "function",
          function: {
            name: "search",
            description: "Search the web",
            parameters: { type: "object", properties: { query: { type: "string" } }, required: ["query"] },
          },
        },
      ],
    });
  });

  test("omits model, tools and sampling options when unset", async () => {
    const fetchMock = stubFetch(async () => sseResponse(["[DONE]"]));
    await collect(makeProvider({ model: null }));

    const body: unknown = JSON.parse(String(requestInit(fetchMock)?.body));
    expect(body).toEqual({ stream: true, messages: [{ role: "user", content: "hi" }] });
  });

  test("sends a bearer token only when an API key is set", async () => {
    const fetchMock = stubFetch(async () => sseResponse(["[DONE]"]));

    await collect(makeProvider({ apiKey: "test-secret" }));
    await collect(makeProvider());

    const [withKey, withoutKey] = fetchMock.mock.calls.map((call) => new Headers(call[1]?.headers));
    expect(withKey.get("Authorization")).toBe("Bearer test-secret");
    expect(withoutKey.get("Authorization")).toBeNull();
  });

  test("reports an HTTP failure as turn_error with the classified code", async () => {
    stubFetch(async () => new Response('{"error":"bad key"}', { status: 401 }));

    expect(await collect(makeProvider())).toEqual([
      { type: "turn_error", kind: "ProviderError", message: 'openai error (auth_failed): HTTP 401: {"error":"bad key"}' },
    ]);
  });

  test("reports a network failure with a reachability hint", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    expect(await collect(makeProvider())).toEqual([
      {
        type: "turn_error",
        kind: "ProviderError",
        message: "openai error (transient_network): fetch failed (is openai reachable at http://localhost/v1?)",
      },
    ]);
  });

  test("fails the round on malformed tool arguments", async () => {
    stubFetch(async () =>
      sseResponse([toolDelta(0, { name: "search", arguments: '{"query":' }, "call_a"), finish("tool_calls")]),
    );

    expect(await collect(makeProvider())).toEqual([
      {
        type: "turn_error",
        kind: "ProviderError",
        message: 'openai error (invalid_request): malformed arguments for tool "search"',
      },
    ]);
  });

  test("ends silently when the caller aborts mid-stream", async () => {
    const encoder = new TextEncoder();
    stubFetch(async (_input, init) => {
      const body = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(encoder.encode(`data: ${JSON.stringify(textChunk("partial"))}\n\n`));
          const signal = init?.signal;
          if (signal) signal.addEventListener("abort", () => controller.error(signal.reason), { once: true });
        },
      });
      return new Response(body, { status: 200, headers: { "content-type": "text/event-stream" } });
    });

    const controller = new AbortController();
    const events: GenerationEvent[] = [];
    for await (const event of makeProvider().streamTurn([msg("user", "hi")], { signal: controller.signal })) {
      events.push(event);
      controller.abort(new Error("client went away"));
    }

    expect(events).toEqual([{ type: "text_delta", text: "partial" }]);
  });

  test("cancels the upstream request when the consumer stops early", async () => {
    const fetchMock = stubFetch(async () => sseResponse([textChunk("one"), textChunk("two"), "[DONE]"]));

    for await (const event of makeProvider().streamTurn([msg("user", "hi")])) {
      expect(event).toEqual({ type: "text_delta", text: "one" });
      break;
    }

    expect(requestInit(fetchMock)?.signal?.aborted).toBe(true);
  });
});
