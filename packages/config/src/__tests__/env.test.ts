import { describe, expect, test } from "vitest";
import { ConfigError } from "@tidechat/core";
import { applyEnvOverrides, expandEnv } from "../env";

describe("expandEnv", () => {
  test("replaces references inside nested strings", () => {
    const result = expandEnv(
      { mcp: { servers: [{ name: "kb", authToken: "${KB_TOKEN}", url: "http://${KB_HOST}:3001/mcp" }] } },
      { KB_TOKEN: "test-secret", KB_HOST: "127.0.0.1" },
    );
    expect(result).toEqual({
      ok: true,
      value: { mcp: { servers: [{ name: "kb", authToken: "test-secret", url: "http://127.0.0.1:3001/mcp" }] } },
    });
  });

  test("leaves non-string values alone", () => {
    expect(expandEnv({ port: 8000, enabled: true, nothing: null }, {})).toEqual({
      ok: true,
      value: { port: 8000, enabled: true, nothing: null },
    });
  });

  test("fails on an unset variable and names the path", () => {
    const result = expandEnv({ mcp: { servers: [{ authToken: "${MISSING_TOKEN}" }] } }, {});
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConfigError);
      expect(result.error.message).toBe(
        "Environment variable MISSING_TOKEN is not set (referenced at mcp.servers.0.authToken)",
      );
    }
  });

  test("treats an empty variable as unset", () => {
    const result = expandEnv({ ai: { apiKey: "${OPENAI_API_KEY}" } }, { OPENAI_API_KEY: "" });
    expect(result.ok).toBe(false);
  });

  test("ignores text that only resembles a reference", () => {
    expect(expandEnv("$HOME and {braces}", {})).toEqual({ ok: true, value: "$HOME and {braces}" });
  });
});

describe("applyEnvOverrides", () => {
  test("environment wins over file values", () => {
    const result = applyEnvOverrides(
      { server: { host: "127.0.0.1", port: 8000, path: "/chat" }, ai: { model: "from-file" } },
      {
        PORT: "9100",
        HOST: "0.0.0.0",
        LOG_LEVEL: "DEBUG",
        OPENAI_API_KEY: "test-secret",
        OPENAI_BASE_URL: "http://127.0.0.1:8080/v1",
        OPENAI_MODEL: "from-env",
      },
    );
    expect(result).toEqual({
      ok: true,
      value: {
        server: { host: "0.0.0.0", port: 9100, path: "/chat" },
        logLevel: "debug",
        ai: { model: "from-env", apiKey: "test-secret", baseUrl: "http://127.0.0.1:8080/v1" },
      },
    });
  });

  test("leaves the document untouched without overrides", () => {
    expect(applyEnvOverrides({ server: { port: 1 } }, {})).toEqual({ ok: true, value: { server: { port: 1 } } });
  });

  test("rejects a non-numeric PORT", () => {
    const result = applyEnvOverrides({}, { PORT: "eighty" });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('PORT must be an integer, got "eighty"');
    }
  });
});
