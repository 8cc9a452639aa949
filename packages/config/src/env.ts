// ${VAR} expansion and environment overrides, applied to the raw parsed
// file before schema validation

import { ConfigError, err, ok, type Result } from "@tidechat/core";
import type { Env } from "./types";

const VAR_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function formatPath(path: ReadonlyArray<string | number>): string {
  return path.length === 0 ? "(root)" : path.join(".");
}

/**
 * Replace every `${VAR}` inside string values with the variable's value.
 * An unset or empty variable is an error naming where it was referenced.
 */
export function expandEnv(value: unknown, env: Env, path: Array<string | number> = []): Result<unknown, ConfigError> {
  if (typeof value === "string") {
    const missing: string[] = [];
    const expanded = value.replace(VAR_PATTERN, (match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined || resolved === "") {
        missing.push(name);
        return match;
      }
      return resolved;
    });
    if (missing.length > 0) {
      return err(
        new ConfigError(`Environment variable ${missing[0]} is not set (referenced at ${formatPath(path)})`),
      );
    }
    return ok(expanded);
  }

  if (Array.isArray(value)) {
    const items: unknown[] = [];
    for (const [index, item] of value.entries()) {
      const result = expandEnv(item, env, [...path, index]);
      if (!result.ok) return result;
      items.push(result.value);
    }
    return ok(items);
  }

  if (isRecord(value)) {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      const result = expandEnv(item, env, [...path, key]);
      if (!result.ok) return result;
      out[key] = result.value;
    }
    return ok(out);
  }

  return ok(value);
}

function mergeSection(
  raw: Record<string, unknown>,
  key: string,
  patch: Record<string, unknown>,
): void {
  if (Object.keys(patch).length === 0) return;
  const base = raw[key];
  // A malformed section is left for the schema to report
  if (base !== undefined && !isRecord(base)) return;
  raw[key] = { ...base, ...patch };
}

/**
 * Apply PORT, HOST, LOG_LEVEL and the OPENAI_* variables on top of the file.
 * Environment wins over the file.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: Env,
): Result<Record<string, unknown>, ConfigError> {
  const out: Record<string, unknown> = { ...raw };

  const server: Record<string, unknown> = {};
  if (env.PORT) {
    const port = Number(env.PORT);
    if (!Number.isInteger(port)) {
      return err(new ConfigError(`PORT must be an integer, got "${env.PORT}"`));
    }
    server.port = port;
  }
  if (env.HOST) server.host = env.HOST;
  mergeSection(out, "server", server);

  if (env.LOG_LEVEL) out.logLevel = env.LOG_LEVEL.toLowerCase();

  const ai: Record<string, unknown> = {};
  if (env.OPENAI_API_KEY) ai.apiKey = env.OPENAI_API_KEY;
  if (env.OPENAI_BASE_URL) ai.baseUrl = env.OPENAI_BASE_URL;
  if (env.OPENAI_MODEL) ai.model = env.OPENAI_MODEL;
  mergeSection(out, "ai", ai);

  return ok(out);
}
