import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import JSON5 from "json5";
import { ConfigError, err, errorMessage, ok, type Result } from "@tidechat/core";
import { TidechatConfigSchema } from "./schema";
import { CONFIG_FILE_NAME, CONFIG_PATH_ENV } from "./constants";
import { applyEnvOverrides, expandEnv } from "./env";
import type { Env, TidechatConfig } from "./types";

export interface LoadConfigOptions {
  /** Explicit config file. Defaults to $TIDECHAT_CONFIG, then ./tidechat.config.json5. */
  readonly path?: string;
  readonly env?: Env;
  readonly cwd?: string;
}

export interface LoadedConfig {
  readonly config: TidechatConfig;
  /** The file the config came from, or null when only defaults and env were used. */
  readonly source: string | null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate an already-parsed config document: expand ${VAR} references,
 * apply environment overrides, then fill defaults through the schema.
 */
export function parseConfig(raw: unknown, env: Env = {}): Result<TidechatConfig, ConfigError> {
  if (!isRecord(raw)) {
    return err(new ConfigError("Config root must be an object"));
  }

  const expanded = expandEnv(raw, env);
  if (!expanded.ok) return expanded;
  if (!isRecord(expanded.value)) {
    return err(new ConfigError("Config root must be an object"));
  }

  const overridden = applyEnvOverrides(expanded.value, env);
  if (!overridden.ok) return overridden;

  const result = TidechatConfigSchema.safeParse(overridden.value);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return err(new ConfigError(`Invalid config: ${issues.join("; ")}`, result.error));
  }
  return ok(result.data);
}

/**
 * Read and validate the config file. A missing default file means defaults;
 * a missing file that was asked for explicitly is an error.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<Result<LoadedConfig, ConfigError>> {
  const env = options.env ?? process.env;
  const explicit = options.path ?? env[CONFIG_PATH_ENV];
  const path = resolve(options.cwd ?? process.cwd(), explicit ?? CONFIG_FILE_NAME);

  let text: string | null;
  try {
    text = await readFile(path, "utf8");
  } catch (e) {
    if (explicit || !isMissingFile(e)) {
      return err(new ConfigError(`Cannot read config file ${path}: ${errorMessage(e)}`, e));
    }
    text = null;
  }

  let raw: unknown = {};
  if (text !== null) {
    try {
      raw = JSON5.parse(text);
    } catch (e) {
      return err(new ConfigError(`Invalid JSON5 in ${path}: ${errorMessage(e)}`, e));
    }
  }

  const parsed = parseConfig(raw, env);
  if (!parsed.ok) return parsed;
  return ok({ config: parsed.value, source: text === null ? null : path });
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}
