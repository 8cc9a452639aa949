export { TidechatConfigSchema, McpServerSchema, HttpUrlSchema, LogLevelEnum } from "./schema";
export { CONFIG_FILE_NAME, CONFIG_PATH_ENV, DEFAULT_SYSTEM_PROMPT } from "./constants";
export type { TidechatConfig, McpServerConfig, Env } from "./types";
export { defaultConfig } from "./defaults";
export { expandEnv, applyEnvOverrides } from "./env";
export { loadConfig, parseConfig, type LoadConfigOptions, type LoadedConfig } from "./load";
export { redactConfig } from "./redact";
