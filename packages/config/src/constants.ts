export const CONFIG_FILE_NAME = "tidechat.config.json5";

/** Environment variable naming an alternative config file. */
export const CONFIG_PATH_ENV = "TIDECHAT_CONFIG";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a helpful AI assistant. You provide clear, accurate, and helpful responses.\n" +
  "When using tools, explain what you're doing and why.";
