import type { TidechatConfig } from "./types";

/** A copy of the config with every set secret masked, for logging. */
export function redactConfig(config: TidechatConfig): TidechatConfig {
  return {
    ...config,
    ai: { ...config.ai, apiKey: config.ai.apiKey === null ? null : "[redacted]" },
    mcp: {
      ...config.mcp,
      servers: config.mcp.servers.map((server) => ({
        ...server,
        authToken: server.authToken === null ? null : "[redacted]",
      })),
    },
  };
}
