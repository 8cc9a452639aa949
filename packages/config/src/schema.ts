import { z } from "zod";
import { LOG_LEVELS } from "@tidechat/core";
import { DEFAULT_SYSTEM_PROMPT } from "./constants";

export const HttpUrlSchema = z
  .string()
  .refine((value) => {
    try {
      const url = new URL(value);
      return url.protocol === "http:" || url.protocol === "https:";
    } catch {
      return false;
    }
  }, "Invalid URL (expected http:// or https://)");

export const LogLevelEnum = z.enum(LOG_LEVELS);

const ServerSchema = z.object({
  host: z.string().min(1).default("127.0.0.1"),
  port: z.number().int().min(0).max(65535).default(8000),
  path: z.string().startsWith("/").default("/ws/chat"),
  /** Origins allowed to open the chat socket. Empty allows any. */
  allowedOrigins: z.array(z.string()).default([]),
});

const AiSchema = z.object({
  baseUrl: HttpUrlSchema.default("https://api.openai.com/v1"),
  apiKey: z.string().nullable().default(null),
  model: z.string().min(1).default("gpt-4o-mini"),
  temperature: z.number().min(0).max(2).default(0.7),
  topP: z.number().min(0).max(1).default(1),
  maxTokens: z.number().int().positive().default(4096),
  systemPrompt: z.string().nullable().default(DEFAULT_SYSTEM_PROMPT),
});

const LimitsSchema = z.object({
  maxToolRounds: z.number().int().positive().default(8),
  turnTimeoutMs: z.number().int().positive().default(120_000),
  modelEventTimeoutMs: z.number().int().positive().default(60_000),
  toolCallTimeoutMs: z.number().int().positive().default(30_000),
  handshakeTimeoutMs: z.number().int().positive().default(10_000),
  maxResultChars: z.number().int().positive().default(50_000),
});

export const McpServerSchema = z.object({
  name: z.string().min(1),
  /** null: the server is declared but has no endpoint, so it lists no tools. */
  url: HttpUrlSchema.nullable().default(null),
  transport: z.literal("streamable-http").default("streamable-http"),
  /** Per-call timeout; falls back to limits.toolCallTimeoutMs. */
  timeoutMs: z.number().int().positive().nullable().default(null),
  authToken: z.string().nullable().default(null),
  localOnly: z.boolean().default(true),
});

const McpSchema = z
  .object({
    enabled: z.boolean().default(true),
    servers: z.array(McpServerSchema).default([]),
  })
  .superRefine((mcp, ctx) => {
    const seen = new Set<string>();
    mcp.servers.forEach((server, index) => {
      if (seen.has(server.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["servers", index, "name"],
          message: `Duplicate tool server name "${server.name}"`,
        });
      }
      seen.add(server.name);
    });
  });

export const TidechatConfigSchema = z.object({
  version: z.literal(1).default(1),
  server: ServerSchema.default({}),
  logLevel: LogLevelEnum.default("info"),
  ai: AiSchema.default({}),
  limits: LimitsSchema.default({}),
  mcp: McpSchema.default({}),
});
