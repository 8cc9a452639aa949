import type { z } from "zod";
import type { McpServerSchema, TidechatConfigSchema } from "./schema";

export type TidechatConfig = z.infer<typeof TidechatConfigSchema>;
export type McpServerConfig = z.infer<typeof McpServerSchema>;

/** Anything that looks like process.env. */
export type Env = Record<string, string | undefined>;
