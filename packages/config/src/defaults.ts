import { TidechatConfigSchema } from "./schema";
import type { TidechatConfig } from "./types";

export function defaultConfig(): TidechatConfig {
  return TidechatConfigSchema.parse({});
}
