// Wire types for the OpenAI-compatible Chat Completions API (snake_case).

import { z } from "zod";

export interface WireToolDef {
  type: "function";
  function: { name: string; description: string; parameters: Record<string, unknown> };
}

export interface WireToolCall {
  id: string;
  type: "function";
  function: { name: string; arguments: string };
}

export type WireMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; tool_calls?: WireToolCall[] }
  | { role: "tool"; tool_call_id: string; content: string };

const WireToolCallDeltaSchema = z.object({
  index: z.number().int().nonnegative(),
  id: z.string().optional(),
  function: z
    .object({
      name: z.string().optional(),
      arguments: z.string().optional(),
    })
    .optional(),
});

const WireDeltaSchema = z.object({
  content: z.string().nullish(),
  tool_calls: z.array(WireToolCallDeltaSchema).nullish(),
});

// Some "compatible" servers emit message instead of delta inside SSE chunks
const WireChoiceSchema = z.object({
  delta: WireDeltaSchema.nullish(),
  message: z.object({ content: z.string().nullish() }).nullish(),
  finish_reason: z.string().nullish(),
});

/** One streamed chunk. Unknown fields (usage, timings, ids) are ignored. */
export const WireChunkSchema = z.object({
  choices: z.array(WireChoiceSchema).optional(),
});

export type WireDelta = z.infer<typeof WireDeltaSchema>;
export type WireChoice = z.infer<typeof WireChoiceSchema>;
export type WireChunk = z.infer<typeof WireChunkSchema>;
