// Conversation messages exchanged with the model during one turn

import type { ToolCall } from "./tool";

export type MessageRole = "system" | "user" | "assistant" | "tool";

export interface Message {
  readonly id: string;
  readonly role: MessageRole;
  readonly content: string;
  readonly timestamp: number;
  /** Tool calls requested by the assistant (present when role === "assistant") */
  readonly toolCalls?: ToolCall[];
  /** Links a tool result message back to its call (present when role === "tool") */
  readonly toolCallId?: string;
  /** The tool name (present when role === "tool") */
  readonly toolName?: string;
  /** Set on tool messages whose call failed */
  readonly isError?: boolean;
}
