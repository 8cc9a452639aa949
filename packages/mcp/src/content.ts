// Flattening of MCP tool output into the text the model sees

import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";

/**
 * Text parts are joined with newlines; anything else is included as JSON.
 */
export function renderContent(content: CallToolResult["content"]): string {
  return content.map((part) => (part.type === "text" ? part.text : JSON.stringify(part))).join("\n");
}
