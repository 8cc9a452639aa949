export {
  OpenAICompatibleProvider,
  normalizeBaseUrl,
  toWireMessages,
  type OpenAICompatibleConfig,
} from "./provider";
export { processSSEBuffer, type SSEEvent } from "./sse";
export { classifyError, classifyStatus, buildErrorHint } from "./errors";
export type { WireMessage, WireToolDef, WireChunk, WireChoice, WireDelta, WireToolCall } from "./wire";
