// Barrel export: the public type surface of @tidechat/core

export type { Message, MessageRole } from "./message";

export type {
  Provider,
  StreamTurnOptions,
  GenerationEvent,
  ProviderErrorCode,
} from "./provider";

export type {
  ToolDefinition,
  ToolCall,
  ToolResult,
  ToolResultStatus,
  ToolInvokeOptions,
  LocalTool,
  ToolSource,
  ToolTransportKind,
} from "./tool";

export type {
  ClientAction,
  ClientRequest,
  ErrorKind,
  ChunkPayload,
  ServerEvent,
  ServerEventStatus,
} from "./protocol";

export type { Lifecycle, LifecycleStatus } from "./lifecycle";

export type { Logger, LogLevel, LogSink, ConsoleLoggerOptions } from "./logger";
export { ConsoleLogger, LOG_LEVELS } from "./logger";

export {
  TidechatError,
  ValidationError,
  TransportError,
  ToolServerTimeoutError,
  ProtocolError,
  AuthError,
  ToolNotFoundError,
  ToolTimeoutError,
  ToolExecutionError,
  ProviderError,
  ToolLoopLimitError,
  TurnTimeoutError,
  ConfigError,
  errorMessage,
  ok,
  err,
} from "./errors";
export type { Result } from "./errors";
