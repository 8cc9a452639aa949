// @tidechat/core: contracts and turn logic, no third-party dependencies
// Re-exports all types, interfaces, and core logic

// Types
export * from "./types";

// Events
export {
  type TidechatEvents,
  type EventBus,
  type EventName,
  type EventHandler,
  SimpleEventBus,
} from "./events";

// Deadlines and cancellation
export { type LinkedAbort, withTimeout, raceAbort, linkAbort, abortReason } from "./deadline";

// Providers
export { type StreamedEvent, AbstractProvider } from "./base-provider";

// Tool registry
export { type ToolRegistryOptions, ToolRegistry, ToolCatalogue } from "./tool-registry";

// Turn orchestrator
export {
  type TurnState,
  type TurnLimits,
  type TurnDeps,
  type EventSink,
  DEFAULT_TURN_LIMITS,
  TurnOrchestrator,
  isTerminal,
} from "./turn";

// Version
export { VERSION, PRODUCT_NAME } from "./version";
