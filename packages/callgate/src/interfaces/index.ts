export { WILDCARD_TOOL } from "./PolicyTypes.js";
export type { Policy, RoleConfig } from "./PolicyTypes.js";
export type { PolicySource } from "./PolicySource.js";
export type {
  Phase,
  ToolCall,
  ToolDescriptor,
  TextMessage,
} from "./ToolCallTypes.js";
export { DecisionCode } from "./ValidationTypes.js";
export type {
  StageName,
  StageOutcome,
  IndeterminatePolicy,
  IndeterminatePolicies,
  ValidationResult,
  ConflictCheckResult,
} from "./ValidationTypes.js";
export type {
  CallgateEvent,
  EventSinkPluginInterface,
} from "./EventSinkPluginInterface.js";
export type {
  EventSinkRepository,
  StoredEvent,
} from "./EventSinkRepository.js";
export type {
  StorageAdapter,
  StorageConnectionResult,
} from "./StorageAdapter.js";
export type { CallgatePluginContext } from "./CallgatePluginContext.js";
