export {
  ValidationFacade,
  DEFAULT_PHASE,
  DEFAULT_INDETERMINATE_POLICIES,
} from "./ValidationFacade.js";
export type { ValidationFacadeOptions } from "./ValidationFacade.js";
export { createValidationFacade } from "./createValidationFacade.js";
export type { CreateValidationFacadeOptions } from "./createValidationFacade.js";
export { resolveRole } from "./RoleResolver.js";
export {
  isToolAllowedForRole,
  filterToolsByRole,
  toolNameOf,
} from "./PermissionChecker.js";
export {
  PhaseGate,
  DEFAULT_PHASE_RULES,
  RESEARCH_CONTROL_TOOLS,
} from "./PhaseGate.js";
export type { PhaseRule } from "./PhaseGate.js";
export {
  DuplicateSuppressor,
  DEFAULT_MAX_ENTRIES,
} from "./DuplicateSuppressor.js";
export type { DuplicateSuppressorOptions } from "./DuplicateSuppressor.js";
export { canonicalJson, fingerprintToolCall } from "./fingerprint.js";
export { IntentAligner } from "./IntentAligner.js";
export type { IntentAlignerOptions } from "./IntentAligner.js";
export { checkStructuredOutputConflict } from "./StructuredOutputConflictChecker.js";
export { buildDecisionEvent, emitDecisionEvent } from "./events.js";
export {
  validationRequestSchema,
  parseValidationRequest,
  validateBatch,
  exitCodeFor,
} from "./batch.js";
export type { ValidationRequest, ValidationReport } from "./batch.js";
