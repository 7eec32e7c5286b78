/**
 * Machine-readable decision codes, stable for dashboards and audit queries.
 */
export const DecisionCode = {
  ALLOWED: "ALLOWED",
  MALFORMED_TOOL_CALL: "MALFORMED_TOOL_CALL",
  FORBIDDEN_TOOL: "FORBIDDEN_TOOL",
  PHASE_RESTRICTED: "PHASE_RESTRICTED",
  DUPLICATE_CALL: "DUPLICATE_CALL",
  DUPLICATE_CHECK_FAILED: "DUPLICATE_CHECK_FAILED",
  INTENT_MISMATCH: "INTENT_MISMATCH",
  ALIGNMENT_CHECK_FAILED: "ALIGNMENT_CHECK_FAILED",
} as const;

export type DecisionCode = (typeof DecisionCode)[keyof typeof DecisionCode];

/** Stages of the validation chain, in evaluation order. */
export type StageName = "shape" | "permission" | "phase" | "duplicate" | "alignment";

/**
 * Result of a single stage.
 * - pass: continue with the next stage.
 * - fail: deny with this code and reason.
 * - indeterminate: the stage could not decide; the stage's IndeterminatePolicy applies.
 */
export type StageOutcome =
  | { status: "pass" }
  | { status: "fail"; code: DecisionCode; reason: string }
  | { status: "indeterminate"; error: unknown };

/**
 * What an indeterminate stage turns into.
 * - permissive: treat as pass.
 * - conservative: deny.
 */
export type IndeterminatePolicy = "permissive" | "conservative";

export interface IndeterminatePolicies {
  duplicate: IndeterminatePolicy;
  alignment: IndeterminatePolicy;
}

export interface ValidationResult {
  allowed: boolean;
  /** Human/LLM-readable explanation; "allowed" when every stage passed. */
  reason: string;
  code: DecisionCode;
  /** Stage that denied the call, or null when allowed. */
  stage: StageName | null;
  /** Role the call was evaluated for; null when rejected before role resolution. */
  role: string | null;
}

export interface ConflictCheckResult {
  ok: boolean;
  reason: string;
}
