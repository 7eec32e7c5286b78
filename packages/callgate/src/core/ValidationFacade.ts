import { z } from "zod";
import type { EventSinkPluginInterface } from "../interfaces/EventSinkPluginInterface.js";
import type {
  Phase,
  TextMessage,
  ToolCall,
  ToolDescriptor,
} from "../interfaces/ToolCallTypes.js";
import type {
  ConflictCheckResult,
  DecisionCode as DecisionCodeValue,
  IndeterminatePolicies,
  StageName,
  StageOutcome,
  ValidationResult,
} from "../interfaces/ValidationTypes.js";
import { DecisionCode } from "../interfaces/ValidationTypes.js";
import { PolicyStore } from "../policy/PolicyStore.js";
import { resolveRole } from "./RoleResolver.js";
import { filterToolsByRole, isToolAllowedForRole } from "./PermissionChecker.js";
import { PhaseGate } from "./PhaseGate.js";
import { DuplicateSuppressor } from "./DuplicateSuppressor.js";
import { IntentAligner } from "./IntentAligner.js";
import { checkStructuredOutputConflict } from "./StructuredOutputConflictChecker.js";
import { buildDecisionEvent, emitDecisionEvent } from "./events.js";
import { logger } from "../logger.js";

/** Phase assumed when the caller does not name one. */
export const DEFAULT_PHASE = "research";

export const DEFAULT_INDETERMINATE_POLICIES: IndeterminatePolicies = {
  duplicate: "conservative",
  alignment: "permissive",
};

const toolCallSchema = z.object({
  name: z.string().min(1),
  args: z.unknown(),
});

type SettledOutcome = Exclude<StageOutcome, { status: "indeterminate" }>;

const PASS: SettledOutcome = { status: "pass" };

export interface ValidationFacadeOptions {
  policyStore?: PolicyStore;
  duplicateSuppressor?: DuplicateSuppressor;
  intentAligner?: IntentAligner;
  phaseGate?: PhaseGate;
  /** How each best-effort stage resolves when it cannot decide. */
  indeterminate?: Partial<IndeterminatePolicies>;
  /** Sinks receiving one CallgateEvent per validate() call. */
  eventSinks?: EventSinkPluginInterface[];
}

function deny(
  stage: StageName,
  role: string | null,
  code: DecisionCodeValue,
  reason: string,
): ValidationResult {
  return { allowed: false, reason, code, stage, role };
}

/**
 * Single entry point for deciding whether a proposed tool call may run.
 *
 * validate() evaluates an ordered short-circuit chain: shape, role permission, phase,
 * duplicate suppression, intent alignment. Shape and authorization run before the
 * duplicate check, so a call that is not permitted never occupies a duplicate slot.
 * A call denied for intent alignment has already been recorded by the duplicate check,
 * and an identical retry inside the window is reported as a duplicate.
 *
 * Decision events go to the sinks in the background, so a slow sink never delays the
 * returned decision; flushEvents() waits for them.
 *
 * Each instance owns its duplicate table and policy cache; reset() clears both.
 */
export class ValidationFacade {
  private readonly policyStore: PolicyStore;
  private readonly duplicates: DuplicateSuppressor;
  private readonly aligner: IntentAligner;
  private readonly phaseGate: PhaseGate;
  private readonly indeterminate: IndeterminatePolicies;
  private readonly eventSinks: EventSinkPluginInterface[];
  private readonly pendingEvents = new Set<Promise<void>>();

  constructor(options: ValidationFacadeOptions = {}) {
    this.policyStore = options.policyStore ?? new PolicyStore();
    this.duplicates = options.duplicateSuppressor ?? new DuplicateSuppressor();
    this.aligner = options.intentAligner ?? new IntentAligner();
    this.phaseGate = options.phaseGate ?? new PhaseGate();
    this.indeterminate = {
      duplicate: options.indeterminate?.duplicate ?? DEFAULT_INDETERMINATE_POLICIES.duplicate,
      alignment: options.indeterminate?.alignment ?? DEFAULT_INDETERMINATE_POLICIES.alignment,
    };
    this.eventSinks = options.eventSinks ?? [];
  }

  async resolveRole(config: unknown): Promise<string> {
    const policy = await this.policyStore.load();
    return resolveRole(config, policy);
  }

  /** Tools from `tools` that the role resolved from `config` may call. */
  async filterToolsByRole<T extends ToolDescriptor>(
    config: unknown,
    tools: Iterable<T>,
  ): Promise<T[]> {
    const policy = await this.policyStore.load();
    return filterToolsByRole(policy, resolveRole(config, policy), tools);
  }

  checkStructuredOutputConflict(schemas: readonly unknown[]): ConflictCheckResult {
    return checkStructuredOutputConflict(schemas);
  }

  async validate(
    config: unknown,
    toolCall: unknown,
    messages?: readonly TextMessage[] | null,
    phase: Phase = DEFAULT_PHASE,
  ): Promise<ValidationResult> {
    const parsed = toolCallSchema.safeParse(toolCall);
    const result = parsed.success
      ? await this.evaluate(config, { name: parsed.data.name, args: parsed.data.args ?? {} }, messages, phase)
      : deny("shape", null, DecisionCode.MALFORMED_TOOL_CALL, "Malformed tool call");

    if (result.allowed) {
      logger.debug({ toolName: parsed.data?.name, role: result.role, phase }, "Tool call allowed");
    } else {
      logger.debug(
        { toolName: parsed.data?.name, role: result.role, phase, code: result.code, stage: result.stage },
        "Tool call denied",
      );
    }

    this.track(
      emitDecisionEvent(
        this.eventSinks,
        buildDecisionEvent(result, { toolName: parsed.data?.name, phase }),
      ),
    );
    return result;
  }

  /** Resolves once every decision event emitted so far has reached its sinks. */
  async flushEvents(): Promise<void> {
    await Promise.all([...this.pendingEvents]);
  }

  /** Drop the cached policy and forget every recorded call. */
  reset(): void {
    this.policyStore.reset();
    this.duplicates.clear();
  }

  private track(emission: Promise<void>): void {
    const pending: Promise<void> = emission.finally(() => {
      this.pendingEvents.delete(pending);
    });
    this.pendingEvents.add(pending);
  }

  private async evaluate(
    config: unknown,
    call: ToolCall,
    messages: readonly TextMessage[] | null | undefined,
    phase: string,
  ): Promise<ValidationResult> {
    const policy = await this.policyStore.load();
    // No await from here on: the duplicate check-and-record must not interleave.
    const role = resolveRole(config, policy);

    if (!isToolAllowedForRole(policy, role, call.name)) {
      return deny(
        "permission",
        role,
        DecisionCode.FORBIDDEN_TOOL,
        `Tool '${call.name}' not allowed for role '${role}'`,
      );
    }

    const phaseOutcome = this.phaseGate.check(phase, call.name);
    if (phaseOutcome.status === "fail") {
      return deny("phase", role, phaseOutcome.code, phaseOutcome.reason);
    }

    const duplicate = this.settle("duplicate", this.checkDuplicate(call, policy.duplicateWindowSeconds), {
      code: DecisionCode.DUPLICATE_CHECK_FAILED,
      reason: "Duplicate check failed",
    });
    if (duplicate.status === "fail") {
      return deny("duplicate", role, duplicate.code, duplicate.reason);
    }

    const alignment = this.settle("alignment", this.checkAlignment(call, messages), {
      code: DecisionCode.ALIGNMENT_CHECK_FAILED,
      reason: "Intent alignment check failed",
    });
    if (alignment.status === "fail") {
      return deny("alignment", role, alignment.code, alignment.reason);
    }

    return { allowed: true, reason: "allowed", code: DecisionCode.ALLOWED, stage: null, role };
  }

  private checkDuplicate(call: ToolCall, windowSeconds: number): StageOutcome {
    let duplicate: boolean;
    try {
      duplicate = this.duplicates.isDuplicate(call, windowSeconds);
    } catch (error) {
      return { status: "indeterminate", error };
    }
    return duplicate
      ? { status: "fail", code: DecisionCode.DUPLICATE_CALL, reason: "Duplicate tool call suppressed" }
      : PASS;
  }

  private checkAlignment(
    call: ToolCall,
    messages: readonly TextMessage[] | null | undefined,
  ): StageOutcome {
    let aligned: boolean;
    try {
      aligned = this.aligner.isAligned(messages, call.args);
    } catch (error) {
      return { status: "indeterminate", error };
    }
    return aligned
      ? PASS
      : {
          status: "fail",
          code: DecisionCode.INTENT_MISMATCH,
          reason: "Tool call appears unrelated to user intent",
        };
  }

  /** Resolve an indeterminate outcome through the stage's configured policy. */
  private settle(
    stage: keyof IndeterminatePolicies,
    outcome: StageOutcome,
    onConservative: { code: DecisionCodeValue; reason: string },
  ): SettledOutcome {
    if (outcome.status !== "indeterminate") return outcome;
    const policy = this.indeterminate[stage];
    logger.warn({ err: outcome.error, stage, policy }, "Validation stage could not decide");
    return policy === "conservative"
      ? { status: "fail", ...onConservative }
      : PASS;
  }
}
