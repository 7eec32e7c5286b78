import type { StageOutcome } from "../interfaces/ValidationTypes.js";
import { DecisionCode } from "../interfaces/ValidationTypes.js";

/**
 * Restriction a phase places on tool calls.
 * - deny-all: no tool may be called.
 * - allow-list: only the listed tool names may be called.
 */
export type PhaseRule =
  | { type: "deny-all" }
  | { type: "allow-list"; allowedTools: readonly string[] };

/** Orchestration-control tools the research supervisor may call. */
export const RESEARCH_CONTROL_TOOLS = ["ConductResearch", "ResearchComplete"] as const;

export const DEFAULT_PHASE_RULES: Readonly<Record<string, PhaseRule>> = {
  clarify: { type: "deny-all" },
  research: { type: "allow-list", allowedTools: RESEARCH_CONTROL_TOOLS },
};

/**
 * Per-call phase check. Phases without a rule add no restriction beyond role permission.
 * Rules passed to the constructor replace the defaults for the same phase.
 */
export class PhaseGate {
  private readonly rules = new Map<string, PhaseRule>();

  constructor(overrides: Readonly<Record<string, PhaseRule>> = {}) {
    for (const [phase, rule] of Object.entries({ ...DEFAULT_PHASE_RULES, ...overrides })) {
      this.rules.set(phase, rule);
    }
  }

  check(phase: string, toolName: string): StageOutcome {
    const rule = this.rules.get(phase);
    if (!rule) return { status: "pass" };

    switch (rule.type) {
      case "deny-all":
        return {
          status: "fail",
          code: DecisionCode.PHASE_RESTRICTED,
          reason: `Tools prohibited during ${phase} phase`,
        };
      case "allow-list":
        if (rule.allowedTools.includes(toolName)) return { status: "pass" };
        return {
          status: "fail",
          code: DecisionCode.PHASE_RESTRICTED,
          reason: `Tool '${toolName}' not allowed during ${phase} phase`,
        };
    }
  }
}
