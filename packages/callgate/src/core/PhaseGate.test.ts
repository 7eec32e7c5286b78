import { describe, expect, it } from "vitest";
import { PhaseGate } from "./PhaseGate.js";

describe("PhaseGate", () => {
  const gate = new PhaseGate();

  it("denies every tool during clarify", () => {
    for (const tool of ["ConductResearch", "ResearchComplete", "web_search"]) {
      expect(gate.check("clarify", tool)).toEqual({
        status: "fail",
        code: "PHASE_RESTRICTED",
        reason: "Tools prohibited during clarify phase",
      });
    }
  });

  it("allows only orchestration-control tools during research", () => {
    expect(gate.check("research", "ConductResearch")).toEqual({ status: "pass" });
    expect(gate.check("research", "ResearchComplete")).toEqual({ status: "pass" });
    expect(gate.check("research", "web_search")).toEqual({
      status: "fail",
      code: "PHASE_RESTRICTED",
      reason: "Tool 'web_search' not allowed during research phase",
    });
  });

  it("passes through phases without a rule", () => {
    expect(gate.check("report", "web_search")).toEqual({ status: "pass" });
    expect(gate.check("", "web_search")).toEqual({ status: "pass" });
  });

  it("lets configured rules replace and extend the defaults", () => {
    const custom = new PhaseGate({
      research: { type: "allow-list", allowedTools: ["ConductResearch", "think_tool"] },
      review: { type: "deny-all" },
    });

    expect(custom.check("research", "think_tool")).toEqual({ status: "pass" });
    expect(custom.check("research", "ResearchComplete").status).toBe("fail");
    expect(custom.check("review", "think_tool")).toEqual({
      status: "fail",
      code: "PHASE_RESTRICTED",
      reason: "Tools prohibited during review phase",
    });
    expect(custom.check("clarify", "think_tool").status).toBe("fail");
  });
});
