import { describe, expect, it } from "vitest";
import { checkStructuredOutputConflict } from "./StructuredOutputConflictChecker.js";

describe("checkStructuredOutputConflict", () => {
  it("reports two strict json_schema formats as a conflict", () => {
    expect(
      checkStructuredOutputConflict([
        { type: "json_schema", strict: true },
        { type: "json_schema", strict: true },
      ]),
    ).toEqual({ ok: false, reason: "Multiple strict json_schema response formats detected" });
  });

  it("accepts one strict json_schema alongside other formats", () => {
    expect(
      checkStructuredOutputConflict([{ type: "json_schema", strict: true }, { type: "text" }]),
    ).toEqual({ ok: true, reason: "ok" });
  });

  it("ignores non-strict json_schema entries", () => {
    expect(
      checkStructuredOutputConflict([
        { type: "json_schema", strict: true },
        { type: "json_schema", strict: false },
        { type: "json_schema" },
      ]).ok,
    ).toBe(true);
  });

  it("accepts an empty list", () => {
    expect(checkStructuredOutputConflict([])).toEqual({ ok: true, reason: "ok" });
  });

  it("skips entries that are not objects", () => {
    expect(
      checkStructuredOutputConflict([null, "json_schema", 42, { type: "json_schema", strict: 1 }])
        .ok,
    ).toBe(true);
  });
});
