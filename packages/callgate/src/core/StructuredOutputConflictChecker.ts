import type { ConflictCheckResult } from "../interfaces/ValidationTypes.js";

function isStrictJsonSchema(descriptor: unknown): boolean {
  if (typeof descriptor !== "object" || descriptor === null) return false;
  if (!("type" in descriptor) || descriptor.type !== "json_schema") return false;
  return "strict" in descriptor && Boolean(descriptor.strict);
}

/**
 * More than one strict json_schema response format in the same request is a conflict.
 * Entries are response format declarations ({ type, strict, ... }) as sent by the caller;
 * entries that are not objects are skipped.
 */
export function checkStructuredOutputConflict(
  schemas: readonly unknown[],
): ConflictCheckResult {
  const strictCount = schemas.filter(isStrictJsonSchema).length;
  if (strictCount > 1) {
    return {
      ok: false,
      reason: "Multiple strict json_schema response formats detected",
    };
  }
  return { ok: true, reason: "ok" };
}
