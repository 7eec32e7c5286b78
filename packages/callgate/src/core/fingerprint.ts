import { createHash } from "node:crypto";
import type { ToolCall } from "../interfaces/ToolCallTypes.js";

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function sortKeys(value: unknown, ancestors: Set<object>): unknown {
  if (typeof value !== "object" || value === null) {
    return value;
  }
  if (ancestors.has(value)) {
    throw new TypeError("Cannot fingerprint cyclic tool call arguments");
  }
  ancestors.add(value);
  try {
    const toJSON: unknown = Reflect.get(value, "toJSON");
    if (typeof toJSON === "function") {
      const serialized: unknown = Reflect.apply(toJSON, value, []);
      return sortKeys(serialized, ancestors);
    }
    if (Array.isArray(value)) {
      return value.map((item: unknown) => sortKeys(item, ancestors));
    }
    const prototype: unknown = Object.getPrototypeOf(value);
    if (prototype !== Object.prototype && prototype !== null) {
      // Map, Set and class instances would all serialize to {}.
      throw new TypeError("Cannot fingerprint non-plain objects in tool call arguments");
    }
    const entries: Array<[string, unknown]> = Object.entries(value);
    return Object.fromEntries(
      entries.sort(byKey).map(([key, item]) => [key, sortKeys(item, ancestors)]),
    );
  } finally {
    ancestors.delete(value);
  }
}

/**
 * JSON serialization with object keys sorted at every depth, so semantically identical
 * args serialize identically regardless of insertion order. Objects with toJSON (Date)
 * serialize through it. Throws on cycles, on BigInt and on non-plain objects without
 * toJSON (Map, Set, class instances).
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value ?? {}, new Set()));
}

/** SHA-256 over the tool name and its canonical args. */
export function fingerprintToolCall(call: ToolCall): string {
  return createHash("sha256")
    .update(call.name, "utf8")
    .update("\u0000", "utf8")
    .update(canonicalJson(call.args), "utf8")
    .digest("hex");
}
