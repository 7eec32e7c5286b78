import { describe, expect, it } from "vitest";
import { canonicalJson, fingerprintToolCall } from "./fingerprint.js";

describe("canonicalJson", () => {
  it("sorts keys at every depth", () => {
    expect(canonicalJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } })).toBe(
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}',
    );
  });

  it("keeps array order", () => {
    expect(canonicalJson({ ids: [3, 1, 2] })).toBe('{"ids":[3,1,2]}');
  });

  it("treats missing args as an empty object", () => {
    expect(canonicalJson(undefined)).toBe("{}");
    expect(canonicalJson(null)).toBe("{}");
  });

  it("serializes repeated but acyclic references", () => {
    const shared = { q: "x" };
    expect(canonicalJson({ a: shared, b: shared })).toBe('{"a":{"q":"x"},"b":{"q":"x"}}');
  });

  it("throws on cyclic args", () => {
    const args: Record<string, unknown> = { q: "x" };
    args.self = args;
    expect(() => canonicalJson(args)).toThrow(TypeError);
  });

  it("serializes values through toJSON", () => {
    expect(canonicalJson({ at: new Date("2026-01-01T00:00:00.000Z") })).toBe(
      '{"at":"2026-01-01T00:00:00.000Z"}',
    );
    expect(canonicalJson({ range: { toJSON: () => ({ to: 9, from: 1 }) } })).toBe(
      '{"range":{"from":1,"to":9}}',
    );
  });

  it("accepts objects without a prototype", () => {
    const bare: Record<string, unknown> = Object.create(null);
    bare.b = 2;
    bare.a = 1;
    expect(canonicalJson({ bare })).toBe('{"bare":{"a":1,"b":2}}');
  });

  it("throws on Map, Set and class instances", () => {
    class Cursor {
      constructor(readonly offset: number) {}
    }
    expect(() => canonicalJson({ m: new Map([["a", 1]]) })).toThrow(TypeError);
    expect(() => canonicalJson({ s: new Set([1]) })).toThrow(TypeError);
    expect(() => canonicalJson({ c: new Cursor(3) })).toThrow(TypeError);
  });

  it("throws on BigInt values", () => {
    expect(() => canonicalJson({ n: 10n })).toThrow(TypeError);
  });
});

describe("fingerprintToolCall", () => {
  it("ignores argument insertion order", () => {
    expect(fingerprintToolCall({ name: "A", args: { x: 1, y: 2 } })).toBe(
      fingerprintToolCall({ name: "A", args: { y: 2, x: 1 } }),
    );
  });

  it("distinguishes names and values", () => {
    const base = fingerprintToolCall({ name: "A", args: { x: 1 } });
    expect(fingerprintToolCall({ name: "B", args: { x: 1 } })).not.toBe(base);
    expect(fingerprintToolCall({ name: "A", args: { x: 2 } })).not.toBe(base);
    expect(fingerprintToolCall({ name: "A", args: { x: "1" } })).not.toBe(base);
  });

  it("is a sha256 hex digest", () => {
    expect(fingerprintToolCall({ name: "A", args: {} })).toMatch(/^[0-9a-f]{64}$/);
  });
});
