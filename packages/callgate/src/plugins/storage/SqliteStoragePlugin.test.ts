import { afterEach, describe, expect, it } from "vitest";
import type { CallgateEvent } from "../../interfaces/EventSinkPluginInterface.js";
import { SqliteStoragePlugin } from "./SqliteStoragePlugin.js";

function event(eventId: string, overrides: Partial<CallgateEvent> = {}): CallgateEvent {
  return {
    eventId,
    timestamp: "2026-01-01T00:00:00.000Z",
    schemaVersion: "0.1.0",
    eventType: "tool_call.validated",
    toolName: "ConductResearch",
    role: "researcher",
    phase: "research",
    decision: "ALLOWED",
    code: "ALLOWED",
    reason: "allowed",
    ...overrides,
  };
}

describe("SqliteStoragePlugin", () => {
  let plugin: SqliteStoragePlugin | null = null;

  afterEach(() => {
    plugin?.end();
    plugin = null;
  });

  function connected(): SqliteStoragePlugin {
    plugin = new SqliteStoragePlugin({ inMemory: true });
    expect(plugin.connect().ok).toBe(true);
    plugin.start();
    return plugin;
  }

  it("requires exactly one of database and inMemory", () => {
    expect(() => new SqliteStoragePlugin({})).toThrow(
      "SqliteStoragePlugin: set either 'database' (file path) or 'inMemory: true'.",
    );
    expect(() => new SqliteStoragePlugin({ database: "  " })).toThrow(
      "SqliteStoragePlugin: set either 'database' (file path) or 'inMemory: true'.",
    );
    expect(() => new SqliteStoragePlugin({ database: "events.db", inMemory: true })).toThrow(
      "SqliteStoragePlugin: set either 'database' (file path) or 'inMemory: true', not both.",
    );
    expect(() => new SqliteStoragePlugin({ inMemory: "yes" })).toThrow(
      /^SqliteStoragePlugin invalid config: /,
    );
  });

  it("has no repository before connect()", () => {
    expect(new SqliteStoragePlugin({ inMemory: true }).getEventSinkRepository()).toBeUndefined();
  });

  it("stores events and lists them newest first", async () => {
    const repo = connected().getEventSinkRepository();
    expect(repo).toBeDefined();

    await repo?.insert(event("evt-a"));
    await repo?.insert(
      event("evt-b", {
        decision: "BLOCKED",
        code: "DUPLICATE_CALL",
        reason: "Duplicate tool call suppressed",
        stage: "duplicate",
      }),
    );
    await repo?.insert(
      event("evt-c", {
        toolName: undefined,
        role: undefined,
        decision: "BLOCKED",
        code: "MALFORMED_TOOL_CALL",
        reason: "Malformed tool call",
        stage: "shape",
      }),
    );

    const rows = await repo?.list();
    expect(rows?.map((r) => r.eventId)).toEqual(["evt-c", "evt-b", "evt-a"]);
    expect(rows?.[0]).toEqual({
      eventId: "evt-c",
      timestamp: "2026-01-01T00:00:00.000Z",
      phase: "research",
      decision: "BLOCKED",
      code: "MALFORMED_TOOL_CALL",
      reason: "Malformed tool call",
      stage: "shape",
    });
    expect(rows?.[2]).toEqual({
      eventId: "evt-a",
      timestamp: "2026-01-01T00:00:00.000Z",
      toolName: "ConductResearch",
      role: "researcher",
      phase: "research",
      decision: "ALLOWED",
      code: "ALLOWED",
      reason: "allowed",
    });
    expect(await repo?.list({ limit: 1 })).toHaveLength(1);
  });

  it("drops the repository on disconnect", () => {
    const p = connected();
    p.disconnect();
    expect(p.getEventSinkRepository()).toBeUndefined();
  });
});
