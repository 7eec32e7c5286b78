import pino from "pino";
import { describe, expect, it } from "vitest";
import type { CallgateEvent } from "../../interfaces/EventSinkPluginInterface.js";
import { LoggerEventSink } from "./LoggerEventSink.js";

function capturingLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "info", base: null, timestamp: false },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

const base: CallgateEvent = {
  eventId: "evt-1",
  timestamp: "2026-01-01T00:00:00.000Z",
  schemaVersion: "0.1.0",
  eventType: "tool_call.validated",
  toolName: "ConductResearch",
  role: "researcher",
  phase: "research",
  decision: "ALLOWED",
  code: "ALLOWED",
  reason: "allowed",
};

describe("LoggerEventSink", () => {
  it("logs allowed calls at info", async () => {
    const { logger, lines } = capturingLogger();
    await new LoggerEventSink(logger).emit(base);
    expect(lines).toEqual([
      {
        level: 30,
        eventId: "evt-1",
        toolName: "ConductResearch",
        role: "researcher",
        phase: "research",
        msg: "Tool call allowed",
      },
    ]);
  });

  it("logs blocked calls at warn with the reason", async () => {
    const { logger, lines } = capturingLogger();
    await new LoggerEventSink(logger).emit({
      ...base,
      decision: "BLOCKED",
      code: "DUPLICATE_CALL",
      reason: "Duplicate tool call suppressed",
      stage: "duplicate",
    });
    expect(lines).toEqual([
      {
        level: 40,
        eventId: "evt-1",
        toolName: "ConductResearch",
        role: "researcher",
        phase: "research",
        code: "DUPLICATE_CALL",
        stage: "duplicate",
        reason: "Duplicate tool call suppressed",
        msg: "Tool call blocked",
      },
    ]);
  });
});
