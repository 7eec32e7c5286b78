import { v7 as uuidv7 } from "uuid";
import type {
  CallgateEvent,
  EventSinkPluginInterface,
} from "../interfaces/EventSinkPluginInterface.js";
import type { ValidationResult } from "../interfaces/ValidationTypes.js";
import { logger } from "../logger.js";

/** Build a CallgateEvent for the result of validating one tool call. */
export function buildDecisionEvent(
  result: ValidationResult,
  context: { toolName?: string; phase?: string },
): CallgateEvent {
  return {
    eventId: uuidv7(),
    timestamp: new Date().toISOString(),
    schemaVersion: "0.1.0",
    eventType: "tool_call.validated",
    ...(context.toolName != null && context.toolName !== "" && { toolName: context.toolName }),
    ...(result.role != null && { role: result.role }),
    ...(context.phase != null && { phase: context.phase }),
    decision: result.allowed ? "ALLOWED" : "BLOCKED",
    code: result.code,
    reason: result.reason,
    ...(result.stage != null && { stage: result.stage }),
  };
}

/**
 * Emit a decision to all event sinks. Logs sink errors but does not throw.
 */
export async function emitDecisionEvent(
  eventSinks: readonly EventSinkPluginInterface[],
  event: CallgateEvent,
): Promise<void> {
  if (eventSinks.length === 0) return;
  await Promise.all(
    eventSinks.map((sink) =>
      Promise.resolve()
        .then(() => sink.emit(event))
        .catch((err: unknown) => {
          logger.warn({ err, sink: sink.name, eventId: event.eventId }, "EventSink emit failed");
        }),
    ),
  );
}
