import { z } from "zod";
import type { StoredEvent } from "../../interfaces/EventSinkRepository.js";

/** Columns selected when listing callgate_events, aliased to StoredEvent keys. */
export const EVENT_LIST_COLUMNS = `event_id AS "eventId", timestamp, tool_name AS "toolName", role, phase,
       decision, code, reason, stage`;

const storedEventRowSchema = z.object({
  eventId: z.string(),
  timestamp: z.string(),
  toolName: z.string().nullable(),
  role: z.string().nullable(),
  phase: z.string().nullable(),
  decision: z.string(),
  code: z.string(),
  reason: z.string(),
  stage: z.string().nullable(),
});

/** Clamp a caller-supplied list limit to 1..1000 (default 100). */
export function listLimit(options?: { limit?: number }): number {
  return Math.min(Math.max(options?.limit ?? 100, 1), 1000);
}

export function toStoredEvent(row: unknown): StoredEvent {
  const r = storedEventRowSchema.parse(row);
  return {
    eventId: r.eventId,
    timestamp: r.timestamp,
    ...(r.toolName != null && { toolName: r.toolName }),
    ...(r.role != null && { role: r.role }),
    ...(r.phase != null && { phase: r.phase }),
    decision: r.decision,
    code: r.code,
    reason: r.reason,
    ...(r.stage != null && { stage: r.stage }),
  };
}
