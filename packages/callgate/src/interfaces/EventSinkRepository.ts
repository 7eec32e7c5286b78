import type { CallgateEvent } from "./EventSinkPluginInterface.js";

/** One row from callgate_events, newest first when listed. */
export interface StoredEvent {
  eventId: string;
  timestamp: string;
  toolName?: string;
  role?: string;
  phase?: string;
  decision: string;
  code: string;
  reason: string;
  stage?: string;
}

/**
 * Repository for persisting and listing CallgateEvent. Storage adapters expose it
 * via getEventSinkRepository() once connected.
 */
export interface EventSinkRepository {
  insert(event: CallgateEvent): Promise<void>;

  /** List recent events, newest first. */
  list(options?: { limit?: number }): Promise<StoredEvent[]>;
}
