import type {
  EventSinkPluginInterface,
  CallgateEvent,
} from "../../interfaces/EventSinkPluginInterface.js";
import type { CallgatePluginContext } from "../../interfaces/CallgatePluginContext.js";
import { logger } from "../../logger.js";

/**
 * EventSink that persists CallgateEvent to the database via the storage adapter's
 * EventSinkRepository. Registered as "sqlite" and "postgres"; pair it with the storage
 * plugin of the same name. Without a connected repository in context, emit() is a
 * no-op (logs at debug).
 */
export class StorageEventSink implements EventSinkPluginInterface {
  constructor(
    readonly name: string,
    private readonly context?: CallgatePluginContext,
  ) {}

  async emit(event: CallgateEvent): Promise<void> {
    const repo = this.context?.storage?.getEventSinkRepository();
    if (!repo) {
      logger.debug(
        { eventId: event.eventId, sink: this.name },
        "StorageEventSink: no EventSinkRepository in context, skipping persist",
      );
      return;
    }
    await repo.insert(event);
  }
}
