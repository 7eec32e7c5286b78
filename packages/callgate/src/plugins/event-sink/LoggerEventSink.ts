import type {
  EventSinkPluginInterface,
  CallgateEvent,
} from "../../interfaces/EventSinkPluginInterface.js";
import type { Logger } from "../../logger.js";
import { logger as defaultLogger } from "../../logger.js";

/** Writes every decision as one structured log line (info for allowed, warn for blocked). */
export class LoggerEventSink implements EventSinkPluginInterface {
  readonly name = "log";

  constructor(private readonly logger: Logger = defaultLogger) {}

  async emit(event: CallgateEvent): Promise<void> {
    const { eventId, toolName, role, phase, code, stage } = event;
    if (event.decision === "ALLOWED") {
      this.logger.info({ eventId, toolName, role, phase }, "Tool call allowed");
    } else {
      this.logger.warn(
        { eventId, toolName, role, phase, code, stage, reason: event.reason },
        "Tool call blocked",
      );
    }
  }
}
