/** One validation decision, emitted to every configured event sink. */
export type CallgateEvent = {
  eventId: string;
  timestamp: string; // ISO

  eventType: "tool_call.validated";

  /** Tool name from the proposed call; absent when the call was malformed. */
  toolName?: string;
  role?: string;
  phase?: string;

  decision: "ALLOWED" | "BLOCKED";
  code: string;
  reason: string;
  /** Stage that denied the call. */
  stage?: string;

  schemaVersion: "0.1.0";
};

export interface EventSinkPluginInterface {
  readonly name: string;

  emit(event: CallgateEvent): Promise<void>;

  /** Write out anything buffered. Called before shutdown(). */
  flush?(): Promise<void>;

  /** Release resources. Called once when the process is done with the sink. */
  shutdown?(): Promise<void>;
}
