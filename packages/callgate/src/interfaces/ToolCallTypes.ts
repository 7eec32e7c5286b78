/**
 * Pipeline stage that issued a call. "clarify" and "research" carry built-in rules;
 * any other tag is passed through to role checks only.
 */
export type Phase = "clarify" | "research" | (string & {});

/** A proposed tool invocation after shape validation. */
export interface ToolCall {
  name: string;
  /** Arbitrary structured arguments. Missing args are treated as {}. */
  args: unknown;
}

/** Anything that names a tool: a JSON tool schema, a bound tool object, etc. */
export interface ToolDescriptor {
  name?: string;
}

/** Capability a conversation message needs for intent alignment: its text. */
export interface TextMessage {
  readonly content: string;
}
