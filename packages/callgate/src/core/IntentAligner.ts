import type { TextMessage } from "../interfaces/ToolCallTypes.js";

export interface IntentAlignerOptions {
  /** Tokens shorter than this are ignored. Default 4 (i.e. longer than 3 characters). */
  minTokenLength?: number;
  /** Shared tokens required for a call to count as aligned. Default 1. */
  minOverlap?: number;
}

/**
 * Coarse lexical check that a call's arguments relate to what the user asked.
 *
 * Message text and the JSON-serialized args are split on whitespace, case-folded and
 * filtered by length. Punctuation stays attached, so `report.` and `report"}` differ.
 * The call is flagged only when both sides yield tokens and they share fewer than
 * minOverlap of them.
 * This is approximate: synonyms, stemming and paraphrase are not recognized, so it
 * should only ever catch calls that look unrelated on their face.
 */
export class IntentAligner {
  private readonly minTokenLength: number;
  private readonly minOverlap: number;

  constructor(options: IntentAlignerOptions = {}) {
    this.minTokenLength = options.minTokenLength ?? 4;
    this.minOverlap = options.minOverlap ?? 1;
  }

  /**
   * False only on a confident finding of no overlap. Missing or empty messages give no
   * signal and count as aligned. Throws when args cannot be serialized.
   */
  isAligned(messages: readonly TextMessage[] | null | undefined, args: unknown): boolean {
    if (!messages || messages.length === 0) return true;

    const userTokens = this.tokenize(messages.map((m) => m.content).join(" "));
    const argTokens = this.tokenize(JSON.stringify(args ?? {}));
    if (userTokens.size === 0 || argTokens.size === 0) return true;

    let shared = 0;
    for (const token of argTokens) {
      if (shared >= this.minOverlap) break;
      if (userTokens.has(token)) shared++;
    }
    return shared >= this.minOverlap;
  }

  tokenize(text: string): Set<string> {
    const tokens = new Set<string>();
    for (const raw of text.split(/\s+/)) {
      const token = raw.toLowerCase();
      if (token.length >= this.minTokenLength) tokens.add(token);
    }
    return tokens;
  }
}
