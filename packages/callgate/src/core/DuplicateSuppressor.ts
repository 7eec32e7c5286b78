import type { ToolCall } from "../interfaces/ToolCallTypes.js";
import { fingerprintToolCall } from "./fingerprint.js";
import { logger } from "../logger.js";

export const DEFAULT_MAX_ENTRIES = 1000;

export interface DuplicateSuppressorOptions {
  /** Table size above which expired entries are pruned. Default 1000. */
  maxEntries?: number;
  /** Clock in milliseconds. Default Date.now. */
  now?: () => number;
}

/**
 * Suppresses repeats of an identical call (same name, same args in any key order)
 * within a time window anchored at the first sighting.
 *
 * The table keeps fingerprints in last-seen order: a sighting re-inserts its key at
 * the end. Pruning therefore walks from the oldest entry and stops at the first one
 * still inside the window, so it never scans live entries.
 *
 * isDuplicate() is synchronous from lookup to insert. Concurrent validations on the
 * event loop cannot interleave between the two, so at most one call per fingerprint
 * passes per window.
 */
export class DuplicateSuppressor {
  private readonly calls = new Map<string, number>();
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: DuplicateSuppressorOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
    this.now = options.now ?? Date.now;
  }

  /**
   * True when the same call was first seen less than `windowSeconds` ago; the original
   * sighting keeps anchoring the window. Otherwise records now as the call's first
   * sighting and returns false. Throws when the call cannot be fingerprinted.
   */
  isDuplicate(call: ToolCall, windowSeconds: number): boolean {
    const fingerprint = fingerprintToolCall(call);
    const now = this.now();
    const windowMs = windowSeconds * 1000;

    const lastSeen = this.calls.get(fingerprint);
    if (lastSeen !== undefined && now - lastSeen < windowMs) {
      return true;
    }

    this.calls.delete(fingerprint);
    this.calls.set(fingerprint, now);
    this.prune(now, windowMs);
    return false;
  }

  get size(): number {
    return this.calls.size;
  }

  clear(): void {
    this.calls.clear();
  }

  private prune(now: number, windowMs: number): void {
    if (this.calls.size <= this.maxEntries) return;
    const cutoff = now - windowMs;
    let removed = 0;
    for (const [fingerprint, lastSeen] of this.calls) {
      if (lastSeen >= cutoff) break;
      this.calls.delete(fingerprint);
      removed++;
    }
    logger.debug(
      { removed, remaining: this.calls.size },
      "Pruned expired duplicate-call entries",
    );
  }
}
