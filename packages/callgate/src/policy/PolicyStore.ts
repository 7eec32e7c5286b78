import { join } from "node:path";
import type { Policy } from "../interfaces/PolicyTypes.js";
import type { PolicySource } from "../interfaces/PolicySource.js";
import { defaultPolicy, parsePolicyDocument } from "./schema.js";
import { FilePolicySource } from "./sources.js";
import { logger } from "../logger.js";

export const DEFAULT_POLICY_FILE = "tool_policy.json";

/**
 * Loads the authorization policy once and caches it.
 *
 * Concurrent first callers share one in-flight read, so every caller observes the same
 * Policy instance. Read or validation failures never reach the caller: the store logs a
 * warning and caches the built-in default policy instead. reset() drops the cache so the
 * next load() reads the source again.
 */
export class PolicyStore {
  private policy: Policy | null = null;
  private loading: Promise<Policy> | null = null;

  constructor(
    private readonly source: PolicySource = new FilePolicySource(
      join(process.cwd(), DEFAULT_POLICY_FILE),
    ),
  ) {}

  load(): Promise<Policy> {
    if (this.policy !== null) return Promise.resolve(this.policy);
    if (this.loading === null) {
      const pending: Promise<Policy> = this.readPolicy().then((policy) => {
        // A reset() during the read discards this result for later callers.
        if (this.loading === pending) {
          this.policy = policy;
          this.loading = null;
        }
        return policy;
      });
      this.loading = pending;
    }
    return this.loading;
  }

  /** The cached policy, or null before the first load() completes. */
  current(): Policy | null {
    return this.policy;
  }

  reset(): void {
    this.policy = null;
    this.loading = null;
  }

  private async readPolicy(): Promise<Policy> {
    let raw: unknown;
    try {
      raw = await this.source.read();
    } catch (err) {
      logger.warn(
        { err, source: this.source.description },
        "Policy source unreadable, using built-in default policy",
      );
      return defaultPolicy();
    }

    const parsed = parsePolicyDocument(raw);
    if (!parsed.success) {
      logger.warn(
        { source: this.source.description, issues: parsed.error.issues },
        "Policy document invalid, using built-in default policy",
      );
      return defaultPolicy();
    }

    logger.debug(
      {
        source: this.source.description,
        roles: [...parsed.policy.roles.keys()],
        defaultRole: parsed.policy.defaultRole,
        duplicateWindowSeconds: parsed.policy.duplicateWindowSeconds,
      },
      "Policy loaded",
    );
    return parsed.policy;
  }
}
