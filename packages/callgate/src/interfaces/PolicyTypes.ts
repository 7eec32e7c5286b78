/** Allow-list entry that grants every tool to a role. */
export const WILDCARD_TOOL = "*";

export interface RoleConfig {
  /** Tool names this role may call. Contains WILDCARD_TOOL for "all tools"; empty means none. */
  readonly allowedTools: ReadonlySet<string>;
}

/**
 * Authorization policy, immutable once loaded.
 * Roles are kept in a Map so names such as "constructor" never hit Object.prototype.
 */
export interface Policy {
  readonly roles: ReadonlyMap<string, RoleConfig>;
  /** Role used when the request config names none. */
  readonly defaultRole: string;
  /** How long an identical call stays suppressed after its first sighting. */
  readonly duplicateWindowSeconds: number;
}
