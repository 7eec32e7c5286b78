import type { Policy } from "../interfaces/PolicyTypes.js";
import { DEFAULT_ROLE } from "../policy/schema.js";
import { logger } from "../logger.js";

/** Nested config fields consulted for the role, in order. */
const ROLE_CONTAINERS = ["configurable", "metadata"] as const;

function readProperty(source: unknown, key: string): unknown {
  if (typeof source !== "object" || source === null) return undefined;
  const value: unknown = Reflect.get(source, key);
  return value;
}

function roleFrom(config: unknown, container: string): string | undefined {
  try {
    const role = readProperty(readProperty(config, container), "role");
    return typeof role === "string" && role.trim() !== "" ? role : undefined;
  } catch (err) {
    // Throwing getters on caller-supplied objects fall through to the next source.
    logger.debug({ err, container }, "Role lookup failed");
    return undefined;
  }
}

/**
 * Resolve the acting role from a request-scoped config: configurable.role, then
 * metadata.role, then the policy's default role. Accepts any value (null, strings,
 * partially-shaped objects) and never returns an empty string.
 */
export function resolveRole(config: unknown, policy: Policy): string {
  for (const container of ROLE_CONTAINERS) {
    const role = roleFrom(config, container);
    if (role !== undefined) return role;
  }
  return policy.defaultRole !== "" ? policy.defaultRole : DEFAULT_ROLE;
}
