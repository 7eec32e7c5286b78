import { WILDCARD_TOOL } from "../interfaces/PolicyTypes.js";
import type { Policy } from "../interfaces/PolicyTypes.js";
import type { ToolDescriptor } from "../interfaces/ToolCallTypes.js";

/**
 * Whether `role` may call `toolName`. Unknown roles and empty allow-lists allow nothing;
 * WILDCARD_TOOL allows any non-empty name. Otherwise the name must be listed exactly
 * (no prefix or pattern matching).
 */
export function isToolAllowedForRole(
  policy: Policy,
  role: string,
  toolName: string,
): boolean {
  const allowed = policy.roles.get(role)?.allowedTools;
  if (!allowed || allowed.size === 0) return false;
  if (toolName === "") return false;
  if (allowed.has(WILDCARD_TOOL)) return true;
  return allowed.has(toolName);
}

/** Tool name carried by a descriptor, or "" when it has none. */
export function toolNameOf(tool: unknown): string {
  if (typeof tool !== "object" || tool === null || !("name" in tool)) {
    return "";
  }
  return typeof tool.name === "string" ? tool.name : "";
}

/**
 * Keep the tools `role` may call, preserving order. Descriptors without a usable
 * name are dropped.
 */
export function filterToolsByRole<T extends ToolDescriptor>(
  policy: Policy,
  role: string,
  tools: Iterable<T>,
): T[] {
  const filtered: T[] = [];
  for (const tool of tools) {
    const name = toolNameOf(tool);
    if (name === "") continue;
    if (isToolAllowedForRole(policy, role, name)) {
      filtered.push(tool);
    }
  }
  return filtered;
}
