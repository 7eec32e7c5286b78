import { z } from "zod";
import type { Policy, RoleConfig } from "../interfaces/PolicyTypes.js";

export const DEFAULT_ROLE = "researcher";
export const DEFAULT_DUPLICATE_WINDOW_SECONDS = 300;

const roleConfigSchema = z.object({
  /** Tool names the role may call; ["*"] grants every tool. */
  allowed_tools: z.array(z.string()).default([]),
});

/**
 * Policy document as stored on disk (tool_policy.json). Unknown keys are ignored;
 * missing keys take the built-in defaults.
 */
export const policyDocumentSchema = z.object({
  roles: z.record(roleConfigSchema).default({}),
  default_role: z.string().min(1).default(DEFAULT_ROLE),
  duplicate_window_seconds: z
    .number()
    .finite()
    .nonnegative()
    .default(DEFAULT_DUPLICATE_WINDOW_SECONDS),
});

/** Input shape of a policy document (every field optional). */
export type PolicyDocument = z.input<typeof policyDocumentSchema>;

type ParsedPolicyDocument = z.output<typeof policyDocumentSchema>;

function toPolicy(doc: ParsedPolicyDocument): Policy {
  const roles = new Map<string, RoleConfig>();
  for (const [name, config] of Object.entries(doc.roles)) {
    roles.set(name, { allowedTools: new Set(config.allowed_tools) });
  }
  return Object.freeze({
    roles,
    defaultRole: doc.default_role,
    duplicateWindowSeconds: doc.duplicate_window_seconds,
  });
}

/** Built-in policy used when no document can be read: no roles, researcher, 300s window. */
export function defaultPolicy(): Policy {
  return toPolicy(policyDocumentSchema.parse({}));
}

export type ParsePolicyResult =
  | { success: true; policy: Policy }
  | { success: false; error: z.ZodError };

/**
 * Validate a raw policy document. A document that fails validation is rejected as a whole;
 * callers fall back to defaultPolicy() rather than merging what did parse.
 */
export function parsePolicyDocument(raw: unknown): ParsePolicyResult {
  const parsed = policyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return { success: false, error: parsed.error };
  }
  return { success: true, policy: toPolicy(parsed.data) };
}
