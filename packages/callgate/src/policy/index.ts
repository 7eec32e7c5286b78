export { PolicyStore, DEFAULT_POLICY_FILE } from "./PolicyStore.js";
export { FilePolicySource, StaticPolicySource } from "./sources.js";
export {
  policyDocumentSchema,
  parsePolicyDocument,
  defaultPolicy,
  DEFAULT_ROLE,
  DEFAULT_DUPLICATE_WINDOW_SECONDS,
} from "./schema.js";
export type { PolicyDocument, ParsePolicyResult } from "./schema.js";
