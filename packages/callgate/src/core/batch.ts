import { z } from "zod";
import type {
  ConflictCheckResult,
  ValidationResult,
} from "../interfaces/ValidationTypes.js";
import type { ValidationFacade } from "./ValidationFacade.js";

const proposedCallSchema = z.object({
  /** Run config the role is resolved from. */
  config: z.unknown(),
  /** Proposed call; shape is checked by the facade so malformed calls are reported, not rejected here. */
  toolCall: z.unknown(),
  messages: z.array(z.object({ content: z.string() })).optional(),
  phase: z.string().min(1).optional(),
});

/**
 * A file of proposed calls for the CLI. Calls are validated in order through one
 * facade, so a repeat later in the file is suppressed as a duplicate.
 */
export const validationRequestSchema = z.object({
  calls: z.array(proposedCallSchema),
  responseFormats: z.array(z.unknown()).optional(),
});

export type ValidationRequest = z.infer<typeof validationRequestSchema>;

export interface ValidationReport {
  decisions: ValidationResult[];
  structuredOutput?: ConflictCheckResult;
}

export function parseValidationRequest(raw: unknown): ValidationRequest {
  const parsed = validationRequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid validation request: ${parsed.error.message}`);
  }
  return parsed.data;
}

export async function validateBatch(
  facade: ValidationFacade,
  request: ValidationRequest,
): Promise<ValidationReport> {
  const decisions: ValidationResult[] = [];
  for (const call of request.calls) {
    decisions.push(
      await facade.validate(call.config, call.toolCall, call.messages, call.phase),
    );
  }
  return {
    decisions,
    ...(request.responseFormats !== undefined && {
      structuredOutput: facade.checkStructuredOutputConflict(request.responseFormats),
    }),
  };
}

/** 0 when every call is allowed and response formats do not conflict, else 2. */
export function exitCodeFor(report: ValidationReport): number {
  const denied = report.decisions.some((d) => !d.allowed);
  const conflict = report.structuredOutput !== undefined && !report.structuredOutput.ok;
  return denied || conflict ? 2 : 0;
}
