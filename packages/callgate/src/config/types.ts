import { z } from "zod";

const phaseRuleSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("deny-all") }),
  z.object({
    type: z.literal("allow-list"),
    allowedTools: z.array(z.string().min(1)),
  }),
]);

const indeterminatePolicySchema = z.enum(["permissive", "conservative"]);

/**
 * Tuning for the validation engine. Every field is optional.
 */
export const engineConfigSchema = z.object({
  /** Duplicate table size above which expired entries are pruned. Default 1000. */
  maxEntries: z.number().int().positive().optional(),
  alignment: z
    .object({
      /** Shortest token counted by the intent heuristic. Default 4. */
      minTokenLength: z.number().int().positive().optional(),
      /** Shared tokens required for alignment. Default 1. */
      minOverlap: z.number().int().nonnegative().optional(),
    })
    .optional(),
  /** What a stage that cannot decide turns into. Defaults: duplicate conservative, alignment permissive. */
  indeterminate: z
    .object({
      duplicate: indeterminatePolicySchema.optional(),
      alignment: indeterminatePolicySchema.optional(),
    })
    .optional(),
  /** Phase rules; replace the built-in clarify/research rules for the same phase. */
  phases: z.record(phaseRuleSchema).optional(),
});

/**
 * Storage plugin entry in callgate config.
 * Use "path" for a custom plugin (directory with index.js/index.mjs; default export = instance).
 */
const storagePluginEntrySchema = z.object({
  type: z.literal("storage"),
  name: z.string().min(1),
  /** Directory to custom plugin (relative to config file or absolute). */
  path: z.string().min(1).optional(),
  config: z.record(z.unknown()).optional(),
});

/**
 * EventSink plugin entry in callgate config.
 * Use "path" for a custom plugin (directory with index.js/index.mjs; default export = instance).
 */
const eventSinkPluginEntrySchema = z.object({
  type: z.literal("eventSink"),
  name: z.string().min(1),
  /** Directory to custom plugin (relative to config file or absolute). */
  path: z.string().min(1).optional(),
  config: z.record(z.unknown()).optional(),
});

/**
 * callgate config file shape (default export of callgate.config.ts / .js, or callgate.config.json).
 */
export const callgateConfigSchema = z.object({
  policy: z
    .object({
      /** Policy document path, relative to the config file. Default tool_policy.json beside it. */
      path: z.string().min(1).optional(),
    })
    .optional(),
  engine: engineConfigSchema.optional(),
  plugins: z
    .array(
      z.discriminatedUnion("type", [
        storagePluginEntrySchema,
        eventSinkPluginEntrySchema,
      ]),
    )
    .default([]),
});

/** Config as written by users. */
export type CallgateConfig = z.input<typeof callgateConfigSchema>;
/** Config after validation and defaults. */
export type ResolvedCallgateConfig = z.output<typeof callgateConfigSchema>;
export type EngineConfig = z.output<typeof engineConfigSchema>;
export type StoragePluginConfigEntry = z.output<typeof storagePluginEntrySchema>;
export type EventSinkPluginConfigEntry = z.output<typeof eventSinkPluginEntrySchema>;
export type PluginConfigEntry = StoragePluginConfigEntry | EventSinkPluginConfigEntry;
