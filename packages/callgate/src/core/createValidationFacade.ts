import { resolve } from "node:path";
import type { EngineConfig, ResolvedCallgateConfig } from "../config/types.js";
import type { EventSinkPluginInterface } from "../interfaces/EventSinkPluginInterface.js";
import { PolicyStore, DEFAULT_POLICY_FILE } from "../policy/PolicyStore.js";
import { FilePolicySource } from "../policy/sources.js";
import { DuplicateSuppressor } from "./DuplicateSuppressor.js";
import { IntentAligner } from "./IntentAligner.js";
import { PhaseGate } from "./PhaseGate.js";
import { ValidationFacade } from "./ValidationFacade.js";

export interface CreateValidationFacadeOptions {
  /** Directory relative policy paths resolve against. Default process.cwd(). */
  configDir?: string;
  eventSinks?: EventSinkPluginInterface[];
  /** Clock for the duplicate table, in milliseconds. */
  now?: () => number;
}

/** Wire a ValidationFacade from a validated callgate config. */
export function createValidationFacade(
  config: Pick<ResolvedCallgateConfig, "policy" | "engine">,
  options: CreateValidationFacadeOptions = {},
): ValidationFacade {
  const configDir = options.configDir ?? process.cwd();
  const engine: EngineConfig = config.engine ?? {};
  const policyPath = resolve(configDir, config.policy?.path ?? DEFAULT_POLICY_FILE);

  return new ValidationFacade({
    policyStore: new PolicyStore(new FilePolicySource(policyPath)),
    duplicateSuppressor: new DuplicateSuppressor({
      maxEntries: engine.maxEntries,
      now: options.now,
    }),
    intentAligner: new IntentAligner(engine.alignment),
    phaseGate: new PhaseGate(engine.phases),
    indeterminate: engine.indeterminate,
    eventSinks: options.eventSinks,
  });
}
