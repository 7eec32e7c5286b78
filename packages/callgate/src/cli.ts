#!/usr/bin/env node
/**
 * CLI – validate a file of proposed tool calls and print the decisions as JSON.
 * Usage: callgate [--config callgate.config.json] --request request.json
 * Exit code: 0 all allowed, 2 any denied or conflicting response formats, 1 on errors.
 */
import { readFileSync } from "node:fs";
import { resolve, dirname } from "node:path";
import {
  PluginManager,
  getConfigPath,
  callgateConfigSchema,
} from "./config/index.js";
import type { ResolvedCallgateConfig } from "./config/index.js";
import type { EventSinkPluginInterface } from "./interfaces/EventSinkPluginInterface.js";
import { createValidationFacade } from "./core/createValidationFacade.js";
import {
  exitCodeFor,
  parseValidationRequest,
  validateBatch,
} from "./core/batch.js";
import { logger } from "./logger.js";

function argValue(flag: string): string | null {
  const idx = process.argv.indexOf(flag);
  return idx >= 0 && process.argv[idx + 1] ? process.argv[idx + 1] : null;
}

async function main(): Promise<void> {
  logger.debug({ argv: process.argv }, "CLI starting");
  const requestArg = argValue("--request");
  if (!requestArg) {
    logger.error(
      "Missing --request. Usage: callgate [--config callgate.config.json] --request request.json",
    );
    process.exit(1);
  }

  const configArg = argValue("--config");
  const configPath = configArg
    ? resolve(configArg)
    : getConfigPath(process.cwd());

  const pluginManager = new PluginManager();
  let config: ResolvedCallgateConfig = callgateConfigSchema.parse({});
  let configDir = process.cwd();
  let eventSinks: EventSinkPluginInterface[] = [];

  try {
    if (configPath) {
      logger.info({ configPath }, "Loading config");
      configDir = dirname(configPath);
      config = await pluginManager.loadConfig(configDir, configPath);
      await pluginManager.connectStorage(configDir, configPath);
      eventSinks = await pluginManager.getEventSinkPlugins(configDir, configPath);
    } else {
      logger.info("No callgate config found, using defaults");
    }

    const raw: unknown = JSON.parse(readFileSync(resolve(requestArg), "utf-8"));
    const request = parseValidationRequest(raw);
    const facade = createValidationFacade(config, { configDir, eventSinks });
    const report = await validateBatch(facade, request);
    await facade.flushEvents();
    process.stdout.write(`${JSON.stringify(report, null, 2)}\n`);
    process.exitCode = exitCodeFor(report);
  } finally {
    await pluginManager.shutdownEventSinks();
    await pluginManager.disconnectStorage();
  }
}

main().catch((err) => {
  logger.error({ err }, "callgate failed");
  process.exit(1);
});
