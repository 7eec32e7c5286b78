import { readFileSync, existsSync } from "node:fs";
import { join, dirname, resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { callgateConfigSchema } from "./types.js";
import type {
  ResolvedCallgateConfig,
  EventSinkPluginConfigEntry,
  StoragePluginConfigEntry,
} from "./types.js";
import type { EventSinkPluginInterface } from "../interfaces/EventSinkPluginInterface.js";
import type { CallgatePluginContext } from "../interfaces/CallgatePluginContext.js";
import type { StorageAdapter } from "../interfaces/StorageAdapter.js";
import {
  SqliteStoragePlugin,
  PostgresStoragePlugin,
} from "../plugins/storage/index.js";
import {
  StorageEventSink,
  LoggerEventSink,
} from "../plugins/event-sink/index.js";
import { logger } from "../logger.js";

export type StoragePluginFactory = (
  config: Record<string, unknown>,
) => StorageAdapter;

export type EventSinkPluginFactory = (
  config: Record<string, unknown>,
  context: CallgatePluginContext,
) => EventSinkPluginInterface;

const builtInStoragePlugins: Record<string, StoragePluginFactory> = {
  sqlite: (config) => new SqliteStoragePlugin(config),
  postgres: (config) => new PostgresStoragePlugin(config),
};

const builtInEventSinkPlugins: Record<string, EventSinkPluginFactory> = {
  sqlite: (_config, context) => new StorageEventSink("sqlite", context),
  postgres: (_config, context) => new StorageEventSink("postgres", context),
  log: () => new LoggerEventSink(),
};

/** Entry filenames to load from a plugin directory (first found wins). */
const PLUGIN_ENTRY_NAMES = ["index.js", "index.mjs"];

/** Config filenames looked up in the working directory, in order. */
const CONFIG_FILE_NAMES = [
  "callgate.config.js",
  "callgate.config.ts",
  "callgate.config.json",
];

function hasFunctions(value: object, names: readonly string[]): boolean {
  return names.every((name) => typeof Reflect.get(value, name) === "function");
}

function isNamedObject(value: unknown): value is object {
  return (
    typeof value === "object" &&
    value !== null &&
    typeof Reflect.get(value, "name") === "string"
  );
}

function isStorageAdapter(value: unknown): value is StorageAdapter {
  return (
    isNamedObject(value) &&
    hasFunctions(value, ["connect", "getEventSinkRepository", "start", "end", "disconnect"])
  );
}

function isEventSink(value: unknown): value is EventSinkPluginInterface {
  return isNamedObject(value) && hasFunctions(value, ["emit"]);
}

/**
 * Resolve plugin directory to an entry file (index.js or index.mjs). Path is relative to configDir or absolute.
 */
function resolvePluginEntryPath(pluginPath: string, configDir: string): string {
  const dir = resolve(configDir, pluginPath);
  for (const name of PLUGIN_ENTRY_NAMES) {
    const p = join(dir, name);
    if (existsSync(p)) return p;
  }
  throw new Error(
    `Plugin at ${pluginPath} must contain index.js or index.mjs (run build to compile index.ts).`,
  );
}

/** Default export of an ES module, or the module namespace when it has none. */
function defaultExport(mod: unknown): unknown {
  if (typeof mod !== "object" || mod === null) return mod;
  const value: unknown = Reflect.get(mod, "default");
  return value ?? mod;
}

/**
 * Load plugin instance from a directory: import index.js/index.mjs, return default export (the instance).
 */
async function loadPluginInstance(entryPath: string): Promise<unknown> {
  const mod: unknown = await import(pathToFileURL(entryPath).href);
  return defaultExport(mod);
}

/**
 * Resolves path to config file: first .js, then .ts, then .json (from cwd).
 */
export function getConfigPath(cwd: string): string | null {
  for (const name of CONFIG_FILE_NAMES) {
    const p = join(cwd, name);
    if (existsSync(p)) return p;
  }
  return null;
}

/**
 * Loads and validates config from a path. Supports .json (readFile + parse) and .js/.ts (dynamic import).
 */
export async function loadConfigFromPath(
  configPath: string,
): Promise<ResolvedCallgateConfig> {
  logger.debug({ configPath }, "Loading config from path");
  let raw: unknown;
  if (configPath.endsWith(".json")) {
    raw = JSON.parse(readFileSync(configPath, "utf-8"));
  } else {
    raw = defaultExport(await import(pathToFileURL(configPath).href));
  }
  const parsed = callgateConfigSchema.safeParse(raw);
  if (!parsed.success) {
    logger.error(
      { configPath, issues: parsed.error.issues },
      "Invalid callgate config",
    );
    throw new Error(
      `Invalid callgate config at ${configPath}: ${parsed.error.message}`,
    );
  }
  logger.debug(
    { configPath, pluginCount: parsed.data.plugins.length },
    "Config loaded",
  );
  return parsed.data;
}

/**
 * Loads callgate config and instantiates its storage and event-sink plugins.
 * Plugin lists are cached per loaded config.
 */
export class PluginManager {
  private config: ResolvedCallgateConfig | null = null;
  private configPath: string | null = null;
  private storagePlugins: StorageAdapter[] | null = null;
  private eventSinkPlugins: EventSinkPluginInterface[] | null = null;
  private readonly storageRegistry = new Map<string, StoragePluginFactory>(
    Object.entries(builtInStoragePlugins),
  );
  private readonly eventSinkRegistry = new Map<string, EventSinkPluginFactory>(
    Object.entries(builtInEventSinkPlugins),
  );

  /**
   * Register a storage plugin factory by name (e.g. for custom plugins).
   */
  registerStoragePlugin(name: string, factory: StoragePluginFactory): void {
    this.storageRegistry.set(name, factory);
  }

  /**
   * Register an event sink plugin factory by name (e.g. for custom plugins).
   */
  registerEventSinkPlugin(name: string, factory: EventSinkPluginFactory): void {
    this.eventSinkRegistry.set(name, factory);
  }

  /**
   * Load config from cwd (or optional path). Idempotent; subsequent calls use cached config if path unchanged.
   */
  async loadConfig(
    cwd: string = process.cwd(),
    configPath?: string,
  ): Promise<ResolvedCallgateConfig> {
    const path = configPath ?? getConfigPath(cwd);
    if (!path) {
      logger.error({ cwd }, "No callgate config found");
      throw new Error(
        `No callgate config found in ${cwd}. Add callgate.config.js, callgate.config.ts, or callgate.config.json`,
      );
    }
    if (this.configPath === path && this.config !== null) {
      logger.debug("Using cached config");
      return this.config;
    }
    this.config = await loadConfigFromPath(path);
    this.configPath = path;
    this.storagePlugins = null;
    this.eventSinkPlugins = null;
    return this.config;
  }

  /** Directory of the loaded config file; relative paths in config resolve against it. */
  getConfigDir(): string {
    if (this.configPath === null) {
      throw new Error("Config not loaded; call loadConfig() first.");
    }
    return dirname(this.configPath);
  }

  /**
   * Get the list of storage plugin instances from the loaded config. Calls loadConfig() if not loaded.
   */
  async getStoragePlugins(
    cwd: string = process.cwd(),
    configPath?: string,
  ): Promise<StorageAdapter[]> {
    const config = await this.loadConfig(cwd, configPath);
    if (this.storagePlugins !== null) return this.storagePlugins;

    const entries = config.plugins.filter(
      (p): p is StoragePluginConfigEntry => p.type === "storage",
    );
    const instances: StorageAdapter[] = [];
    const configDir = this.getConfigDir();

    for (const entry of entries) {
      if (entry.path) {
        const entryPath = resolvePluginEntryPath(entry.path, configDir);
        logger.debug(
          { path: entry.path, entryPath },
          "Loading storage plugin from path",
        );
        const instance = await loadPluginInstance(entryPath);
        if (!isStorageAdapter(instance)) {
          logger.error(
            { path: entry.path },
            "Plugin default export must be a storage adapter instance (name, connect, getEventSinkRepository, start, end, disconnect)",
          );
          throw new Error(
            `Plugin at ${entry.path}: default export must be a storage adapter instance (name, connect, getEventSinkRepository, start, end, disconnect).`,
          );
        }
        instances.push(instance);
      } else {
        const factory = this.storageRegistry.get(entry.name);
        if (!factory) {
          logger.error(
            { name: entry.name, registered: [...this.storageRegistry.keys()] },
            "Unknown storage plugin name",
          );
          throw new Error(
            `Unknown storage plugin name: "${
              entry.name
            }". Registered: ${[...this.storageRegistry.keys()].join(", ")}`,
          );
        }
        logger.debug(
          { name: entry.name },
          "Instantiating built-in storage plugin",
        );
        instances.push(factory(entry.config ?? {}));
      }
    }

    this.storagePlugins = instances;
    logger.debug(
      { count: instances.length, names: instances.map((p) => p.name) },
      "Storage plugins resolved",
    );
    return instances;
  }

  /**
   * Get the list of event sink plugin instances from the loaded config. Calls loadConfig() if not loaded.
   * Builds CallgatePluginContext from the first storage adapter (if any) and passes it to built-in event sink factories.
   */
  async getEventSinkPlugins(
    cwd: string = process.cwd(),
    configPath?: string,
  ): Promise<EventSinkPluginInterface[]> {
    const config = await this.loadConfig(cwd, configPath);
    if (this.eventSinkPlugins !== null) return this.eventSinkPlugins;

    const entries = config.plugins.filter(
      (p): p is EventSinkPluginConfigEntry => p.type === "eventSink",
    );
    const instances: EventSinkPluginInterface[] = [];
    const configDir = this.getConfigDir();

    const storageAdapters = await this.getStoragePlugins(cwd, configPath);
    const context: CallgatePluginContext = {
      storage: storageAdapters[0],
    };

    for (const entry of entries) {
      if (entry.path) {
        const entryPath = resolvePluginEntryPath(entry.path, configDir);
        logger.debug(
          { path: entry.path, entryPath },
          "Loading event sink plugin from path",
        );
        const instance = await loadPluginInstance(entryPath);
        if (!isEventSink(instance)) {
          logger.error(
            { path: entry.path },
            "Plugin default export must be an event sink instance (name, emit)",
          );
          throw new Error(
            `Plugin at ${entry.path}: default export must be an event sink instance (name, emit).`,
          );
        }
        instances.push(instance);
      } else {
        const factory = this.eventSinkRegistry.get(entry.name);
        if (!factory) {
          logger.error(
            { name: entry.name, registered: [...this.eventSinkRegistry.keys()] },
            "Unknown event sink plugin name",
          );
          throw new Error(
            `Unknown event sink plugin name: "${
              entry.name
            }". Registered: ${[...this.eventSinkRegistry.keys()].join(", ")}`,
          );
        }
        logger.debug(
          { name: entry.name },
          "Instantiating built-in event sink plugin",
        );
        instances.push(factory(entry.config ?? {}, context));
      }
    }

    this.eventSinkPlugins = instances;
    logger.debug(
      { count: instances.length, names: instances.map((p) => p.name) },
      "Event sink plugins resolved",
    );
    return instances;
  }

  /**
   * Connect and start every storage plugin (connect, then create schema).
   */
  async connectStorage(
    cwd: string = process.cwd(),
    configPath?: string,
  ): Promise<StorageAdapter[]> {
    const adapters = await this.getStoragePlugins(cwd, configPath);
    for (const adapter of adapters) {
      const result = await Promise.resolve(adapter.connect());
      if (!result.ok) {
        throw new Error(`Storage plugin "${adapter.name}" failed to connect.`);
      }
      logger.debug({ name: adapter.name }, "Storage plugin connected");
      await Promise.resolve(adapter.start());
      logger.debug({ name: adapter.name }, "Storage plugin started");
    }
    return adapters;
  }

  /**
   * Flush, then shut down, every event sink created so far. A failing sink is logged and
   * does not stop the others.
   */
  async shutdownEventSinks(): Promise<void> {
    for (const sink of this.eventSinkPlugins ?? []) {
      try {
        await sink.flush?.();
        await sink.shutdown?.();
        logger.debug({ name: sink.name }, "Event sink shut down");
      } catch (err) {
        logger.warn({ err, name: sink.name }, "Event sink shutdown failed");
      }
    }
  }

  /** End every storage plugin created so far. */
  async disconnectStorage(): Promise<void> {
    for (const adapter of this.storagePlugins ?? []) {
      await Promise.resolve(adapter.end());
      logger.debug({ name: adapter.name }, "Storage plugin ended");
    }
  }
}
