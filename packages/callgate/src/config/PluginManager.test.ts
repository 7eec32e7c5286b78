import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { CallgateConfig } from "./types.js";
import { PluginManager, getConfigPath, loadConfigFromPath } from "./PluginManager.js";
import { LoggerEventSink, StorageEventSink } from "../plugins/event-sink/index.js";
import { SqliteStoragePlugin } from "../plugins/storage/index.js";

describe("PluginManager", () => {
  let dir: string;
  let manager: PluginManager;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "callgate-plugins-"));
    manager = new PluginManager();
  });

  afterEach(async () => {
    await manager.disconnectStorage();
    rmSync(dir, { recursive: true, force: true });
  });

  function writeConfig(config: CallgateConfig | Record<string, unknown>): string {
    const path = join(dir, "callgate.config.json");
    writeFileSync(path, JSON.stringify(config));
    return path;
  }

  it("finds callgate.config.json in a directory", () => {
    expect(getConfigPath(dir)).toBeNull();
    const path = writeConfig({});
    expect(getConfigPath(dir)).toBe(path);
  });

  it("fills defaults for an empty config", async () => {
    expect(await loadConfigFromPath(writeConfig({}))).toEqual({ plugins: [] });
  });

  it("rejects configs that fail validation", async () => {
    const path = writeConfig({ plugins: [{ type: "cache", name: "x" }] });
    await expect(loadConfigFromPath(path)).rejects.toThrow(`Invalid callgate config at ${path}: `);
  });

  it("throws when no config exists", async () => {
    await expect(manager.loadConfig(dir)).rejects.toThrow(`No callgate config found in ${dir}.`);
  });

  it("caches the loaded config per path", async () => {
    writeConfig({ engine: { maxEntries: 10 } });
    const first = await manager.loadConfig(dir);
    expect(await manager.loadConfig(dir)).toBe(first);
    expect(manager.getConfigDir()).toBe(dir);
  });

  it("wires sqlite storage into the storage event sink", async () => {
    writeConfig({
      plugins: [
        { type: "storage", name: "sqlite", config: { inMemory: true } },
        { type: "eventSink", name: "sqlite" },
        { type: "eventSink", name: "log" },
      ],
    });

    const [storage] = await manager.connectStorage(dir);
    expect(storage).toBeInstanceOf(SqliteStoragePlugin);

    const sinks = await manager.getEventSinkPlugins(dir);
    expect(sinks.map((s) => s.name)).toEqual(["sqlite", "log"]);
    expect(sinks[0]).toBeInstanceOf(StorageEventSink);
    expect(sinks[1]).toBeInstanceOf(LoggerEventSink);

    await sinks[0]?.emit({
      eventId: "evt-1",
      timestamp: "2026-01-01T00:00:00.000Z",
      schemaVersion: "0.1.0",
      eventType: "tool_call.validated",
      decision: "ALLOWED",
      code: "ALLOWED",
      reason: "allowed",
    });
    const rows = await storage?.getEventSinkRepository()?.list();
    expect(rows?.map((r) => r.eventId)).toEqual(["evt-1"]);
  });

  it("names the registered plugins when one is unknown", async () => {
    writeConfig({ plugins: [{ type: "storage", name: "redis" }] });
    await expect(manager.getStoragePlugins(dir)).rejects.toThrow(
      'Unknown storage plugin name: "redis". Registered: sqlite, postgres',
    );
  });

  it("uses factories registered at runtime", async () => {
    writeConfig({ plugins: [{ type: "eventSink", name: "memory", config: { tag: "t" } }] });
    const seen: Array<Record<string, unknown>> = [];
    manager.registerEventSinkPlugin("memory", (config) => {
      seen.push(config);
      return { name: "memory", emit: async () => undefined };
    });

    const sinks = await manager.getEventSinkPlugins(dir);
    expect(sinks.map((s) => s.name)).toEqual(["memory"]);
    expect(seen).toEqual([{ tag: "t" }]);
  });

  it("flushes and shuts down every event sink, continuing past failures", async () => {
    writeConfig({
      plugins: [
        { type: "eventSink", name: "broken" },
        { type: "eventSink", name: "buffered" },
      ],
    });
    const calls: string[] = [];
    manager.registerEventSinkPlugin("broken", () => ({
      name: "broken",
      emit: async () => undefined,
      flush: async () => {
        throw new Error("flush failed");
      },
      shutdown: vi.fn(async () => undefined),
    }));
    manager.registerEventSinkPlugin("buffered", () => ({
      name: "buffered",
      emit: async () => undefined,
      flush: async () => {
        calls.push("flush");
      },
      shutdown: async () => {
        calls.push("shutdown");
      },
    }));

    const [broken] = await manager.getEventSinkPlugins(dir);
    await manager.shutdownEventSinks();

    expect(calls).toEqual(["flush", "shutdown"]);
    expect(broken?.shutdown).not.toHaveBeenCalled();
  });

  it("shuts down nothing before sinks are created", async () => {
    await expect(manager.shutdownEventSinks()).resolves.toBeUndefined();
  });

  it("loads an event sink instance from a plugin directory", async () => {
    const pluginDir = join(dir, "plugins", "audit");
    mkdirSync(pluginDir, { recursive: true });
    writeFileSync(
      join(pluginDir, "index.mjs"),
      'export default { name: "audit", async emit() {} };\n',
    );
    writeConfig({ plugins: [{ type: "eventSink", name: "audit", path: "./plugins/audit" }] });

    const sinks = await manager.getEventSinkPlugins(dir);
    expect(sinks.map((s) => s.name)).toEqual(["audit"]);
  });

  it("rejects plugin directories without an entry file or with the wrong export", async () => {
    const pluginDir = join(dir, "plugins", "broken");
    mkdirSync(pluginDir, { recursive: true });
    writeConfig({ plugins: [{ type: "storage", name: "broken", path: "./plugins/broken" }] });
    await expect(manager.getStoragePlugins(dir)).rejects.toThrow(
      "Plugin at ./plugins/broken must contain index.js or index.mjs",
    );

    writeFileSync(join(pluginDir, "index.mjs"), 'export default { name: "broken" };\n');
    await expect(manager.getStoragePlugins(dir)).rejects.toThrow(
      "Plugin at ./plugins/broken: default export must be a storage adapter instance",
    );
  });
});
