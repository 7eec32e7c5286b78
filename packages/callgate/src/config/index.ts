export {
  PluginManager,
  loadConfigFromPath,
  getConfigPath,
} from "./PluginManager.js";
export type {
  StoragePluginFactory,
  EventSinkPluginFactory,
} from "./PluginManager.js";
export { callgateConfigSchema, engineConfigSchema } from "./types.js";
export type {
  CallgateConfig,
  ResolvedCallgateConfig,
  EngineConfig,
  StoragePluginConfigEntry,
  EventSinkPluginConfigEntry,
  PluginConfigEntry,
} from "./types.js";
