export {
  SqliteStoragePlugin,
  SqliteEventSinkRepository,
  type SqliteStoragePluginConfig,
} from "./SqliteStoragePlugin.js";
export {
  PostgresStoragePlugin,
  PostgresEventSinkRepository,
  type PostgresStoragePluginConfig,
  type QueryFn,
} from "./PostgresStoragePlugin.js";
