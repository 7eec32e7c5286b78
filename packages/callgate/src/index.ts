// Programmatic API: engine, policy, interfaces, config, and default plugins
export { logger } from "./logger.js";
export type { Logger } from "./logger.js";
export * from "./core/index.js";
export * from "./policy/index.js";
export * from "./interfaces/index.js";
export * from "./config/index.js";
export {
  SqliteStoragePlugin,
  SqliteEventSinkRepository,
  type SqliteStoragePluginConfig,
  PostgresStoragePlugin,
  PostgresEventSinkRepository,
  type PostgresStoragePluginConfig,
  type QueryFn,
} from "./plugins/storage/index.js";
export { StorageEventSink, LoggerEventSink } from "./plugins/event-sink/index.js";
