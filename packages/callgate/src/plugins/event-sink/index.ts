export { StorageEventSink } from "./StorageEventSink.js";
export { LoggerEventSink } from "./LoggerEventSink.js";
