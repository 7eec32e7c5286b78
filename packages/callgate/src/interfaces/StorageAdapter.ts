/**
 * Result returned by StorageAdapter.connect(). Adapters can attach their DB client for use by other code.
 */
export interface StorageConnectionResult {
  ok: boolean;
  /** Adapter-specific client (e.g. DB connection pool). */
  client?: unknown;
}

import type { EventSinkRepository } from "./EventSinkRepository.js";

/**
 * Storage adapter interface for database lifecycle: connect, schema setup, teardown, disconnect.
 * Plugins implement this to provide storage backends configurable via callgate.config.ts.
 * After connect(), getEventSinkRepository() returns the repository decision events are written to.
 */
export interface StorageAdapter {
  readonly name: string;

  /**
   * Establish connection to the database.
   * @returns Connection result with ok and optional client.
   */
  connect(): StorageConnectionResult | Promise<StorageConnectionResult>;

  /**
   * Return the event repository, or undefined before connect().
   */
  getEventSinkRepository(): EventSinkRepository | undefined;

  /**
   * Create tables / schema. Called after connect.
   */
  start(): void | Promise<void>;

  /**
   * Teardown and cleanup. Called when shutting down. Before disconnect.
   */
  end(): void | Promise<void>;

  /**
   * Disconnect from the database.
   */
  disconnect(): void | Promise<void>;
}
