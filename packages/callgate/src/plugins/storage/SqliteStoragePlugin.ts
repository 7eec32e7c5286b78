import Database from "better-sqlite3";
import { z } from "zod";
import type {
  StorageAdapter,
  StorageConnectionResult,
} from "../../interfaces/StorageAdapter.js";
import type {
  EventSinkRepository,
  StoredEvent,
} from "../../interfaces/EventSinkRepository.js";
import type { CallgateEvent } from "../../interfaces/EventSinkPluginInterface.js";
import { EVENT_LIST_COLUMNS, listLimit, toStoredEvent } from "./eventRows.js";
import { logger } from "../../logger.js";

export const sqliteStoragePluginConfigSchema = z.object({
  /** Path to the SQLite database file. Set this for file-based storage. */
  database: z.string().optional(),
  /** Use an in-memory database. Set to true for in-memory; cannot be used together with database. */
  inMemory: z.boolean().optional(),
});

export type SqliteStoragePluginConfig = z.infer<typeof sqliteStoragePluginConfigSchema>;

const ERR_BOTH =
  "SqliteStoragePlugin: set either 'database' (file path) or 'inMemory: true', not both.";
const ERR_NEITHER =
  "SqliteStoragePlugin: set either 'database' (file path) or 'inMemory: true'.";

/**
 * SQLite implementation of EventSinkRepository over the callgate_events table.
 */
export class SqliteEventSinkRepository implements EventSinkRepository {
  constructor(private readonly db: Database.Database) {}

  async list(options?: { limit?: number }): Promise<StoredEvent[]> {
    const rows: unknown[] = this.db
      .prepare(
        `SELECT ${EVENT_LIST_COLUMNS}
         FROM callgate_events
         ORDER BY created_at DESC, event_id DESC
         LIMIT ?`,
      )
      .all(listLimit(options));
    return rows.map(toStoredEvent);
  }

  async insert(event: CallgateEvent): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO callgate_events (
          event_id, schema_version, timestamp, event_type, tool_name,
          role, phase, decision, code, reason, stage
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        event.eventId,
        event.schemaVersion,
        event.timestamp,
        event.eventType,
        event.toolName ?? null,
        event.role ?? null,
        event.phase ?? null,
        event.decision,
        event.code,
        event.reason,
        event.stage ?? null,
      );
  }
}

/**
 * Built-in storage adapter using SQLite. Creates the callgate_events table.
 * SQLite uses TEXT for UUIDs and timestamps.
 */
export class SqliteStoragePlugin implements StorageAdapter {
  readonly name = "sqlite";

  private db: Database.Database | null = null;
  private _eventSinkRepository: SqliteEventSinkRepository | null = null;
  private readonly databasePath: string;
  private readonly inMemory: boolean;

  constructor(config: Record<string, unknown> = {}) {
    const parsed = sqliteStoragePluginConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw new Error(
        `SqliteStoragePlugin invalid config: ${parsed.error.message}`,
      );
    }
    const { database, inMemory } = parsed.data;
    const useMemory = inMemory === true;
    const hasPath = database !== undefined && database.trim() !== "";

    if (useMemory && hasPath) {
      throw new Error(ERR_BOTH);
    }
    if (!useMemory && !hasPath) {
      throw new Error(ERR_NEITHER);
    }

    this.inMemory = useMemory;
    this.databasePath = database !== undefined && hasPath ? database : ":memory:";
  }

  private logContext(): { database?: string; inMemory?: boolean } {
    return this.inMemory ? { inMemory: true } : { database: this.databasePath };
  }

  private open(): Database.Database {
    if (!this.db) {
      this.db = new Database(this.databasePath);
    }
    return this.db;
  }

  start(): void {
    this.open().exec(`
        CREATE TABLE IF NOT EXISTS callgate_events (
          event_id       TEXT PRIMARY KEY,
          schema_version TEXT NOT NULL,
          timestamp      TEXT NOT NULL,
          event_type     TEXT NOT NULL,
          tool_name      TEXT,
          role           TEXT,
          phase          TEXT,
          decision       TEXT NOT NULL,
          code           TEXT NOT NULL,
          reason         TEXT NOT NULL,
          stage          TEXT,
          created_at     TEXT NOT NULL DEFAULT (datetime('now'))
        );

        CREATE INDEX IF NOT EXISTS idx_callgate_events_tool ON callgate_events(tool_name);
      `);
    logger.debug(this.logContext(), "SQLite storage tables created");
  }

  connect(): StorageConnectionResult {
    try {
      const db = this.open();
      this._eventSinkRepository = new SqliteEventSinkRepository(db);
      return { ok: true, client: db };
    } catch (err) {
      logger.error({ err, ...this.logContext() }, "SQLite connect failed");
      return { ok: false };
    }
  }

  getEventSinkRepository(): EventSinkRepository | undefined {
    return this._eventSinkRepository ?? undefined;
  }

  disconnect(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
      this._eventSinkRepository = null;
      logger.debug(this.logContext(), "SQLite disconnected");
    }
  }

  end(): void {
    this.disconnect();
  }
}
