import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { type ArchiveStore, SqliteArchiveStore } from "./archive-store.js";
import { type EventStore, SqliteEventStore } from "./event-store.js";
import { SqliteTokenStore, type TokenStore } from "./token-store.js";

/**
 * Archive, tokens and events share one connection so a lifecycle operation
 * commits or rolls back as a unit.
 */
export interface RegistryStore {
  readonly archive: ArchiveStore;
  readonly tokens: TokenStore;
  readonly events: EventStore;
  transaction<T>(fn: () => T): T;
  close(): void;
}

export const IN_MEMORY_DB_PATH = ":memory:";

export class SqliteRegistryStore implements RegistryStore {
  readonly archive: ArchiveStore;
  readonly tokens: TokenStore;
  readonly events: EventStore;
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== IN_MEMORY_DB_PATH) {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");

    this.archive = new SqliteArchiveStore(this.db);
    this.tokens = new SqliteTokenStore(this.db);
    this.events = new SqliteEventStore(this.db);
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  close(): void {
    this.db.close();
  }
}
