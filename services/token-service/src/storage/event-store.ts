import type Database from "better-sqlite3";
import type { TokenEvent, TokenScopedEvent } from "@chipmint/shared";

export interface EventStore {
  append(event: TokenEvent): void;
  listForToken(tokenId: string): TokenScopedEvent[];
}

interface Row {
  event_json: string;
}

export class SqliteEventStore implements EventStore {
  private readonly appendStmt: Database.Statement<[string | null, string, string, string]>;
  private readonly listForTokenStmt: Database.Statement<[string], Row>;

  constructor(db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS token_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        token_id TEXT,
        type TEXT NOT NULL,
        occurred_at TEXT NOT NULL,
        event_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_token_events_token
      ON token_events(token_id, seq);
    `);

    this.appendStmt = db.prepare<[string | null, string, string, string]>(`
      INSERT INTO token_events (token_id, type, occurred_at, event_json)
      VALUES (?, ?, ?, ?)
    `);

    this.listForTokenStmt = db.prepare<[string], Row>(`
      SELECT event_json
      FROM token_events
      WHERE token_id = ?
      ORDER BY seq ASC
    `);
  }

  append(event: TokenEvent): void {
    const tokenId = event.type === "ARCHIVE_ENTRY_ADDED" ? null : event.tokenId;
    this.appendStmt.run(tokenId, event.type, event.occurredAt, JSON.stringify(event));
  }

  listForToken(tokenId: string): TokenScopedEvent[] {
    return this.listForTokenStmt
      .all(tokenId)
      .map((row) => JSON.parse(row.event_json) as TokenScopedEvent);
  }
}
