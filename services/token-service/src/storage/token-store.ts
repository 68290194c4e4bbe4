import type Database from "better-sqlite3";
import type { ChipToken } from "@chipmint/shared";

export interface TokenStore {
  insert(token: ChipToken): void;
  update(token: ChipToken): void;
  get(tokenId: string): ChipToken | null;
  listByOwner(owner: string): ChipToken[];
}

interface Row {
  token_json: string;
}

type TokenParams = [string, string, string, string, string];

export class SqliteTokenStore implements TokenStore {
  private readonly insertStmt: Database.Statement<TokenParams>;
  private readonly updateStmt: Database.Statement<[string, string, string, string, string]>;
  private readonly getStmt: Database.Statement<[string], Row>;
  private readonly listByOwnerStmt: Database.Statement<[string], Row>;

  constructor(db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS tokens (
        token_id TEXT PRIMARY KEY,
        owner TEXT NOT NULL,
        chip_pk TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        token_json TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_tokens_owner
      ON tokens(owner, token_id);
    `);

    this.insertStmt = db.prepare<TokenParams>(`
      INSERT INTO tokens (token_id, owner, chip_pk, updated_at, token_json)
      VALUES (?, ?, ?, ?, ?)
    `);

    this.updateStmt = db.prepare<[string, string, string, string, string]>(`
      UPDATE tokens
      SET owner = ?,
          chip_pk = ?,
          updated_at = ?,
          token_json = ?
      WHERE token_id = ?
    `);

    this.getStmt = db.prepare<[string], Row>(`
      SELECT token_json
      FROM tokens
      WHERE token_id = ?
      LIMIT 1
    `);

    this.listByOwnerStmt = db.prepare<[string], Row>(`
      SELECT token_json
      FROM tokens
      WHERE owner = ?
      ORDER BY token_id ASC
    `);
  }

  insert(token: ChipToken): void {
    this.insertStmt.run(
      token.tokenId,
      token.owner,
      token.chipPublicKey,
      token.updatedAt,
      JSON.stringify(token),
    );
  }

  update(token: ChipToken): void {
    const result = this.updateStmt.run(
      token.owner,
      token.chipPublicKey,
      token.updatedAt,
      JSON.stringify(token),
      token.tokenId,
    );
    if (result.changes === 0) {
      throw new Error(`Token '${token.tokenId}' does not exist`);
    }
  }

  get(tokenId: string): ChipToken | null {
    const row = this.getStmt.get(tokenId);
    if (!row) return null;
    return JSON.parse(row.token_json) as ChipToken;
  }

  listByOwner(owner: string): ChipToken[] {
    return this.listByOwnerStmt.all(owner).map((row) => JSON.parse(row.token_json) as ChipToken);
  }
}
