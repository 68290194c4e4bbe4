import type Database from "better-sqlite3";
import { bytesToHex } from "@noble/hashes/utils";
import { type ArchiveEntry, type MintStatus, ProtocolError } from "@chipmint/shared";

export interface ArchiveStore {
  addEntry(chipPublicKey: Uint8Array): void;
  exists(chipPublicKey: Uint8Array): boolean;
  getStatus(chipPublicKey: Uint8Array): MintStatus;
  setStatus(chipPublicKey: Uint8Array, status: MintStatus): void;
  removeEntry(chipPublicKey: Uint8Array): void;
  list(): ArchiveEntry[];
}

const STATUS_BYTE: Record<MintStatus, number> = {
  NOT_MINTED: 0,
  MINTED: 1,
};

interface StatusRow {
  status: unknown;
}

interface EntryRow {
  chip_pk: Buffer;
  status: unknown;
}

function decodeStatus(value: unknown, chipPublicKeyHex: string): MintStatus {
  if (value === STATUS_BYTE.NOT_MINTED) return "NOT_MINTED";
  if (value === STATUS_BYTE.MINTED) return "MINTED";
  throw new ProtocolError(
    "ENTRY_TYPE_MISMATCH",
    `Archive entry ${chipPublicKeyHex} holds ${String(value)}, not a mint status`,
  );
}

function missing(chipPublicKeyHex: string): ProtocolError {
  return new ProtocolError("MISSING_ENTRY", `No archive entry for chip ${chipPublicKeyHex}`);
}

export class SqliteArchiveStore implements ArchiveStore {
  private readonly insertStmt: Database.Statement<[Buffer, number]>;
  private readonly getStmt: Database.Statement<[Buffer], StatusRow>;
  private readonly updateStmt: Database.Statement<[number, Buffer]>;
  private readonly deleteStmt: Database.Statement<[Buffer]>;
  private readonly listStmt: Database.Statement<[], EntryRow>;

  constructor(db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS archive (
        chip_pk BLOB PRIMARY KEY,
        status INTEGER NOT NULL
      );
    `);

    this.insertStmt = db.prepare<[Buffer, number]>(`
      INSERT INTO archive (chip_pk, status)
      VALUES (?, ?)
    `);

    this.getStmt = db.prepare<[Buffer], StatusRow>(`
      SELECT status
      FROM archive
      WHERE chip_pk = ?
      LIMIT 1
    `);

    this.updateStmt = db.prepare<[number, Buffer]>(`
      UPDATE archive
      SET status = ?
      WHERE chip_pk = ?
    `);

    this.deleteStmt = db.prepare<[Buffer]>(`
      DELETE FROM archive
      WHERE chip_pk = ?
    `);

    this.listStmt = db.prepare<[], EntryRow>(`
      SELECT chip_pk, status
      FROM archive
      ORDER BY chip_pk ASC
    `);
  }

  addEntry(chipPublicKey: Uint8Array): void {
    if (this.exists(chipPublicKey)) {
      throw new ProtocolError(
        "DUPLICATE_ENTRY",
        `Archive already holds chip ${bytesToHex(chipPublicKey)}`,
      );
    }
    this.insertStmt.run(Buffer.from(chipPublicKey), STATUS_BYTE.NOT_MINTED);
  }

  exists(chipPublicKey: Uint8Array): boolean {
    return this.getStmt.get(Buffer.from(chipPublicKey)) !== undefined;
  }

  getStatus(chipPublicKey: Uint8Array): MintStatus {
    const keyHex = bytesToHex(chipPublicKey);
    const row = this.getStmt.get(Buffer.from(chipPublicKey));
    if (!row) throw missing(keyHex);
    return decodeStatus(row.status, keyHex);
  }

  setStatus(chipPublicKey: Uint8Array, status: MintStatus): void {
    const result = this.updateStmt.run(STATUS_BYTE[status], Buffer.from(chipPublicKey));
    if (result.changes === 0) throw missing(bytesToHex(chipPublicKey));
  }

  removeEntry(chipPublicKey: Uint8Array): void {
    const result = this.deleteStmt.run(Buffer.from(chipPublicKey));
    if (result.changes === 0) throw missing(bytesToHex(chipPublicKey));
  }

  list(): ArchiveEntry[] {
    return this.listStmt.all().map((row) => {
      const chipPublicKey = bytesToHex(new Uint8Array(row.chip_pk));
      return { chipPublicKey, status: decodeStatus(row.status, chipPublicKey) };
    });
  }
}
