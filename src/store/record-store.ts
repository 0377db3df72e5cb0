/**
 * RecordStore - SQLite wrapper for the record table
 *
 * Stores one row per record with the embedding as a Float64 BLOB.
 * Uses WAL mode; every write method runs in a single transaction and is
 * committed before it returns.
 */

import Database from 'better-sqlite3';

// Schema DDL embedded directly to avoid file path issues at runtime
const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS records (
  id                  TEXT PRIMARY KEY,
  seq                 INTEGER NOT NULL,
  text                TEXT NOT NULL,
  source_reference    TEXT NOT NULL,
  metadata            TEXT NOT NULL,
  embedding           BLOB NOT NULL,
  embedding_model_id  TEXT NOT NULL,
  created_at          INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_records_seq ON records(seq);
CREATE INDEX IF NOT EXISTS idx_records_source ON records(source_reference);
`;

export type Durability = 'full' | 'normal';

/**
 * A record row as stored. `metadata` is JSON text, `embedding` a BLOB.
 */
export interface RecordRow {
  id: string;
  /** Insertion sequence; an upsert takes a new one */
  seq: number;
  text: string;
  sourceReference: string;
  metadata: string;
  embedding: Buffer;
  embeddingModelId: string;
  createdAt: number;
}

const SELECT_COLUMNS = `
  id, seq, text, source_reference as sourceReference, metadata, embedding,
  embedding_model_id as embeddingModelId, created_at as createdAt
`;

export class RecordStore {
  private db: Database.Database;

  private constructor(db: Database.Database) {
    this.db = db;
  }

  /**
   * Open (or create) the database file and run the schema DDL.
   * The connection is closed again if any of the setup statements fail.
   */
  static open(dbPath: string, durability: Durability): RecordStore {
    const db = new Database(dbPath);
    try {
      db.pragma('journal_mode = WAL');
      db.pragma(`synchronous = ${durability === 'full' ? 'FULL' : 'NORMAL'}`);
      db.exec(SCHEMA_DDL);
    } catch (error) {
      db.close();
      throw error;
    }
    return new RecordStore(db);
  }

  // --- Writes ---
  upsertMany(rows: readonly RecordRow[]): void {
    if (rows.length === 0) return;
    const stmt = this.db.prepare<[string, number, string, string, string, Buffer, string, number]>(`
      INSERT INTO records (id, seq, text, source_reference, metadata, embedding, embedding_model_id, created_at)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(id) DO UPDATE SET
        seq = excluded.seq,
        text = excluded.text,
        source_reference = excluded.source_reference,
        metadata = excluded.metadata,
        embedding = excluded.embedding,
        embedding_model_id = excluded.embedding_model_id,
        created_at = excluded.created_at
    `);
    const upsertAll = this.db.transaction((batch: readonly RecordRow[]) => {
      for (const r of batch) {
        stmt.run(r.id, r.seq, r.text, r.sourceReference, r.metadata, r.embedding, r.embeddingModelId, r.createdAt);
      }
    });
    upsertAll(rows);
  }

  /** Delete rows by id; returns the number of rows actually deleted. */
  deleteMany(ids: readonly string[]): number {
    if (ids.length === 0) return 0;
    const stmt = this.db.prepare<[string]>('DELETE FROM records WHERE id = ?');
    const deleteAll = this.db.transaction((batch: readonly string[]) => {
      let removed = 0;
      for (const id of batch) {
        removed += stmt.run(id).changes;
      }
      return removed;
    });
    return deleteAll(ids);
  }

  deleteAll(): number {
    return this.db.prepare('DELETE FROM records').run().changes;
  }

  // --- Reads ---
  /** All rows in insertion order. */
  listAll(): RecordRow[] {
    const stmt = this.db.prepare<[], RecordRow>(`SELECT ${SELECT_COLUMNS} FROM records ORDER BY seq`);
    return stmt.all();
  }

  count(): number {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM records').get();
    return row?.count ?? 0;
  }

  // --- Integrity ---
  checkIntegrity(): { ok: boolean; errors: string[] } {
    const result = this.db.pragma('integrity_check');
    const errors: string[] = [];
    if (Array.isArray(result)) {
      for (const entry of result) {
        const message: unknown = entry?.integrity_check;
        if (message !== 'ok') {
          errors.push(String(message));
        }
      }
    }
    return { ok: errors.length === 0, errors };
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }
}
