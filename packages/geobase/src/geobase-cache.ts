/**
 * Geobase Cache
 *
 * Durable copy of the last downloaded géobase payload, backed by
 * better-sqlite3, so a restart inside the freshness horizon does not
 * re-download the file. Holds a single row; every write replaces it.
 */

import Database from 'better-sqlite3';

export interface CachedPayload {
  fetchedAt: Date;
  payload: string;
}

export interface PayloadCache {
  read(): CachedPayload | null;
  write(payload: string, fetchedAt: Date): void;
}

interface PayloadRow {
  fetched_at: string;
  payload: string;
}

function isPayloadRow(row: unknown): row is PayloadRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'fetched_at' in row &&
    'payload' in row &&
    typeof row.fetched_at === 'string' &&
    typeof row.payload === 'string'
  );
}

export class GeobaseCache implements PayloadCache {
  private readonly db: Database.Database;
  private readonly ownsDb: boolean;
  private readonly stmtRead: Database.Statement;
  private readonly stmtWrite: Database.Statement;
  private readonly stmtClear: Database.Statement;

  /**
   * @param db - a file path, ':memory:', or an open database shared with other stores
   */
  constructor(db: string | Database.Database = ':memory:') {
    if (typeof db === 'string') {
      this.db = new Database(db);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('synchronous = NORMAL');
      this.ownsDb = true;
    } else {
      this.db = db;
      this.ownsDb = false;
    }

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS geobase_payload (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        fetched_at TEXT NOT NULL,
        payload TEXT NOT NULL
      );
    `);

    this.stmtRead = this.db.prepare('SELECT fetched_at, payload FROM geobase_payload WHERE id = 1');
    this.stmtWrite = this.db.prepare(`
      INSERT INTO geobase_payload (id, fetched_at, payload) VALUES (1, ?, ?)
      ON CONFLICT(id) DO UPDATE SET fetched_at = excluded.fetched_at, payload = excluded.payload
    `);
    this.stmtClear = this.db.prepare('DELETE FROM geobase_payload');
  }

  read(): CachedPayload | null {
    const row: unknown = this.stmtRead.get();
    if (!isPayloadRow(row)) return null;

    const fetchedAt = new Date(row.fetched_at);
    if (Number.isNaN(fetchedAt.getTime())) return null;

    return { fetchedAt, payload: row.payload };
  }

  write(payload: string, fetchedAt: Date): void {
    this.stmtWrite.run(fetchedAt.toISOString(), payload);
  }

  clear(): void {
    this.stmtClear.run();
  }

  close(): void {
    if (this.ownsDb) {
      this.db.close();
    }
  }
}
