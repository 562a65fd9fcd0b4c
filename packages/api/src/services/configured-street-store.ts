/**
 * Configured Street Store
 *
 * Persists the street sides a user chose to watch, in the same SQLite
 * database as the geobase cache.
 */

import type Database from 'better-sqlite3';
import type { ResolvedStreetConfig } from '@snowwatch/core';

interface ConfiguredStreetRow {
  street_id: number;
  display_name: string;
  created_at: string;
}

function isConfiguredStreetRow(row: unknown): row is ConfiguredStreetRow {
  return (
    typeof row === 'object' &&
    row !== null &&
    'street_id' in row &&
    'display_name' in row &&
    'created_at' in row &&
    typeof row.street_id === 'number' &&
    typeof row.display_name === 'string' &&
    typeof row.created_at === 'string'
  );
}

function toConfig(row: ConfiguredStreetRow): ResolvedStreetConfig {
  return {
    streetId: row.street_id,
    displayName: row.display_name,
    createdAt: new Date(row.created_at),
  };
}

export class ConfiguredStreetStore {
  private readonly stmtList: Database.Statement;
  private readonly stmtGet: Database.Statement;
  private readonly stmtInsert: Database.Statement;
  private readonly stmtDelete: Database.Statement;

  constructor(db: Database.Database) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS configured_streets (
        street_id INTEGER PRIMARY KEY,
        display_name TEXT NOT NULL,
        created_at TEXT NOT NULL
      );
    `);

    this.stmtList = db.prepare('SELECT street_id, display_name, created_at FROM configured_streets ORDER BY created_at, street_id');
    this.stmtGet = db.prepare('SELECT street_id, display_name, created_at FROM configured_streets WHERE street_id = ?');
    this.stmtInsert = db.prepare(
      'INSERT INTO configured_streets (street_id, display_name, created_at) VALUES (?, ?, ?) ON CONFLICT(street_id) DO NOTHING',
    );
    this.stmtDelete = db.prepare('DELETE FROM configured_streets WHERE street_id = ?');
  }

  list(): ResolvedStreetConfig[] {
    return this.stmtList.all().filter(isConfiguredStreetRow).map(toConfig);
  }

  get(streetId: number): ResolvedStreetConfig | null {
    const row: unknown = this.stmtGet.get(streetId);
    return isConfiguredStreetRow(row) ? toConfig(row) : null;
  }

  /**
   * Returns false when the street side is already configured.
   */
  add(config: ResolvedStreetConfig): boolean {
    const result = this.stmtInsert.run(config.streetId, config.displayName, config.createdAt.toISOString());
    return result.changes === 1;
  }

  remove(streetId: number): boolean {
    return this.stmtDelete.run(streetId).changes === 1;
  }
}
