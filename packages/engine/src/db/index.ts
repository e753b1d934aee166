import Database from 'better-sqlite3';
import { mkdirSync, existsSync } from 'fs';
import { dirname } from 'path';
import { config } from '../config.js';

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

/**
 * Open the SQLite database holding persisted configuration
 * Creates the parent directory of file databases when missing.
 */
export function initializeDatabase(dbPath?: string): Database.Database {
  const path = dbPath || config.dbPath;

  if (path !== IN_MEMORY) {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  db = new Database(path);
  if (path !== IN_MEMORY) {
    db.pragma('journal_mode = WAL');
  }

  return db;
}

/**
 * Close the database connection
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
