import type { Database } from 'better-sqlite3';
import type { ConfigDocument } from '@leech-actions/shared';
import type { ConfigStorage } from '../services/config.service.js';

/**
 * Repository for storing configuration documents as JSON, one row per key
 */
export class ConfigRepository implements ConfigStorage {
  constructor(private db: Database) {
    this.ensureTable();
  }

  private ensureTable(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS config (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);
  }

  /**
   * Get the raw stored text
   */
  get(key: string): string | null {
    const stmt = this.db.prepare('SELECT value FROM config WHERE key = ?');
    const row = stmt.get(key) as { value: string } | undefined;
    return row?.value ?? null;
  }

  /**
   * Get a stored document
   * Text that is not valid JSON reads as absent.
   */
  read(key: string): unknown {
    const value = this.get(key);
    if (!value) return null;
    try {
      return JSON.parse(value);
    } catch (error) {
      console.warn(`[ConfigRepository] Ignoring unreadable value for ${key}:`, error);
      return null;
    }
  }

  /**
   * Replace the stored document
   */
  write(key: string, document: ConfigDocument): void {
    const now = new Date().toISOString();
    const stmt = this.db.prepare(`
      INSERT INTO config (key, value, updated_at)
      VALUES (?, ?, ?)
      ON CONFLICT(key) DO UPDATE SET
        value = excluded.value,
        updated_at = excluded.updated_at
    `);
    stmt.run(key, JSON.stringify(document), now);
  }
}
