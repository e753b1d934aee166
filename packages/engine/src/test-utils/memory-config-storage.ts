import type { ConfigDocument } from '@leech-actions/shared';
import type { ConfigStorage } from '../services/config.service.js';

/**
 * Map-backed configuration storage for tests
 * Documents are copied through JSON on both sides, like the database store.
 */
export class MemoryConfigStorage implements ConfigStorage {
  readonly writes: Array<{ key: string; document: ConfigDocument }> = [];
  private documents = new Map<string, string>();

  constructor(initial: Record<string, unknown> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.documents.set(key, JSON.stringify(value));
    }
  }

  read(key: string): unknown {
    const value = this.documents.get(key);
    return value === undefined ? null : JSON.parse(value);
  }

  write(key: string, document: ConfigDocument): void {
    this.writes.push({ key, document });
    this.documents.set(key, JSON.stringify(document));
  }
}
