/**
 * Leech Config Service
 *
 * Owns the validated configuration for the session. The stored document is
 * migrated on load and written back whenever migration changed it; saving
 * replaces the rule list wholesale and rewrites the whole document.
 */

import type { ConfigDocument, LeechConfig, Rule } from '@leech-actions/shared';
import {
  CURRENT_SCHEMA_VERSION,
  parseLeechConfig,
  runMigrations,
  serializeLeechConfig,
} from '@leech-actions/shared';

/**
 * Key/value store holding configuration documents
 */
export interface ConfigStorage {
  /** Returns null when nothing is stored under the key */
  read(key: string): unknown;
  write(key: string, document: ConfigDocument): void;
}

/**
 * Read access to the current configuration
 */
export interface LeechConfigSource {
  getConfig(): LeechConfig;
}

export class LeechConfigService implements LeechConfigSource {
  private document: ConfigDocument = {};
  private config: LeechConfig;

  constructor(
    private storage: ConfigStorage,
    private configKey: string
  ) {
    this.config = this.load();
  }

  /**
   * Read, migrate and validate the stored configuration
   */
  load(): LeechConfig {
    const stored = this.storage.read(this.configKey);
    const { config: document, changed, applied } = runMigrations(stored);

    if (changed) {
      console.log(
        `[LeechConfigService] Migrated configuration to schema v${CURRENT_SCHEMA_VERSION} (${applied.join(', ')})`
      );
      this.storage.write(this.configKey, document);
    }

    this.document = document;
    this.config = parseLeechConfig(document);
    return this.config;
  }

  getConfig(): LeechConfig {
    return this.config;
  }

  get leechTag(): string {
    return this.config.leechTag;
  }

  get rules(): readonly Rule[] {
    return this.config.rules;
  }

  get autoRunEnabled(): boolean {
    return this.config.autoRunEnabled;
  }

  get showAutoNotifications(): boolean {
    return this.config.showAutoNotifications;
  }

  get schemaVersion(): number {
    return this.config.schemaVersion;
  }

  /**
   * Replace the rule list and toggles, then persist
   */
  saveRules(rules: readonly Rule[], autoRunEnabled: boolean, showAutoNotifications: boolean): LeechConfig {
    const next: LeechConfig = Object.freeze({
      ...this.config,
      schemaVersion: CURRENT_SCHEMA_VERSION,
      rules: Object.freeze([...rules]),
      autoRunEnabled,
      showAutoNotifications,
    });
    const document = serializeLeechConfig(next, this.document);

    this.storage.write(this.configKey, document);
    this.document = document;
    this.config = next;
    console.log(`[LeechConfigService] Saved ${rules.length} rule(s)`);
    return next;
  }
}
