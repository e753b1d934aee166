/**
 * Configuration Migration Chain
 *
 * Brings a persisted configuration document of any earlier shape up to the
 * current schema. Each step fills in the defaults introduced in its release
 * and stamps its own version number. Steps are pure: the input document is
 * never modified.
 */

import { DEFAULT_LEECH_TAG, type ConfigDocument } from '../types/config.js';
import { parseInteger } from '../utils/rule.js';

export const SCHEMA_VERSION_KEY = 'schema_version';

/**
 * A single upgrade step
 */
export interface ConfigMigration {
  /** Version the document carries after this step */
  version: number;
  name: string;
  migrate: (config: ConfigDocument) => ConfigDocument;
}

/**
 * Result of running the chain
 */
export interface MigrationRunResult {
  config: ConfigDocument;
  /** True iff at least one step executed */
  changed: boolean;
  /** Names of the steps that executed, in order */
  applied: string[];
}

function withDefault(config: ConfigDocument, key: string, value: unknown): ConfigDocument {
  return key in config ? config : { ...config, [key]: value };
}

// ============================================
// Migration Steps
// ============================================

function migrateBaseKeys(config: ConfigDocument): ConfigDocument {
  let next = withDefault(config, 'leech_tag', DEFAULT_LEECH_TAG);
  next = { ...next, rules: Array.isArray(next.rules) ? next.rules : [] };
  next = withDefault(next, 'auto_run_enabled', true);
  return { ...next, [SCHEMA_VERSION_KEY]: 1 };
}

function migrateAutoRunToggle(config: ConfigDocument): ConfigDocument {
  const next = withDefault(config, 'auto_run_enabled', true);
  return { ...next, [SCHEMA_VERSION_KEY]: 2 };
}

function migrateAutoNotificationToggle(config: ConfigDocument): ConfigDocument {
  const next = withDefault(config, 'show_auto_notifications', true);
  return { ...next, [SCHEMA_VERSION_KEY]: 3 };
}

/**
 * All steps in ascending version order
 */
export const CONFIG_MIGRATIONS: readonly ConfigMigration[] = [
  { version: 1, name: 'base_keys', migrate: migrateBaseKeys },
  { version: 2, name: 'auto_run_enabled', migrate: migrateAutoRunToggle },
  { version: 3, name: 'show_auto_notifications', migrate: migrateAutoNotificationToggle },
];

export const CURRENT_SCHEMA_VERSION = CONFIG_MIGRATIONS.length;

/**
 * Read the schema version of a document
 * Missing, null or non-numeric values count as version 0.
 */
export function readSchemaVersion(config: ConfigDocument): number {
  return parseInteger(config[SCHEMA_VERSION_KEY]) ?? 0;
}

function toDocument(raw: unknown): ConfigDocument {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return {};
  }
  return { ...raw };
}

/**
 * Apply every step whose version is above the document's current version
 */
export function runMigrations(raw: unknown): MigrationRunResult {
  let config = toDocument(raw);
  let currentVersion = readSchemaVersion(config);
  const applied: string[] = [];

  for (const migration of CONFIG_MIGRATIONS) {
    if (currentVersion < migration.version) {
      config = migration.migrate(config);
      currentVersion = migration.version;
      applied.push(migration.name);
    }
  }

  return {
    config,
    changed: applied.length > 0,
    applied,
  };
}
