import { DEFAULT_LEECH_TAG, type ConfigDocument, type LeechConfig } from '../types/config.js';
import type { Rule } from '../types/rule.js';
import { CURRENT_SCHEMA_VERSION, SCHEMA_VERSION_KEY, readSchemaVersion } from '../migrations/config-migrations.js';
import { normalizeRule, serializeRule } from './rule.js';

function readToggle(value: unknown): boolean {
  if (value === undefined) {
    return true;
  }
  return Boolean(value);
}

function readLeechTag(value: unknown): string {
  if (typeof value !== 'string' || value.trim() === '') {
    return DEFAULT_LEECH_TAG;
  }
  return value.trim();
}

function readRules(value: unknown): Rule[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((entry) => typeof entry === 'object' && entry !== null && !Array.isArray(entry))
    .map((entry) => normalizeRule(entry));
}

/**
 * Build the typed configuration from a migrated document
 */
export function parseLeechConfig(document: ConfigDocument): LeechConfig {
  return Object.freeze({
    schemaVersion: readSchemaVersion(document),
    leechTag: readLeechTag(document.leech_tag),
    rules: Object.freeze(readRules(document.rules)),
    autoRunEnabled: readToggle(document.auto_run_enabled),
    showAutoNotifications: readToggle(document.show_auto_notifications),
  });
}

/**
 * Write a configuration back into a document
 * Keys of `base` that the configuration does not own are preserved.
 */
export function serializeLeechConfig(config: LeechConfig, base: ConfigDocument = {}): ConfigDocument {
  return {
    ...base,
    [SCHEMA_VERSION_KEY]: CURRENT_SCHEMA_VERSION,
    leech_tag: config.leechTag,
    rules: config.rules.map(serializeRule),
    auto_run_enabled: config.autoRunEnabled,
    show_auto_notifications: config.showAutoNotifications,
  };
}
