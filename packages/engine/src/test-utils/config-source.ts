import type { LeechConfig, RuleInput } from '@leech-actions/shared';
import { CURRENT_SCHEMA_VERSION, createRule } from '@leech-actions/shared';
import type { LeechConfigSource } from '../services/config.service.js';

export interface ConfigOverrides {
  leechTag?: string;
  autoRunEnabled?: boolean;
  showAutoNotifications?: boolean;
}

/**
 * Fixed configuration for tests
 */
export function staticConfig(rules: RuleInput[], overrides: ConfigOverrides = {}): LeechConfigSource {
  const config: LeechConfig = Object.freeze({
    schemaVersion: CURRENT_SCHEMA_VERSION,
    leechTag: overrides.leechTag ?? 'leech',
    rules: Object.freeze(rules.map(createRule)),
    autoRunEnabled: overrides.autoRunEnabled ?? true,
    showAutoNotifications: overrides.showAutoNotifications ?? true,
  });
  return { getConfig: () => config };
}
