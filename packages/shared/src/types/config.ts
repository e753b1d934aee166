import type { Rule } from './rule.js';

/**
 * Untyped configuration document as read from persistent storage
 */
export type ConfigDocument = Record<string, unknown>;

export const DEFAULT_LEECH_TAG = 'leech';

/**
 * Validated configuration used by the engine
 */
export interface LeechConfig {
  readonly schemaVersion: number;
  /** Tag the host puts on repeatedly failed cards */
  readonly leechTag: string;
  /** Ordered; the first matching rule governs a card */
  readonly rules: readonly Rule[];
  readonly autoRunEnabled: boolean;
  readonly showAutoNotifications: boolean;
}
