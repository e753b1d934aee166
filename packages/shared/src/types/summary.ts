import type { LeechAction } from './rule.js';

/**
 * Keys tallied when processing cards
 */
export type SummaryKey = LeechAction | 'skipped';

/**
 * Per-action counts for one or more processed cards
 */
export type ActionSummary = Record<SummaryKey, number>;

/** Display order of summary keys */
export const SUMMARY_KEYS: readonly SummaryKey[] = [
  'delete',
  'reset',
  'delay',
  'reset_lapses',
  'remove_tag',
  'skipped',
];
