import { SUMMARY_KEYS, type ActionSummary, type SummaryKey } from '../types/summary.js';

/**
 * Create a summary with every count at zero
 */
export function createEmptySummary(): ActionSummary {
  return {
    delete: 0,
    reset: 0,
    delay: 0,
    reset_lapses: 0,
    remove_tag: 0,
    skipped: 0,
  };
}

/**
 * Add the counts of `source` into `target` in place
 */
export function addSummary(target: ActionSummary, source: ActionSummary): ActionSummary {
  for (const key of SUMMARY_KEYS) {
    target[key] += source[key];
  }
  return target;
}

/**
 * Sum a list of summaries into a new one
 */
export function mergeSummaries(summaries: Iterable<ActionSummary>): ActionSummary {
  const total = createEmptySummary();
  for (const summary of summaries) {
    addSummary(total, summary);
  }
  return total;
}

/**
 * Check whether any count (skipped included) is non-zero
 */
export function hasAnyCount(summary: ActionSummary): boolean {
  return SUMMARY_KEYS.some((key) => summary[key] > 0);
}

/**
 * Total number of cards a summary accounts for
 */
export function totalCount(summary: ActionSummary): number {
  return SUMMARY_KEYS.reduce((sum, key) => sum + summary[key], 0);
}

function nonZeroEntries(summary: ActionSummary): Array<[SummaryKey, number]> {
  return SUMMARY_KEYS.filter((key) => summary[key] > 0).map((key) => [key, summary[key]]);
}

/**
 * One-line summary, e.g. "Processed leech cards — reset: 2, skipped: 1"
 */
export function formatSummary(prefix: string, summary: ActionSummary): string {
  const parts = nonZeroEntries(summary).map(([key, count]) => `${key}: ${count}`);
  if (parts.length === 0) {
    return `${prefix} — no changes`;
  }
  return `${prefix} — ${parts.join(', ')}`;
}

/**
 * Multi-line summary with one bullet per non-zero count
 */
export function formatBulletSummary(prefix: string, summary: ActionSummary): string {
  const parts = nonZeroEntries(summary).map(([key, count]) => `- ${key}: ${count}`);
  if (parts.length === 0) {
    return `${prefix} — no changes`;
  }
  return `${prefix}:\n${parts.join('\n')}`;
}
