import {
  ACTION_OPTIONS,
  DEFAULT_ACTION,
  DEFAULT_DELAY_DAYS,
  LEECH_ACTIONS,
  MATCH_ALL,
  MIN_DELAY_DAYS,
  type LeechAction,
  type Rule,
  type StoredRule,
} from '../types/rule.js';

/**
 * Lower-cased label or value -> action
 */
const ACTION_LOOKUP: ReadonlyMap<string, LeechAction> = new Map([
  ...ACTION_OPTIONS.map((option) => [option.label.toLowerCase(), option.value] as const),
  ...LEECH_ACTIONS.map((action) => [action, action] as const),
]);

const INTEGER_STRING = /^\s*[+-]?\d+\s*$/;

/**
 * Check if a value is a known action name
 */
export function isLeechAction(value: unknown): value is LeechAction {
  return typeof value === 'string' && LEECH_ACTIONS.some((action) => action === value);
}

/**
 * Resolve an action given either its value or its display label
 * Unknown or missing actions resolve to 'reset'
 */
export function normalizeAction(value: unknown): LeechAction {
  if (typeof value !== 'string') {
    return DEFAULT_ACTION;
  }
  const key = value.trim().toLowerCase();
  return ACTION_LOOKUP.get(key) ?? DEFAULT_ACTION;
}

/**
 * Read an integer out of a loosely typed value
 * Returns null for anything that is not an integer or an integer string
 */
export function parseInteger(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? Math.trunc(value) : null;
  }
  if (typeof value === 'string' && INTEGER_STRING.test(value)) {
    return parseInt(value, 10);
  }
  return null;
}

/**
 * Resolve the delay for an action
 * Only 'delay' carries a value: missing input becomes the default and
 * anything below the minimum is clamped up to it.
 */
export function normalizeDelayDays(action: LeechAction, value: unknown): number | null {
  if (action !== 'delay') {
    return null;
  }
  const days = parseInteger(value);
  if (days === null) {
    return DEFAULT_DELAY_DAYS;
  }
  return Math.max(MIN_DELAY_DAYS, days);
}

function normalizePattern(value: unknown): string {
  return typeof value === 'string' ? value : MATCH_ALL;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Build a rule from a raw configuration entry
 * Never throws: malformed fields fall back to their defaults.
 */
export function normalizeRule(raw: unknown): Rule {
  const data = isRecord(raw) ? raw : {};
  const action = normalizeAction(data.action);

  return Object.freeze({
    deck: normalizePattern(data.deck),
    noteType: normalizePattern(data.note_type),
    action,
    delayDays: normalizeDelayDays(action, data.delay_days),
  });
}

/**
 * Fields an editor supplies when creating a rule
 */
export interface RuleInput {
  deck?: string;
  noteType?: string;
  action: LeechAction | string;
  delayDays?: number | null;
}

/**
 * Build a rule from editor input, applying the same normalization as loading
 */
export function createRule(input: RuleInput): Rule {
  return normalizeRule({
    deck: input.deck,
    note_type: input.noteType,
    action: input.action,
    delay_days: input.delayDays,
  });
}

/**
 * Convert a rule to its persisted form
 */
export function serializeRule(rule: Rule): StoredRule {
  return {
    deck: rule.deck,
    note_type: rule.noteType,
    action: rule.action,
    delay_days: rule.delayDays,
  };
}
