/**
 * Remediation actions a rule can apply to a leech card
 */
export type LeechAction = 'reset' | 'delay' | 'delete' | 'reset_lapses' | 'remove_tag';

/**
 * Action label/value pairs in the order editors present them
 */
export const ACTION_OPTIONS: ReadonlyArray<{ label: string; value: LeechAction }> = [
  { label: 'Reset progress', value: 'reset' },
  { label: 'Delay card', value: 'delay' },
  { label: 'Delete card', value: 'delete' },
  { label: 'Reset lapse count', value: 'reset_lapses' },
  { label: 'Remove leech tag', value: 'remove_tag' },
];

export const LEECH_ACTIONS: readonly LeechAction[] = ACTION_OPTIONS.map((option) => option.value);

export const DEFAULT_ACTION: LeechAction = 'reset';

export const DEFAULT_DELAY_DAYS = 7;

export const MIN_DELAY_DAYS = 1;

/** Pattern that matches every deck or note type */
export const MATCH_ALL = '*';

/**
 * Management rule after normalization
 * delayDays is non-null exactly when action is 'delay'
 */
export interface Rule {
  readonly deck: string;
  readonly noteType: string;
  readonly action: LeechAction;
  readonly delayDays: number | null;
}

/**
 * Rule entry as persisted in the configuration document
 */
export interface StoredRule {
  deck: string;
  note_type: string;
  action: LeechAction;
  delay_days: number | null;
}
