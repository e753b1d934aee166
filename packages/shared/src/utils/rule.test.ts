import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import {
  createRule,
  isLeechAction,
  normalizeAction,
  normalizeDelayDays,
  normalizeRule,
  parseInteger,
  serializeRule,
} from './rule.js';
import { LEECH_ACTIONS, type LeechAction } from '../types/rule.js';

const actionArb = fc.constantFrom<LeechAction>(...LEECH_ACTIONS);
const nonDelayActionArb = fc.constantFrom<LeechAction>('reset', 'delete', 'reset_lapses', 'remove_tag');

describe('Rule normalization', () => {
  describe('normalizeAction', () => {
    it('should accept action values', () => {
      fc.assert(
        fc.property(actionArb, (action) => {
          expect(normalizeAction(action)).toBe(action);
        })
      );
    });

    it('should accept display labels regardless of case and padding', () => {
      expect(normalizeAction('Delay card')).toBe('delay');
      expect(normalizeAction('  DELETE CARD ')).toBe('delete');
      expect(normalizeAction('reset lapse count')).toBe('reset_lapses');
      expect(normalizeAction('Remove leech tag')).toBe('remove_tag');
      expect(normalizeAction('Reset progress')).toBe('reset');
    });

    it('should fall back to reset for unknown actions', () => {
      expect(normalizeAction('suspend')).toBe('reset');
      expect(normalizeAction('')).toBe('reset');
      expect(normalizeAction(42)).toBe('reset');
      expect(normalizeAction(undefined)).toBe('reset');
      expect(normalizeAction(null)).toBe('reset');
    });
  });

  describe('parseInteger', () => {
    it('should read numbers and integer strings', () => {
      expect(parseInteger(5)).toBe(5);
      expect(parseInteger(5.9)).toBe(5);
      expect(parseInteger('12')).toBe(12);
      expect(parseInteger(' -3 ')).toBe(-3);
    });

    it('should reject everything else', () => {
      expect(parseInteger('abc')).toBeNull();
      expect(parseInteger('1.5')).toBeNull();
      expect(parseInteger('')).toBeNull();
      expect(parseInteger(Number.NaN)).toBeNull();
      expect(parseInteger(Number.POSITIVE_INFINITY)).toBeNull();
      expect(parseInteger(true)).toBeNull();
      expect(parseInteger(null)).toBeNull();
      expect(parseInteger(undefined)).toBeNull();
    });
  });

  describe('normalizeDelayDays', () => {
    it('should clamp values below one', () => {
      expect(normalizeDelayDays('delay', 0)).toBe(1);
      expect(normalizeDelayDays('delay', -5)).toBe(1);
    });

    it('should default missing or invalid values to seven', () => {
      expect(normalizeDelayDays('delay', null)).toBe(7);
      expect(normalizeDelayDays('delay', undefined)).toBe(7);
      expect(normalizeDelayDays('delay', '')).toBe(7);
      expect(normalizeDelayDays('delay', 'soon')).toBe(7);
    });

    it('should keep positive values', () => {
      expect(normalizeDelayDays('delay', 30)).toBe(30);
      expect(normalizeDelayDays('delay', '14')).toBe(14);
    });

    it('should always be null for other actions', () => {
      fc.assert(
        fc.property(nonDelayActionArb, fc.anything(), (action, value) => {
          expect(normalizeDelayDays(action, value)).toBeNull();
        }),
        { numRuns: 100 }
      );
    });

    it('should always be at least one for delay', () => {
      fc.assert(
        fc.property(fc.anything(), (value) => {
          const days = normalizeDelayDays('delay', value);
          expect(days).not.toBeNull();
          expect(days ?? 0).toBeGreaterThanOrEqual(1);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('normalizeRule', () => {
    it('should default both patterns to match all', () => {
      expect(normalizeRule({ action: 'remove_tag' })).toEqual({
        deck: '*',
        noteType: '*',
        action: 'remove_tag',
        delayDays: null,
      });
    });

    it('should read the persisted field names', () => {
      expect(normalizeRule({ deck: 'Japanese::*', note_type: 'Basic', action: 'delay', delay_days: 3 })).toEqual({
        deck: 'Japanese::*',
        noteType: 'Basic',
        action: 'delay',
        delayDays: 3,
      });
    });

    it('should drop the delay of non-delay actions', () => {
      expect(normalizeRule({ action: 'reset', delay_days: 10 }).delayDays).toBeNull();
    });

    it('should turn an unknown action into reset', () => {
      expect(normalizeRule({ action: 'bury' }).action).toBe('reset');
    });

    it('should tolerate entries that are not objects', () => {
      expect(normalizeRule('garbage')).toEqual({ deck: '*', noteType: '*', action: 'reset', delayDays: null });
      expect(normalizeRule(null)).toEqual({ deck: '*', noteType: '*', action: 'reset', delayDays: null });
    });

    it('should replace non-string patterns', () => {
      const rule = normalizeRule({ deck: 7, note_type: ['Basic'], action: 'delete' });
      expect(rule.deck).toBe('*');
      expect(rule.noteType).toBe('*');
    });

    it('should produce frozen rules', () => {
      expect(Object.isFrozen(normalizeRule({ action: 'reset' }))).toBe(true);
    });

    it('should always satisfy the delay invariant', () => {
      fc.assert(
        fc.property(
          fc.record({ deck: fc.anything(), note_type: fc.anything(), action: fc.anything(), delay_days: fc.anything() }),
          (raw) => {
            const rule = normalizeRule(raw);
            expect(isLeechAction(rule.action)).toBe(true);
            if (rule.action === 'delay') {
              expect(rule.delayDays ?? 0).toBeGreaterThanOrEqual(1);
            } else {
              expect(rule.delayDays).toBeNull();
            }
          }
        ),
        { numRuns: 200 }
      );
    });
  });

  describe('createRule / serializeRule', () => {
    it('should normalize editor input', () => {
      expect(createRule({ action: 'delay', delayDays: 0 })).toEqual({
        deck: '*',
        noteType: '*',
        action: 'delay',
        delayDays: 1,
      });
    });

    it('should write the persisted layout', () => {
      const rule = createRule({ deck: 'Deck A', noteType: 'Cloze', action: 'delay', delayDays: 21 });
      expect(serializeRule(rule)).toEqual({
        deck: 'Deck A',
        note_type: 'Cloze',
        action: 'delay',
        delay_days: 21,
      });
    });

    it('should read back what it writes', () => {
      fc.assert(
        fc.property(fc.string(), fc.string(), actionArb, fc.option(fc.integer({ min: -10, max: 400 })), (deck, noteType, action, delayDays) => {
          const rule = createRule({ deck, noteType, action, delayDays });
          expect(normalizeRule(serializeRule(rule))).toEqual(rule);
        }),
        { numRuns: 100 }
      );
    });
  });
});
