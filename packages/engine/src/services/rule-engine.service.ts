/**
 * Rule Engine
 *
 * Decides which rule governs a leech card and applies its action.
 *
 * Rules are evaluated in list order and the first one whose deck pattern and
 * note type pattern both match fires; evaluation then stops for that card.
 * A card no rule matches is counted as skipped. Exactly one summary key is
 * incremented per card.
 *
 * In simulate mode the same rule is selected and counted, but nothing in the
 * collection is changed.
 */

import type { ActionSummary, Rule } from '@leech-actions/shared';
import { createEmptySummary, globMatch, hasTag, withoutTag } from '@leech-actions/shared';
import type { CollectionStore } from '../host/collection-store.js';
import { REVIEW_QUEUE, REVIEW_TYPE, type HostCard, type HostNote } from '../host/types.js';
import type { LeechConfigSource } from './config.service.js';

/**
 * Everything the engine knows about one card while evaluating it
 */
export interface CardContext {
  card: HostCard;
  note: HostNote;
  deckName: string;
  noteTypeName: string;
}

/**
 * Check if a rule applies to a deck / note type pair
 */
export function ruleMatches(rule: Rule, deckName: string, noteTypeName: string): boolean {
  return globMatch(deckName, rule.deck) && globMatch(noteTypeName, rule.noteType);
}

/**
 * Find the first rule that applies, if any
 */
export function findMatchingRule(
  rules: readonly Rule[],
  deckName: string,
  noteTypeName: string
): Rule | undefined {
  return rules.find((rule) => ruleMatches(rule, deckName, noteTypeName));
}

/**
 * Performs rule actions against the collection
 */
export class LeechActionExecutor {
  constructor(private collection: CollectionStore) {}

  execute(rule: Rule, context: CardContext, leechTag: string): void {
    const { card, note } = context;

    switch (rule.action) {
      case 'reset':
        this.collection.resetCards([card.id]);
        this.stripLeechTag(note, leechTag);
        break;
      case 'delay':
        this.delayCard(card, rule.delayDays ?? 0);
        this.stripLeechTag(note, leechTag);
        break;
      case 'delete':
        // The tag change is recorded before the card disappears
        this.stripLeechTag(note, leechTag);
        this.collection.removeCards([card.id]);
        break;
      case 'reset_lapses':
        this.resetLapses(card);
        this.stripLeechTag(note, leechTag);
        break;
      case 'remove_tag':
        this.stripLeechTag(note, leechTag);
        break;
      default: {
        // Exhaustive check
        const _exhaustive: never = rule.action;
        throw new Error(`Unknown action: ${_exhaustive}`);
      }
    }
  }

  /**
   * Move a card into long-term review, due `delayDays` from today
   */
  delayCard(card: HostCard, delayDays: number): void {
    const days = Math.max(1, delayDays);
    card.queue = REVIEW_QUEUE;
    card.type = REVIEW_TYPE;
    card.ivl = days;
    card.due = this.collection.today() + days;
    card.flush();
  }

  resetLapses(card: HostCard): void {
    card.lapses = 0;
    card.flush();
  }

  /**
   * Remove the leech tag from a note
   * The note is only flushed when the tag was present.
   *
   * @returns Whether the note changed
   */
  stripLeechTag(note: HostNote, leechTag: string): boolean {
    if (!hasTag(note.tags, leechTag)) {
      return false;
    }
    note.tags = withoutTag(note.tags, leechTag);
    note.flush();
    return true;
  }
}

export class RuleEngine {
  private executor: LeechActionExecutor;

  constructor(
    private collection: CollectionStore,
    private configSource: LeechConfigSource
  ) {
    this.executor = new LeechActionExecutor(collection);
  }

  /**
   * Resolve the deck and note type names of a card
   */
  buildContext(card: HostCard): CardContext {
    const note = card.note();
    return {
      card,
      note,
      deckName: this.collection.deckName(card.did),
      noteTypeName: this.collection.noteTypeName(note.mid),
    };
  }

  /**
   * Evaluate the configured rules for one card
   * Collection failures propagate to the caller.
   */
  applyRulesToCard(card: HostCard, simulate = false): ActionSummary {
    const config = this.configSource.getConfig();
    const context = this.buildContext(card);
    const summary = createEmptySummary();

    const rule = findMatchingRule(config.rules, context.deckName, context.noteTypeName);
    if (!rule) {
      summary.skipped += 1;
      return summary;
    }

    if (!simulate) {
      this.executor.execute(rule, context, config.leechTag);
    }
    summary[rule.action] += 1;
    return summary;
  }
}
