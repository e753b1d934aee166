/**
 * Leech Action Service
 *
 * Finds leech cards in the collection and runs the rule engine over batches
 * of them. Cards are processed one at a time, in the order given, since a
 * deletion invalidates any later reference to the same card.
 */

import type { ActionSummary } from '@leech-actions/shared';
import { addSummary, createEmptySummary, formatSummary } from '@leech-actions/shared';
import type { CollectionStore } from '../host/collection-store.js';
import type { HostCard } from '../host/types.js';
import type { LeechConfigSource } from './config.service.js';
import { RuleEngine } from './rule-engine.service.js';

/**
 * Quote a value for the host search syntax
 */
export function quoteSearchValue(value: string): string {
  return `"${value.replace(/[\\"]/g, '\\$&')}"`;
}

/**
 * Build the search for leech cards, optionally narrowed to a deck and note type
 */
export function buildLeechQuery(leechTag: string, deck?: string, noteType?: string): string {
  const parts = [`tag:${leechTag}`];
  if (deck) {
    parts.push(`deck:${quoteSearchValue(deck)}`);
  }
  if (noteType) {
    parts.push(`note:${quoteSearchValue(noteType)}`);
  }
  return parts.join(' ');
}

export class LeechActionService {
  private engine: RuleEngine;

  constructor(
    private collection: CollectionStore,
    private configSource: LeechConfigSource
  ) {
    this.engine = new RuleEngine(collection, configSource);
  }

  /**
   * Ids of the cards carrying the leech tag, without duplicates, in search order
   */
  findLeechCards(deck?: string, noteType?: string): number[] {
    const query = buildLeechQuery(this.configSource.getConfig().leechTag, deck, noteType);
    return Array.from(new Set(this.collection.findCards(query)));
  }

  /**
   * Apply the rules to a batch of cards and total the outcome
   * Cards that cannot be found are counted as skipped.
   */
  processCards(cardIds: readonly number[], simulate = false): ActionSummary {
    const total = createEmptySummary();
    if (cardIds.length === 0) {
      return total;
    }

    for (const cardId of cardIds) {
      const card = this.collection.getCard(cardId);
      if (!card) {
        total.skipped += 1;
        continue;
      }
      addSummary(total, this.engine.applyRulesToCard(card, simulate));
    }

    const label = simulate ? 'Simulated' : 'Processed';
    console.log(`[LeechActionService] ${formatSummary(`${label} ${cardIds.length} card(s)`, total)}`);
    return total;
  }

  /**
   * Apply the rules to a single card
   */
  applyRulesToCard(card: HostCard, simulate = false): ActionSummary {
    return this.engine.applyRulesToCard(card, simulate);
  }
}
