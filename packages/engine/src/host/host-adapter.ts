/**
 * Host Collection Adapter
 *
 * Resolves the method names a particular host version provides into the
 * single CollectionStore interface the engine depends on.
 */

import type { CollectionStore } from './collection-store.js';
import type { HostCard, HostCollection } from './types.js';

/**
 * Thrown when the host lacks a capability the engine requires
 */
export class HostCapabilityError extends Error {
  constructor(public readonly candidates: string[]) {
    super(`Host collection does not provide any of: ${candidates.join(', ')}`);
    this.name = 'HostCapabilityError';
  }
}

function requireMethod<T>(method: T | undefined, candidates: string[]): T {
  if (!method) {
    throw new HostCapabilityError(candidates);
  }
  return method;
}

function uniqueSorted(names: string[]): string[] {
  return Array.from(new Set(names.filter((name) => name.length > 0))).sort();
}

/**
 * Adapt a host collection to the CollectionStore interface
 * Required capabilities are checked once, up front.
 */
export function createCollectionStore(host: HostCollection): CollectionStore {
  const { sched, decks, models } = host;

  const finder = requireMethod(host.find_cards ?? host.findCards, ['find_cards', 'findCards']);
  const getter = requireMethod(host.get_card ?? host.getCard, ['get_card', 'getCard']);
  const remover = requireMethod(host.remove_cards ?? host.rem_cards ?? host.remCards, [
    'remove_cards',
    'rem_cards',
    'remCards',
  ]);
  const resetter = requireMethod(sched.reset_cards ?? sched.resetCards, [
    'sched.reset_cards',
    'sched.resetCards',
  ]);

  return {
    findCards(query: string): number[] {
      return finder.call(host, query);
    },

    getCard(cardId: number): HostCard | null {
      try {
        return getter.call(host, cardId) ?? null;
      } catch (error) {
        console.warn(`[CollectionAdapter] Card ${cardId} could not be loaded:`, error);
        return null;
      }
    },

    removeCards(cardIds: number[]): void {
      remover.call(host, cardIds);
    },

    resetCards(cardIds: number[]): void {
      resetter.call(sched, cardIds);
    },

    deckName(deckId: number): string {
      return decks.name(deckId);
    },

    noteTypeName(noteTypeId: number | undefined): string {
      if (!noteTypeId) {
        return '';
      }
      return models.get(noteTypeId)?.name ?? '';
    },

    today(): number {
      return sched.today;
    },

    deckNames(): string[] {
      if (decks.all_names_and_ids) {
        return uniqueSorted(decks.all_names_and_ids({ include_filtered: false }).map((entry) => entry.name));
      }
      if (decks.allNames) {
        return uniqueSorted(decks.allNames());
      }
      return [];
    },

    noteTypeNames(): string[] {
      if (models.all_names_and_ids) {
        return uniqueSorted(models.all_names_and_ids().map((entry) => entry.name));
      }
      if (models.all) {
        return uniqueSorted(models.all().map((model) => model.name ?? ''));
      }
      return [];
    },
  };
}
