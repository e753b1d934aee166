import { MATCH_ALL } from '@leech-actions/shared';
import type { CollectionStore } from '../host/collection-store.js';

/**
 * Option offered by a rule editor
 */
export interface RuleChoice {
  label: string;
  value: string;
}

/**
 * Deck and note type options for editing rules
 * The match-all option always comes first, followed by the host's names.
 */
export class RuleChoicesService {
  constructor(private collection: CollectionStore) {}

  getDeckChoices(): RuleChoice[] {
    return [
      { label: 'Any deck (*)', value: MATCH_ALL },
      ...this.collection.deckNames().map((name) => ({ label: name, value: name })),
    ];
  }

  getNoteTypeChoices(): RuleChoice[] {
    return [
      { label: 'Any note type (*)', value: MATCH_ALL },
      ...this.collection.noteTypeNames().map((name) => ({ label: name, value: name })),
    ];
  }
}
