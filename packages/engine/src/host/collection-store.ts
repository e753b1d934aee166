import type { HostCard } from './types.js';

/**
 * Operations the engine needs from the collection
 */
export interface CollectionStore {
  findCards(query: string): number[];
  /** Returns null for cards that do not exist */
  getCard(cardId: number): HostCard | null;
  removeCards(cardIds: number[]): void;
  /** Reset scheduling progress */
  resetCards(cardIds: number[]): void;
  deckName(deckId: number): string;
  /** Empty string when the note type is unknown */
  noteTypeName(noteTypeId: number | undefined): string;
  today(): number;
  deckNames(): string[];
  noteTypeNames(): string[];
}
