/**
 * Shapes of the host flashcard collection
 *
 * Hosts expose slightly different method names across versions, so the
 * variants are optional here and resolved once by the collection adapter.
 */

/** Queue and type value of a card in long-term review */
export const REVIEW_QUEUE = 2;
export const REVIEW_TYPE = 2;

export interface HostNote {
  id: number;
  /** Note type id */
  mid?: number;
  tags: string[];
  flush(): void;
}

export interface HostCard {
  id: number;
  /** Deck id */
  did: number;
  queue: number;
  type: number;
  /** Interval in days */
  ivl: number;
  /** Due day, relative to the collection's day counter */
  due: number;
  lapses: number;
  note(): HostNote;
  flush(): void;
}

/**
 * Name/id entry returned by listing calls
 */
export interface HostNameId {
  id: number;
  name: string;
}

export interface HostScheduler {
  /** Today as a collection-relative day counter */
  today: number;
  reset_cards?(cardIds: number[]): void;
  resetCards?(cardIds: number[]): void;
}

export interface HostDecks {
  name(deckId: number): string;
  all_names_and_ids?(options?: { include_filtered?: boolean }): HostNameId[];
  allNames?(): string[];
}

export interface HostModels {
  get(noteTypeId: number): { name?: string } | null | undefined;
  all_names_and_ids?(): HostNameId[];
  all?(): Array<{ name?: string }>;
}

/**
 * The host collection object
 */
export interface HostCollection {
  find_cards?(query: string): number[];
  findCards?(query: string): number[];
  get_card?(cardId: number): HostCard | null | undefined;
  getCard?(cardId: number): HostCard | null | undefined;
  remove_cards?(cardIds: number[]): void;
  rem_cards?(cardIds: number[]): void;
  remCards?(cardIds: number[]): void;
  sched: HostScheduler;
  decks: HostDecks;
  models: HostModels;
}

/**
 * Optional host UI hooks
 */
export interface HostHooks {
  /** Record an undo point before changes are made */
  checkpoint?(label: string): void;
  /** Refresh host views after changes */
  refresh?(): void;
}
