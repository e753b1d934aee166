/**
 * In-process stand-in for the host collection, used by tests
 *
 * Supports the subset of the host search syntax the engine emits:
 * `tag:<name>`, `deck:"<name>"` and `note:"<name>"`, joined by spaces.
 * Every mutating call is appended to `operations` so tests can assert order.
 */

import type { HostCard, HostCollection, HostNameId, HostNote } from '../host/types.js';

export interface CardSeed {
  deck: string;
  noteType: string;
  tags?: string[];
  lapses?: number;
  queue?: number;
  type?: number;
  ivl?: number;
  due?: number;
}

class MemoryNote implements HostNote {
  constructor(
    private readonly collection: InMemoryCollection,
    public id: number,
    public mid: number,
    public tags: string[]
  ) {}

  flush(): void {
    this.collection.operations.push(`note.flush:${this.id}`);
  }
}

class MemoryCard implements HostCard {
  constructor(
    private readonly collection: InMemoryCollection,
    private readonly memoryNote: MemoryNote,
    public id: number,
    public did: number,
    public queue: number,
    public type: number,
    public ivl: number,
    public due: number,
    public lapses: number
  ) {}

  note(): HostNote {
    return this.memoryNote;
  }

  flush(): void {
    this.collection.operations.push(`card.flush:${this.id}`);
  }
}

interface SearchTerm {
  field: string;
  value: string;
}

const SEARCH_TERM = /(\w+):(?:"((?:[^"\\]|\\.)*)"|(\S+))/g;

function parseSearch(query: string): SearchTerm[] {
  const terms: SearchTerm[] = [];
  for (const match of query.matchAll(SEARCH_TERM)) {
    const quoted = match[2];
    const bare = match[3] ?? '';
    terms.push({
      field: match[1] ?? '',
      value: quoted !== undefined ? quoted.replace(/\\(.)/g, '$1') : bare,
    });
  }
  return terms;
}

export class InMemoryCollection implements HostCollection {
  readonly operations: string[] = [];
  readonly queries: string[] = [];

  private readonly deckIds = new Map<string, number>();
  private readonly noteTypeIds = new Map<string, number>();
  private readonly cards = new Map<number, MemoryCard>();
  private nextId = 1;

  sched = {
    today: 100,
    reset_cards: (cardIds: number[]): void => {
      this.operations.push(`reset_cards:${cardIds.join(',')}`);
      for (const cardId of cardIds) {
        const card = this.cards.get(cardId);
        if (card) {
          card.queue = 0;
          card.type = 0;
          card.ivl = 0;
          card.due = 0;
        }
      }
    },
  };

  decks = {
    name: (deckId: number): string => this.nameOf(this.deckIds, deckId),
    all_names_and_ids: (): HostNameId[] => this.entries(this.deckIds),
  };

  models = {
    get: (noteTypeId: number): { name: string } | undefined => {
      const name = this.nameOf(this.noteTypeIds, noteTypeId);
      return name ? { name } : undefined;
    },
    all_names_and_ids: (): HostNameId[] => this.entries(this.noteTypeIds),
  };

  addCard(seed: CardSeed): HostCard {
    const deckId = this.idFor(this.deckIds, seed.deck);
    const noteTypeId = this.idFor(this.noteTypeIds, seed.noteType);
    const note = new MemoryNote(this, this.nextId++, noteTypeId, [...(seed.tags ?? ['leech'])]);
    const card = new MemoryCard(
      this,
      note,
      this.nextId++,
      deckId,
      seed.queue ?? 2,
      seed.type ?? 2,
      seed.ivl ?? 3,
      seed.due ?? 90,
      seed.lapses ?? 8
    );
    this.cards.set(card.id, card);
    return card;
  }

  /** Register a deck that holds no cards */
  addDeck(name: string): void {
    this.idFor(this.deckIds, name);
  }

  hasCard(cardId: number): boolean {
    return this.cards.has(cardId);
  }

  find_cards(query: string): number[] {
    this.queries.push(query);
    const terms = parseSearch(query);
    return Array.from(this.cards.values())
      .filter((card) => terms.every((term) => this.cardMatches(card, term)))
      .map((card) => card.id);
  }

  get_card(cardId: number): HostCard | null {
    return this.cards.get(cardId) ?? null;
  }

  remove_cards(cardIds: number[]): void {
    this.operations.push(`remove_cards:${cardIds.join(',')}`);
    for (const cardId of cardIds) {
      this.cards.delete(cardId);
    }
  }

  private cardMatches(card: MemoryCard, term: SearchTerm): boolean {
    switch (term.field) {
      case 'tag':
        return card.note().tags.some((tag) => tag.toLowerCase() === term.value.toLowerCase());
      case 'deck':
        return this.decks.name(card.did) === term.value;
      case 'note':
        return this.nameOf(this.noteTypeIds, card.note().mid ?? 0) === term.value;
      default:
        return false;
    }
  }

  private idFor(ids: Map<string, number>, name: string): number {
    const existing = ids.get(name);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.nextId++;
    ids.set(name, id);
    return id;
  }

  private nameOf(ids: Map<string, number>, id: number): string {
    for (const [name, value] of ids) {
      if (value === id) {
        return name;
      }
    }
    return '';
  }

  private entries(ids: Map<string, number>): HostNameId[] {
    return Array.from(ids, ([name, id]) => ({ id, name }));
  }
}
