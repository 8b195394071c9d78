import type { Card, Deck } from '../types/deck';
import { buildMediaUrl, lookupMediaAlias } from '../utils/media.utils';

/**
 * All decks read from one package, plus the media alias map built while
 * copying its media. A reload produces a new collection; existing ones are
 * never modified.
 */
export class DeckCollection {
  constructor(
    readonly decks: ReadonlyMap<number, Deck>,
    /** Original, lowercase and stem aliases → stored media name */
    readonly mediaFilenames: ReadonlyMap<string, string>,
    readonly mediaUrlPath: string,
    readonly mediaDirectory: string | null
  ) {}

  get totalCards(): number {
    let total = 0;
    for (const deck of this.decks.values()) {
      total += deck.cards.length;
    }
    return total;
  }

  getDeck(deckId: number): Deck | undefined {
    return this.decks.get(deckId);
  }

  findCard(deckId: number, cardId: number): Card | undefined {
    return this.decks.get(deckId)?.cards.find((card) => card.cardId === cardId);
  }

  *cards(): Generator<Card> {
    for (const deck of this.decks.values()) {
      yield* deck.cards;
    }
  }

  /** Served URL for an original media filename, or null when it is not part of the package. */
  mediaUrlFor(filename: string): string | null {
    const storedName = lookupMediaAlias(this.mediaFilenames, filename);
    return storedName === undefined ? null : buildMediaUrl(storedName, this.mediaUrlPath);
  }
}
