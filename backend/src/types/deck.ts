/**
 * Deck and card types produced by package ingestion
 */

export type CardType = 'basic' | 'cloze' | 'image';

export interface ClozeDeletion {
  num: number;
  content: string;
}

/**
 * Text-bearing fields of a card. The classifier accepts this shape so it can
 * run on a card that has not been built yet.
 */
export interface CardTextView {
  readonly question?: string | null;
  readonly answer?: string | null;
  readonly questionRevealed?: string | null;
  readonly extraFields?: readonly string[];
}

export interface Card extends CardTextView {
  readonly cardId: number;
  readonly noteId: number;
  readonly deckId: number;
  readonly deckName: string;
  /** Template index after wrapping `cards.ord` into the model's template range */
  readonly templateOrdinal: number;
  readonly question: string;
  readonly answer: string;
  readonly cardType: CardType;
  readonly questionRevealed: string | null;
  readonly extraFields: readonly string[];
  /** Question before cloze rendering; set for cloze cards */
  readonly rawQuestion: string | null;
  readonly clozeDeletions: readonly ClozeDeletion[];
}

export interface Deck {
  readonly deckId: number;
  readonly name: string;
  readonly cards: readonly Card[];
}

export interface NoteModelTemplate {
  name: string;
  ordinal: number;
  questionFormat: string;
  answerFormat: string;
}

export interface NoteModel {
  id: number;
  name: string;
  /** 0 = standard, 1 = cloze */
  type: number;
  fieldNames: string[];
  templates: NoteModelTemplate[];
}

/** One row of the cards ⋈ notes query */
export interface CardNoteRow {
  cardId: number;
  noteId: number;
  deckId: number;
  ordinal: number;
  modelId: number | null;
  fields: string;
}

export type IngestionState =
  | 'idle'
  | 'extracting'
  | 'parsing-metadata'
  | 'reading-notes'
  | 'rendering-cards'
  | 'assembling-decks'
  | 'ready'
  | 'failed';

export interface LoadCollectionOptions {
  /** Directory receiving the package's media files; a temp directory when omitted */
  mediaDir?: string;
  /** URL prefix media references are rewritten to */
  mediaUrlPath?: string;
}
