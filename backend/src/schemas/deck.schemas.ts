/**
 * Deck and card route parameter schemas
 */

import { z } from 'zod';

/** Anki ids are integers (epoch milliseconds for most rows) */
const numericId = (label: string) =>
  z.string().regex(/^-?\d+$/, `${label} must be an integer`).transform(Number);

export const DeckIdParamsSchema = z.object({
  deckId: numericId('Deck ID'),
});

export const DeckCardParamsSchema = z.object({
  deckId: numericId('Deck ID'),
  cardId: numericId('Card ID'),
});

export const CardIdParamsSchema = z.object({
  cardId: numericId('Card ID'),
});
