import path from 'path';
import { Router } from 'express';
import type { AppServices } from '../app';
import { asyncHandler } from '../middleware/errorHandler';
import { validateParams } from '../middleware/validation';
import { DeckCardParamsSchema, DeckIdParamsSchema } from '../schemas/deck.schemas';
import { buildDeckFilters } from '../services/deck-state.service';
import { buildCardPayload, toCardSummary } from '../utils/card-payload.utils';
import { NotFoundError, NotImplementedError } from '../utils/errors';

export function createDecksRouter({ deckState, ratings }: AppServices): Router {
  const router = Router();

  /**
   * GET /api/decks
   * Decks of the current package with top-level filters
   */
  router.get('/', (_req, res) => {
    const collection = deckState.requireCollection();
    const decks = [...collection.decks.values()].map((deck) => ({
      id: deck.deckId,
      name: deck.name,
      cardCount: deck.cards.length,
    }));
    const current = deckState.currentPackage;
    return res.json({
      success: true,
      data: {
        decks,
        filters: buildDeckFilters(collection),
        totalCards: collection.totalCards,
        currentPackage: current ? path.basename(current) : null,
      },
    });
  });

  /**
   * GET /api/decks/:deckId
   */
  router.get('/:deckId', validateParams(DeckIdParamsSchema), (req, res) => {
    const { deckId } = DeckIdParamsSchema.parse(req.params);
    const deck = deckState.requireCollection().getDeck(deckId);
    if (!deck) {
      throw new NotFoundError('Deck');
    }
    return res.json({
      success: true,
      data: { id: deck.deckId, name: deck.name, cards: deck.cards.map(toCardSummary) },
    });
  });

  /**
   * GET /api/decks/:deckId/cards/:cardId
   * Rendered card with media diagnostics
   */
  router.get('/:deckId/cards/:cardId', validateParams(DeckCardParamsSchema), (req, res) => {
    const { deckId, cardId } = DeckCardParamsSchema.parse(req.params);
    const collection = deckState.requireCollection();
    if (!collection.getDeck(deckId)) {
      throw new NotFoundError('Deck');
    }
    const card = collection.findCard(deckId, cardId);
    if (!card) {
      throw new NotFoundError('Card');
    }
    return res.json({
      success: true,
      data: buildCardPayload(card, {
        mediaUrlPath: deckState.mediaUrlPath,
        mediaDirectory: deckState.mediaDirectory,
        collection,
      }),
    });
  });

  /**
   * GET /api/decks/:deckId/ratings
   */
  router.get('/:deckId/ratings', validateParams(DeckIdParamsSchema), asyncHandler(async (req, res) => {
    if (!ratings.enabled) {
      throw new NotImplementedError('Ratings storage not configured');
    }
    const { deckId } = DeckIdParamsSchema.parse(req.params);
    return res.json({ success: true, data: { deckId, ratings: await ratings.load(deckId) } });
  }));

  return router;
}
