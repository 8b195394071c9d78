import { Router } from 'express';
import type { AppServices } from '../app';
import { asyncHandler } from '../middleware/errorHandler';
import { validateParams, validateRequest } from '../middleware/validation';
import { CardIdParamsSchema } from '../schemas/deck.schemas';
import { SetRatingSchema } from '../schemas/rating.schemas';
import { toCardSummary } from '../utils/card-payload.utils';
import { NotImplementedError } from '../utils/errors';

export function createCardsRouter({ deckState, ratings }: AppServices): Router {
  const router = Router();

  /**
   * GET /api/cards
   * id, deck and type of every card in the current package
   */
  router.get('/', (_req, res) => {
    const collection = deckState.requireCollection();
    return res.json({ success: true, data: { cards: [...collection.cards()].map(toCardSummary) } });
  });

  /**
   * POST /api/cards/:cardId/rating
   * Set a card's rating, or clear it with an empty string
   */
  router.post(
    '/:cardId/rating',
    validateParams(CardIdParamsSchema),
    validateRequest(SetRatingSchema),
    asyncHandler(async (req, res) => {
      if (!ratings.enabled) {
        throw new NotImplementedError('Ratings storage not configured');
      }
      const { cardId } = CardIdParamsSchema.parse(req.params);
      const { deckId, rating } = SetRatingSchema.parse(req.body);
      await ratings.setRating(deckId, cardId, rating);
      return res.json({ success: true, data: { cardId, deckId, rating } });
    })
  );

  return router;
}
