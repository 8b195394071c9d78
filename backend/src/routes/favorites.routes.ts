import { Router } from 'express';
import type { AppServices } from '../app';
import { FAVORITES_DECK_ID } from '../constants/anki.constants';
import { asyncHandler } from '../middleware/errorHandler';
import { toCardSummary } from '../utils/card-payload.utils';
import { NotImplementedError } from '../utils/errors';

export function createFavoritesRouter({ deckState, ratings }: AppServices): Router {
  const router = Router();

  /**
   * GET /api/favorites
   * Virtual deck of favorite cards across every available package
   */
  router.get('/', asyncHandler(async (_req, res) => {
    if (!ratings.enabled) {
      throw new NotImplementedError('Favorites deck requires a data directory');
    }
    const favorites = await ratings.getAllFavorites();
    const cards = await deckState.collectFavoriteCards(favorites);
    return res.json({
      success: true,
      data: { id: FAVORITES_DECK_ID, name: 'Favorites', cards: cards.map(toCardSummary) },
    });
  }));

  return router;
}
