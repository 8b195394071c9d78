/**
 * Rating Validation Schemas
 */

import { z } from 'zod';
import { RATING_LABELS } from '../constants/validation.constants';

export const SetRatingSchema = z.object({
  deckId: z.number().int('Deck ID must be an integer'),
  /** Empty string clears the card's rating */
  rating: z.enum(RATING_LABELS).or(z.literal('')).default(''),
});
