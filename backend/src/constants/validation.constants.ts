/**
 * Validation limits and allowed values for request payloads.
 */
export const VALIDATION_LIMITS = {
  /** Package filename maximum length */
  PACKAGE_FILENAME_MAX: 255,
  /** Media filename maximum length on lookup routes */
  MEDIA_FILENAME_MAX: 255,
} as const;

/** Labels a card can carry in the ratings store */
export const RATING_LABELS = ['favorite', 'bad', 'memorized'] as const;

export type RatingLabel = (typeof RATING_LABELS)[number];

export function isRatingLabel(value: unknown): value is RatingLabel {
  return RATING_LABELS.some((label) => label === value);
}
