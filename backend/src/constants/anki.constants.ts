/**
 * Anki package and collection layout
 */

/** Separator between note field values in `notes.flds` (ASCII unit separator) */
export const FIELD_SEPARATOR = '\x1f';

/** Collection database names inside a package, newest format first */
export const COLLECTION_FILENAMES = ['collection.anki21', 'collection.anki2'] as const;

/** Media manifest entry inside a package */
export const MEDIA_MANIFEST_FILENAME = 'media';

/** `type` value of cloze note models in `col.models` */
export const MODEL_TYPE_CLOZE = 1;

/** Deck name separator for nested decks ("Parent::Child") */
export const DECK_NAME_SEPARATOR = '::';

export const TEMP_PREFIX = {
  WORKSPACE: 'deck-viewer-',
  COLLECTION_COPY: 'deck-viewer-collection-',
  MEDIA: 'deck-viewer-media-',
} as const;

export const MEDIA_DEFAULTS = {
  URL_PATH: '/media',
  /** Stored name used when sanitizing leaves nothing usable */
  PLACEHOLDER_NAME: 'media',
  DIRECTORY_NAME: 'media',
  LOOKUP_TTL_SECONDS: 5,
} as const;

export const RATINGS_DIRECTORY_NAME = '.ratings';

export const DECK_FILTER_SHORTCUTS = ['1', '2', '3', '4', '5', '6', '7', '8', '9'] as const;

/** Deck id used for the virtual favorites deck */
export const FAVORITES_DECK_ID = 999999;
