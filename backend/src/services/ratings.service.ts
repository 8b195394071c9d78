import path from 'path';
import { mkdir, readFile, readdir, writeFile } from 'fs/promises';
import { z } from 'zod';
import { RATINGS_DIRECTORY_NAME } from '../constants/anki.constants';
import { isRatingLabel, type RatingLabel } from '../constants/validation.constants';
import { logger, serializeError } from '../utils/logger';

const log = logger.child('ratings');

/** Card id (as string) → active labels, sorted */
export type DeckRatings = Record<string, RatingLabel[]>;

const RatingsFileSchema = z.record(z.string(), z.unknown());
const RATINGS_FILE_PATTERN = /^deck_(-?\d+)\.json$/;

/**
 * Accepts the stored shapes seen over time: a single label, a list of
 * labels, or `{ label: boolean }`.
 */
export function normalizeRatingEntry(value: unknown): RatingLabel[] {
  const labels = new Set<RatingLabel>();
  if (typeof value === 'string') {
    if (isRatingLabel(value)) labels.add(value);
  } else if (Array.isArray(value)) {
    for (const label of value) {
      if (isRatingLabel(label)) labels.add(label);
    }
  } else if (value !== null && typeof value === 'object') {
    for (const [label, active] of Object.entries(value)) {
      if (active && isRatingLabel(label)) labels.add(label);
    }
  }
  return [...labels].sort();
}

/** Drops cards without a valid label; keys come out sorted. */
export function normalizeRatings(data: Record<string, unknown>): DeckRatings {
  const normalized: DeckRatings = {};
  for (const cardId of Object.keys(data).sort()) {
    const labels = normalizeRatingEntry(data[cardId]);
    if (labels.length > 0) normalized[cardId] = labels;
  }
  return normalized;
}

/**
 * Per-deck rating files under `<dataDir>/.ratings/`. Without a data
 * directory nothing is persisted.
 */
export class RatingsService {
  private readonly ratingsDir: string | null;

  constructor(dataDir: string | null) {
    this.ratingsDir = dataDir ? path.join(dataDir, RATINGS_DIRECTORY_NAME) : null;
  }

  get enabled(): boolean {
    return this.ratingsDir !== null;
  }

  fileFor(deckId: number): string | null {
    return this.ratingsDir ? path.join(this.ratingsDir, `deck_${deckId}.json`) : null;
  }

  async load(deckId: number): Promise<DeckRatings> {
    const file = this.fileFor(deckId);
    if (!file) return {};
    return this.readRatingsFile(file);
  }

  async save(deckId: number, ratings: Record<string, unknown>): Promise<void> {
    const file = this.fileFor(deckId);
    if (!file || !this.ratingsDir) return;
    await mkdir(this.ratingsDir, { recursive: true });
    await writeFile(file, JSON.stringify(normalizeRatings(ratings), null, 2), 'utf-8');
  }

  /** Replace the card's labels with `rating`, or clear them for `''`. */
  async setRating(deckId: number, cardId: number, rating: RatingLabel | ''): Promise<DeckRatings> {
    const ratings: Record<string, unknown> = { ...(await this.load(deckId)) };
    const key = String(cardId);
    if (rating) {
      ratings[key] = [rating];
    } else {
      delete ratings[key];
    }
    await this.save(deckId, ratings);
    return normalizeRatings(ratings);
  }

  /** Deck id → favorited card ids, across every ratings file. */
  async getAllFavorites(): Promise<Map<number, Set<string>>> {
    const favorites = new Map<number, Set<string>>();
    if (!this.ratingsDir) return favorites;

    let entries: string[];
    try {
      entries = await readdir(this.ratingsDir);
    } catch (error) {
      log.debug('No ratings directory', { directory: this.ratingsDir, error: serializeError(error) });
      return favorites;
    }

    for (const entry of entries.sort()) {
      const match = RATINGS_FILE_PATTERN.exec(entry);
      if (!match) continue;
      const ratings = await this.readRatingsFile(path.join(this.ratingsDir, entry));
      const cardIds = Object.keys(ratings).filter((cardId) => ratings[cardId]?.includes('favorite'));
      if (cardIds.length > 0) favorites.set(Number(match[1]), new Set(cardIds));
    }
    return favorites;
  }

  private async readRatingsFile(file: string): Promise<DeckRatings> {
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch {
      return {};
    }
    try {
      return normalizeRatings(RatingsFileSchema.parse(JSON.parse(text)));
    } catch (error) {
      log.warn('Ignoring unreadable ratings file', { file, error: serializeError(error) });
      return {};
    }
  }
}
