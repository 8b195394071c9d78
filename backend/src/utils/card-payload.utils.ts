/**
 * JSON shapes served for cards, including the media diagnostics block.
 */

import path from 'path';
import { existsSync } from 'fs';
import type { DeckCollection } from '../models/deck-collection';
import type { Card, CardType, ClozeDeletion } from '../types/deck';
import { extractFilename } from './media.utils';

const IMAGE_SRC_PATTERN = /<img\b[^>]*?\ssrc\s*=\s*['"]([^'"]+)['"][^>]*>/gi;
const SIMILAR_MEDIA_LIMIT = 5;
const MEDIA_SAMPLE_SIZE = 10;

export interface ImageFileStatus {
  filename: string;
  existsOnDisk: boolean;
  fullPath: string | null;
}

export interface CardDebugPayload {
  noteId: number;
  deckId: number;
  deckName: string;
  templateOrdinal: number;
  rawQuestion: string | null;
  clozeDeletions: readonly ClozeDeletion[];
  questionHtmlLength: number;
  answerHtmlLength: number;
  hasQuestionRevealed: boolean;
  extraFieldsCount: number;
  imageSourcesFound?: string[];
  mediaUrlPath?: string;
  mediaDirectory?: string | null;
  imageFileStatus?: Record<string, ImageFileStatus>;
  availableMediaFilesSample?: string[];
  totalMediaFiles?: number;
  similarMediaFiles?: Record<string, string[]>;
}

export interface CardPayload {
  id: number;
  type: CardType;
  question: string;
  answer: string;
  questionRevealed: string | null;
  extraFields: readonly string[];
  text?: string;
  clozes?: ClozeDeletion[];
  images?: string[];
  debug: CardDebugPayload;
}

export interface MediaContext {
  mediaUrlPath: string;
  mediaDirectory: string | null;
  collection: DeckCollection | null;
}

export interface CardSummary {
  id: number;
  deckId: number;
  deckName: string;
  type: CardType;
}

export function toCardSummary(card: Card): CardSummary {
  return { id: card.cardId, deckId: card.deckId, deckName: card.deckName, type: card.cardType };
}

/** Image sources under `mediaUrlPath` found anywhere in the card, sorted and unique. */
export function gatherImageSources(card: Card, mediaUrlPath: string): string[] {
  const sources = new Set<string>();
  for (const text of [card.question, card.answer, card.questionRevealed, ...card.extraFields]) {
    if (!text) continue;
    for (const match of text.matchAll(IMAGE_SRC_PATTERN)) {
      const src = match[1];
      if (src && src.startsWith(mediaUrlPath)) sources.add(src);
    }
  }
  return [...sources].sort();
}

/** Lowercase stem with `_` and `-` read as spaces. */
export function normalizeForComparison(filename: string): string {
  const dot = filename.lastIndexOf('.');
  const stem = dot === -1 ? filename : filename.slice(0, dot);
  return stem.toLowerCase().replace(/[_-]/g, ' ');
}

/**
 * For each referenced image, up to five known media names whose normalized
 * form contains it or is contained by it.
 */
export function findSimilarMediaFiles(
  imageSources: readonly string[],
  mediaFilenames: Iterable<string>
): Record<string, string[]> {
  const known = [...mediaFilenames].map((name) => ({ name, normalized: normalizeForComparison(name) }));
  const suggestions: Record<string, string[]> = {};
  for (const src of imageSources) {
    const filename = extractFilename(src);
    const base = normalizeForComparison(filename);
    const matches = known
      .filter(({ normalized }) => normalized.includes(base) || base.includes(normalized))
      .map(({ name }) => name);
    if (matches.length > 0) suggestions[filename] = matches.slice(0, SIMILAR_MEDIA_LIMIT);
  }
  return suggestions;
}

export function describeImageFiles(mediaDir: string, imageSources: readonly string[]): Record<string, ImageFileStatus> {
  const status: Record<string, ImageFileStatus> = {};
  for (const src of imageSources) {
    const filename = extractFilename(src);
    const fullPath = path.join(mediaDir, filename);
    const existsOnDisk = existsSync(fullPath);
    status[src] = { filename, existsOnDisk, fullPath: existsOnDisk ? fullPath : null };
  }
  return status;
}

export function buildCardDebugPayload(
  card: Card,
  imageSources: readonly string[],
  context: MediaContext
): CardDebugPayload {
  const { collection, mediaDirectory } = context;
  const debug: CardDebugPayload = {
    noteId: card.noteId,
    deckId: card.deckId,
    deckName: card.deckName,
    templateOrdinal: card.templateOrdinal,
    rawQuestion: card.rawQuestion,
    clozeDeletions: card.clozeDeletions,
    questionHtmlLength: card.question.length,
    answerHtmlLength: card.answer.length,
    hasQuestionRevealed: card.questionRevealed !== null,
    extraFieldsCount: card.extraFields.length,
  };

  if (imageSources.length === 0 && card.cardType !== 'image') return debug;

  debug.imageSourcesFound = [...imageSources];
  debug.mediaUrlPath = context.mediaUrlPath;
  debug.mediaDirectory = mediaDirectory;

  if (mediaDirectory && existsSync(mediaDirectory)) {
    debug.imageFileStatus = describeImageFiles(mediaDirectory, imageSources);
  }

  if (collection && collection.mediaFilenames.size > 0) {
    const names = [...collection.mediaFilenames.keys()];
    debug.availableMediaFilesSample = names.slice(0, MEDIA_SAMPLE_SIZE);
    debug.totalMediaFiles = names.length;
    const similar = findSimilarMediaFiles(imageSources, names);
    if (Object.keys(similar).length > 0) debug.similarMediaFiles = similar;
  }

  return debug;
}

export function buildCardPayload(
  card: Card,
  context: MediaContext
): CardPayload {
  const imageSources = gatherImageSources(card, context.mediaUrlPath);
  const payload: CardPayload = {
    id: card.cardId,
    type: card.cardType,
    question: card.question,
    answer: card.answer,
    questionRevealed: card.questionRevealed,
    extraFields: card.extraFields,
    debug: buildCardDebugPayload(card, imageSources, context),
  };

  if (card.cardType === 'cloze') {
    payload.text = card.rawQuestion ?? '';
    payload.clozes = card.clozeDeletions.map(({ num, content }) => ({ num, content }));
  }
  if (card.cardType === 'image' && imageSources.length > 0) {
    payload.images = imageSources;
  }
  return payload;
}
