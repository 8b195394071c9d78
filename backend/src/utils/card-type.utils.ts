/**
 * Card classification by text inspection.
 *
 * A card is `cloze` when any of its fields holds a cloze deletion, otherwise
 * `image` when any field embeds an `<img src>`, otherwise `basic`.
 */

import type { CardTextView, CardType, ClozeDeletion } from '../types/deck';

/** `{{c<N>::content}}` or `{{c<N>::content::hint}}` */
const CLOZE_SOURCE = String.raw`\{\{c(\d+)::([\s\S]*?)(?:::([\s\S]*?))?\}\}`;
const IMAGE_PATTERN = /<img\b[^>]*?\ssrc\s*=\s*["']([^"']+)["']/i;

export interface ClozeMatch {
  /** Full marker text */
  marker: string;
  num: number;
  content: string;
  hint: string | undefined;
}

/** Fresh global regex; callers must not share lastIndex state. */
export function createClozePattern(): RegExp {
  return new RegExp(CLOZE_SOURCE, 'gi');
}

export function hasClozeMarker(text: string | null | undefined): boolean {
  return !!text && new RegExp(CLOZE_SOURCE, 'i').test(text);
}

export function matchClozes(text: string | null | undefined): ClozeMatch[] {
  if (!text) return [];
  const matches: ClozeMatch[] = [];
  for (const match of text.matchAll(createClozePattern())) {
    matches.push({
      marker: match[0],
      num: Number.parseInt(match[1], 10),
      content: match[2],
      hint: match[3],
    });
  }
  return matches;
}

/**
 * Cloze deletions in order of appearance; hints are not part of `content`.
 */
export function extractClozeDeletions(text: string | null | undefined): ClozeDeletion[] {
  return matchClozes(text).map(({ num, content }) => ({ num, content }));
}

function* iterCardText(card: CardTextView): Generator<string> {
  for (const field of [card.question, card.answer, card.questionRevealed]) {
    if (field) yield field;
  }
  for (const field of card.extraFields ?? []) {
    if (field) yield field;
  }
}

export function isClozeCard(card: CardTextView): boolean {
  for (const text of iterCardText(card)) {
    if (hasClozeMarker(text)) return true;
  }
  return false;
}

export function isImageCard(card: CardTextView): boolean {
  for (const text of iterCardText(card)) {
    if (IMAGE_PATTERN.test(text)) return true;
  }
  return false;
}

export function classifyCard(card: CardTextView): CardType {
  if (isClozeCard(card)) return 'cloze';
  if (isImageCard(card)) return 'image';
  return 'basic';
}
