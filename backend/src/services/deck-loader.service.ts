import os from 'os';
import path from 'path';
import { copyFile, mkdir, mkdtemp, readFile, rm, stat } from 'fs/promises';
import { existsSync } from 'fs';
import { v4 as uuidv4 } from 'uuid';
import {
  FIELD_SEPARATOR,
  MODEL_TYPE_CLOZE,
  TEMP_PREFIX,
} from '../constants/anki.constants';
import { DeckCollection } from '../models/deck-collection';
import type {
  Card,
  CardNoteRow,
  ClozeDeletion,
  Deck,
  IngestionState,
  LoadCollectionOptions,
  NoteModel,
} from '../types/deck';
import {
  openDatabase,
  parseDeckNames,
  parseNoteModels,
  readCardNoteRows,
  readCollectionRow,
  type Database,
} from '../utils/anki-sql.utils';
import { extractArchive, findCollectionFile, readMediaManifest } from '../utils/anki-package.utils';
import { classifyCard, extractClozeDeletions, hasClozeMarker } from '../utils/card-type.utils';
import { renderCloze } from '../utils/cloze-render.utils';
import {
  normalizeMediaUrlPath,
  registerMediaAliases,
  rewriteMediaReferences,
  storeMediaFile,
  type MediaAliasMap,
} from '../utils/media.utils';
import { renderTemplate } from '../utils/template-render.utils';
import { DeckLoadError, type DeckLoadErrorReason } from '../utils/errors';
import { logger, serializeError } from '../utils/logger';

const log = logger.child('deck-loader');

interface CollectionMetadata {
  deckNames: Map<number, string>;
  models: Map<number, NoteModel>;
}

interface RenderContext extends CollectionMetadata {
  aliases: MediaAliasMap;
  mediaUrlPath: string;
}

// ── Card construction helpers ─────────────────────────────────────────────────

/**
 * Field name → value for a note. Fields beyond the model's names, and every
 * field as a fallback, are also reachable as `Field1`, `Field2`, …
 */
export function buildFieldMap(values: readonly string[], fieldNames: readonly string[]): Record<string, string> {
  const fields: Record<string, string> = {};
  values.forEach((value, index) => {
    const name = fieldNames[index];
    if (name) fields[name] = value;
  });
  values.forEach((value, index) => {
    const positional = `Field${index + 1}`;
    if (!Object.prototype.hasOwnProperty.call(fields, positional)) {
      fields[positional] = value;
    }
  });
  return fields;
}

/** `cards.ord` wrapped into `[0, templateCount)`. */
export function resolveTemplateIndex(ordinal: number, templateCount: number): number {
  if (templateCount <= 0) return ordinal;
  return ((ordinal % templateCount) + templateCount) % templateCount;
}

/**
 * Rendered answer with the first copy of the rendered question removed, so
 * `{{FrontSide}}` content is not shown twice under the revealed cloze.
 */
export function leftoverAnswer(question: string, answer: string): string {
  if (!answer) return '';
  const at = question ? answer.indexOf(question) : -1;
  if (at === -1) return answer;
  return answer.slice(0, at) + answer.slice(at + question.length);
}

/** True when `html` shows an image or any text once tags and `&nbsp;` are removed */
export function hasVisibleContent(html: string): boolean {
  if (/<img\b/i.test(html)) return true;
  return html.replace(/<[^>]*>/g, '').replace(/&nbsp;/gi, ' ').trim().length > 0;
}

function freezeDeletions(deletions: ClozeDeletion[]): readonly ClozeDeletion[] {
  return Object.freeze(deletions.map((deletion) => Object.freeze(deletion)));
}

export function buildCard(row: CardNoteRow, context: RenderContext): Card {
  const values = row.fields.split(FIELD_SEPARATOR);
  const model = row.modelId === null ? undefined : context.models.get(row.modelId);

  let templateOrdinal = row.ordinal;
  let rawQuestion: string;
  let rawAnswer: string;

  if (model && model.templates.length > 0) {
    templateOrdinal = resolveTemplateIndex(row.ordinal, model.templates.length);
    const template = model.templates[templateOrdinal];
    const fields = buildFieldMap(values, model.fieldNames);
    rawQuestion = renderTemplate(template.questionFormat, fields);
    rawAnswer = renderTemplate(template.answerFormat, { ...fields, FrontSide: rawQuestion });
  } else {
    rawQuestion = values[0] ?? '';
    rawAnswer = values[1] ?? '';
  }

  const rawExtraFields = values.slice(2);
  const cardType = classifyCard({ question: rawQuestion, answer: rawAnswer, extraFields: rawExtraFields });

  let question = rawQuestion;
  let answer = rawAnswer;
  let questionRevealed: string | null = null;

  if (hasClozeMarker(rawQuestion)) {
    // Cloze note types keep the cloze number in `ord`; other types map one template to one number
    const activeIndex = model?.type === MODEL_TYPE_CLOZE ? row.ordinal + 1 : templateOrdinal + 1;
    question = renderCloze(rawQuestion, { reveal: false, activeIndex });
    questionRevealed = renderCloze(rawQuestion, { reveal: true, activeIndex });
    const extra = leftoverAnswer(rawQuestion, rawAnswer);
    answer = hasVisibleContent(extra)
      ? `${questionRevealed}<div class="cloze-extra-answer">${renderCloze(extra, { reveal: true, activeIndex })}</div>`
      : questionRevealed;
  }

  const rewrite = (html: string): string => rewriteMediaReferences(html, context.aliases, context.mediaUrlPath);

  return Object.freeze({
    cardId: row.cardId,
    noteId: row.noteId,
    deckId: row.deckId,
    deckName: context.deckNames.get(row.deckId) ?? String(row.deckId),
    templateOrdinal,
    question: rewrite(question),
    answer: rewrite(answer),
    cardType,
    questionRevealed: questionRevealed === null ? null : rewrite(questionRevealed),
    extraFields: Object.freeze(rawExtraFields.map(rewrite)),
    rawQuestion: cardType === 'cloze' ? rawQuestion : null,
    clozeDeletions: freezeDeletions(cardType === 'cloze' ? extractClozeDeletions(rawQuestion) : []),
  });
}

/** Group cards by deck; each deck sorted by template ordinal, then card id. */
export function assembleDecks(cards: readonly Card[], deckNames: ReadonlyMap<number, string>): Map<number, Deck> {
  const grouped = new Map<number, Card[]>();
  for (const card of cards) {
    const bucket = grouped.get(card.deckId);
    if (bucket) {
      bucket.push(card);
    } else {
      grouped.set(card.deckId, [card]);
    }
  }

  const decks = new Map<number, Deck>();
  for (const [deckId, deckCards] of grouped) {
    deckCards.sort((a, b) => a.templateOrdinal - b.templateOrdinal || a.cardId - b.cardId);
    decks.set(
      deckId,
      Object.freeze({
        deckId,
        name: deckNames.get(deckId) ?? String(deckId),
        cards: Object.freeze(deckCards),
      })
    );
  }
  return decks;
}

// ── Ingestion ─────────────────────────────────────────────────────────────────

const FAILURE_REASON: Partial<Record<IngestionState, DeckLoadErrorReason>> = {
  extracting: 'UnpackFailed',
};

export class DeckLoaderService {
  /**
   * Turn an .apkg package into a DeckCollection. Media files are copied into
   * `mediaDir`; everything else the package unpacks to is deleted before
   * this returns, whether it succeeds or not.
   */
  async loadCollection(packagePath: string, options: LoadCollectionOptions = {}): Promise<DeckCollection> {
    let state: IngestionState = 'idle';
    const transition = (next: IngestionState): void => {
      state = next;
      log.debug('Ingestion state', { packagePath, state });
    };

    await this.assertPackageExists(packagePath);

    const mediaUrlPath = normalizeMediaUrlPath(options.mediaUrlPath);
    const workspace = await mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX.WORKSPACE));
    let collectionCopy: string | null = null;

    try {
      transition('extracting');
      await this.unpack(packagePath, workspace);

      transition('parsing-metadata');
      const collectionFile = findCollectionFile(workspace);
      if (!collectionFile) {
        throw new DeckLoadError('CollectionFileMissing', 'collection.anki21 not found in package');
      }
      collectionCopy = path.join(os.tmpdir(), `${TEMP_PREFIX.COLLECTION_COPY}${uuidv4()}`);
      const db = await this.openCollection(collectionFile, collectionCopy);

      try {
        const metadata = this.readMetadata(db);

        transition('reading-notes');
        const rows = this.readRows(db);

        const mediaDir = options.mediaDir ?? (await mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX.MEDIA)));
        await mkdir(mediaDir, { recursive: true });
        const aliases = await this.copyMedia(workspace, mediaDir);

        transition('rendering-cards');
        const context: RenderContext = { ...metadata, aliases, mediaUrlPath };
        const cards = rows.map((row) => buildCard(row, context));

        transition('assembling-decks');
        const decks = assembleDecks(cards, metadata.deckNames);

        transition('ready');
        log.info('Collection loaded', {
          package: path.basename(packagePath),
          decks: decks.size,
          cards: cards.length,
          media: new Set(aliases.values()).size,
        });
        return new DeckCollection(decks, aliases, mediaUrlPath, mediaDir);
      } finally {
        db.close();
      }
    } catch (error) {
      const failedIn = state;
      transition('failed');
      if (error instanceof DeckLoadError) throw error;
      throw new DeckLoadError(
        FAILURE_REASON[failedIn] ?? 'DatabaseUnreadable',
        `Failed to load package: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      await this.cleanup([workspace, collectionCopy]);
    }
  }

  private async assertPackageExists(packagePath: string): Promise<void> {
    try {
      const info = await stat(packagePath);
      if (info.isFile()) return;
    } catch (error) {
      log.debug('Package stat failed', { packagePath, error: serializeError(error) });
    }
    throw new DeckLoadError('PackageNotFound', `Package not found: ${packagePath}`);
  }

  private async unpack(packagePath: string, workspace: string): Promise<void> {
    try {
      const archive = await readFile(packagePath);
      await extractArchive(new Uint8Array(archive), workspace);
    } catch (error) {
      throw new DeckLoadError(
        'UnpackFailed',
        `Failed to unpack package: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * The database is read from its own copy so the workspace can be removed
   * independently of the open handle.
   */
  private async openCollection(collectionFile: string, copyPath: string): Promise<Database> {
    try {
      await copyFile(collectionFile, copyPath);
      return await openDatabase(new Uint8Array(await readFile(copyPath)));
    } catch (error) {
      throw new DeckLoadError(
        'DatabaseUnreadable',
        `Failed to open SQLite database: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  private readMetadata(db: Database): CollectionMetadata {
    let row: ReturnType<typeof readCollectionRow>;
    try {
      row = readCollectionRow(db);
    } catch (error) {
      throw new DeckLoadError(
        'DatabaseUnreadable',
        `Failed to query SQLite database: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
    if (!row) {
      throw new DeckLoadError('MetadataUnreadable', 'The collection database is missing metadata');
    }

    let deckNames: Map<number, string>;
    try {
      deckNames = parseDeckNames(row.decks);
    } catch (error) {
      throw new DeckLoadError('MetadataUnreadable', 'Could not parse deck metadata', { cause: error });
    }

    let models: Map<number, NoteModel>;
    try {
      models = parseNoteModels(row.models);
    } catch (error) {
      throw new DeckLoadError('MetadataUnreadable', 'Could not parse model metadata', { cause: error });
    }

    return { deckNames, models };
  }

  private readRows(db: Database): CardNoteRow[] {
    try {
      return readCardNoteRows(db);
    } catch (error) {
      throw new DeckLoadError(
        'DatabaseUnreadable',
        `Failed to read cards: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }

  /**
   * Copy manifest entries whose blob exists into `mediaDir` and build the
   * alias map. Unreadable manifests and failed copies are skipped.
   */
  private async copyMedia(workspace: string, mediaDir: string): Promise<MediaAliasMap> {
    const aliases: MediaAliasMap = new Map();

    let manifest: Record<string, string>;
    try {
      manifest = await readMediaManifest(workspace);
    } catch (error) {
      log.warn('Media manifest unreadable, continuing without media', { error: serializeError(error) });
      return aliases;
    }

    for (const [key, filename] of Object.entries(manifest)) {
      if (key !== path.basename(key)) continue;
      const source = path.join(workspace, key);
      if (!existsSync(source)) continue;
      try {
        const storedName = await storeMediaFile(mediaDir, filename, source);
        registerMediaAliases(aliases, filename, storedName);
      } catch (error) {
        log.debug('Skipping media file', { key, filename, error: serializeError(error) });
      }
    }

    return aliases;
  }

  private async cleanup(targets: (string | null)[]): Promise<void> {
    for (const target of targets) {
      if (!target) continue;
      try {
        await rm(target, { recursive: true, force: true });
      } catch (error) {
        log.warn('Could not remove temporary ingestion files', { path: target, error: serializeError(error) });
      }
    }
  }
}

const defaultLoader = new DeckLoaderService();

export function loadCollection(packagePath: string, options?: LoadCollectionOptions): Promise<DeckCollection> {
  return defaultLoader.loadCollection(packagePath, options);
}
