/**
 * Read access to Anki collection databases through sql.js.
 *
 * sql.js is initialised once per process; its WASM binary ships inside the
 * npm package.
 */

import initSqlJs from 'sql.js';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { z } from 'zod';
import type { CardNoteRow, NoteModel } from '../types/deck';

export type { Database };

let sqlJsPromise: Promise<SqlJsStatic> | null = null;

export function getSqlJs(): Promise<SqlJsStatic> {
  if (!sqlJsPromise) {
    sqlJsPromise = initSqlJs().catch((error: unknown) => {
      // Let the next call retry instead of caching the rejection
      sqlJsPromise = null;
      throw error;
    });
  }
  return sqlJsPromise;
}

export async function openDatabase(bytes: Uint8Array): Promise<Database> {
  const SQL = await getSqlJs();
  return new SQL.Database(bytes);
}

type Row = Record<string, SqlValue>;

export function queryRows(db: Database, sql: string): Row[] {
  const [result] = db.exec(sql);
  if (!result) return [];
  return result.values.map((values) => {
    const row: Row = {};
    result.columns.forEach((column, index) => {
      row[column] = values[index] ?? null;
    });
    return row;
  });
}

// ── col metadata ──────────────────────────────────────────────────────────────

const DeckTableSchema = z.record(
  z.string(),
  z.object({ name: z.string().optional() })
);

const ModelTableSchema = z.record(
  z.string(),
  z.object({
    name: z.string().default(''),
    type: z.number().default(0),
    flds: z.array(z.object({ name: z.string(), ord: z.number().optional() })).default([]),
    tmpls: z
      .array(
        z.object({
          name: z.string().default(''),
          ord: z.number().optional(),
          qfmt: z.string().default(''),
          afmt: z.string().default(''),
        })
      )
      .default([]),
  })
);

export interface CollectionMetadataRow {
  decks: SqlValue;
  /** `undefined` when the `col` table has no `models` column */
  models: SqlValue | undefined;
}

/** The singleton `col` row, or `null` when the table is empty. */
export function readCollectionRow(db: Database): CollectionMetadataRow | null {
  const [row] = queryRows(db, 'SELECT * FROM col LIMIT 1');
  if (!row) return null;
  return {
    decks: row.decks ?? null,
    models: Object.prototype.hasOwnProperty.call(row, 'models') ? row.models : undefined,
  };
}

function asText(value: SqlValue | undefined): string {
  if (typeof value === 'string') return value;
  if (value instanceof Uint8Array) return new TextDecoder().decode(value);
  return '';
}

/**
 * Deck id → display name. Throws on malformed JSON or shape.
 */
export function parseDeckNames(decksJson: SqlValue): Map<number, string> {
  const decks = DeckTableSchema.parse(JSON.parse(asText(decksJson)));
  const names = new Map<number, string>();
  for (const [id, deck] of Object.entries(decks)) {
    names.set(Number(id), deck.name ?? id);
  }
  return names;
}

/**
 * Model id → note model with fields and templates in ordinal order. An empty
 * or absent models value yields no models; malformed JSON throws.
 */
export function parseNoteModels(modelsJson: SqlValue | undefined): Map<number, NoteModel> {
  const models = new Map<number, NoteModel>();
  const text = asText(modelsJson).trim();
  if (!text) return models;

  const parsed = ModelTableSchema.parse(JSON.parse(text));
  for (const [id, model] of Object.entries(parsed)) {
    const fields = model.flds
      .map((field, index) => ({ name: field.name, ord: field.ord ?? index }))
      .sort((a, b) => a.ord - b.ord);
    const templates = model.tmpls
      .map((template, index) => ({
        name: template.name,
        ordinal: template.ord ?? index,
        questionFormat: template.qfmt,
        answerFormat: template.afmt,
      }))
      .sort((a, b) => a.ordinal - b.ordinal);

    models.set(Number(id), {
      id: Number(id),
      name: model.name,
      type: model.type,
      fieldNames: fields.map((field) => field.name),
      templates,
    });
  }
  return models;
}

// ── cards ⋈ notes ─────────────────────────────────────────────────────────────

/** Ordered so that re-reading the same package gives the same sequence. */
export const CARD_NOTE_QUERY = `
  SELECT
    cards.id AS card_id,
    cards.nid AS note_id,
    cards.did AS deck_id,
    cards.ord AS template_ordinal,
    notes.mid AS model_id,
    notes.flds AS note_fields
  FROM cards
  JOIN notes ON notes.id = cards.nid
  ORDER BY cards.did, cards.due, cards.id
`;

function asNumber(value: SqlValue | undefined): number {
  return typeof value === 'number' ? value : Number(asText(value));
}

export function readCardNoteRows(db: Database): CardNoteRow[] {
  return queryRows(db, CARD_NOTE_QUERY).map((row) => ({
    cardId: asNumber(row.card_id),
    noteId: asNumber(row.note_id),
    deckId: asNumber(row.deck_id),
    ordinal: asNumber(row.template_ordinal),
    modelId: row.model_id === null || row.model_id === undefined ? null : asNumber(row.model_id),
    fields: asText(row.note_fields),
  }));
}
