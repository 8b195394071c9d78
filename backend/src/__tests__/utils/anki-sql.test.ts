import { describe, expect, it } from 'vitest';
import {
  openDatabase,
  parseDeckNames,
  parseNoteModels,
  readCardNoteRows,
  readCollectionRow,
} from '@/utils/anki-sql.utils';
import { BASIC_MODEL, buildCollectionDatabase } from './apkg-fixtures';

describe('parseDeckNames', () => {
  it('maps deck ids to names, falling back to the id', () => {
    const names = parseDeckNames('{"1":{"name":"Default"},"2":{}}');
    expect([...names]).toEqual([
      [1, 'Default'],
      [2, '2'],
    ]);
  });

  it('accepts the JSON as bytes', () => {
    const names = parseDeckNames(new TextEncoder().encode('{"5":{"name":"Bytes"}}'));
    expect(names.get(5)).toBe('Bytes');
  });

  it('throws on malformed JSON', () => {
    expect(() => parseDeckNames('{bad')).toThrow();
  });

  it('throws on a wrong shape', () => {
    expect(() => parseDeckNames('{"1":"Default"}')).toThrow();
  });
});

describe('parseNoteModels', () => {
  it('yields nothing for empty or absent values', () => {
    expect(parseNoteModels('').size).toBe(0);
    expect(parseNoteModels(undefined).size).toBe(0);
    expect(parseNoteModels(null).size).toBe(0);
  });

  it('orders fields and templates by ordinal', () => {
    const models = parseNoteModels(
      JSON.stringify({
        '7': {
          name: 'Reversed',
          type: 0,
          flds: [
            { name: 'Back', ord: 1 },
            { name: 'Front', ord: 0 },
          ],
          tmpls: [
            { name: 'Card 2', ord: 1, qfmt: '{{Back}}', afmt: '{{Front}}' },
            { name: 'Card 1', ord: 0, qfmt: '{{Front}}', afmt: '{{Back}}' },
          ],
        },
      })
    );
    const model = models.get(7);
    expect(model?.fieldNames).toEqual(['Front', 'Back']);
    expect(model?.templates.map((template) => template.name)).toEqual(['Card 1', 'Card 2']);
    expect(model?.templates[0]).toEqual({
      name: 'Card 1',
      ordinal: 0,
      questionFormat: '{{Front}}',
      answerFormat: '{{Back}}',
    });
  });

  it('defaults missing ordinals to list position', () => {
    const models = parseNoteModels('{"3":{"type":1,"flds":[{"name":"Text"},{"name":"Extra"}],"tmpls":[{"qfmt":"{{cloze:Text}}"}]}}');
    expect(models.get(3)).toEqual({
      id: 3,
      name: '',
      type: 1,
      fieldNames: ['Text', 'Extra'],
      templates: [{ name: '', ordinal: 0, questionFormat: '{{cloze:Text}}', answerFormat: '' }],
    });
  });

  it('throws on malformed JSON', () => {
    expect(() => parseNoteModels('[not json')).toThrow();
  });
});

describe('collection database reads', () => {
  it('reads the col row', async () => {
    const db = await openDatabase(
      await buildCollectionDatabase({ decks: { 1: 'Default' }, models: [BASIC_MODEL], notes: [], cards: [] })
    );
    try {
      const row = readCollectionRow(db);
      expect(row).not.toBeNull();
      expect(parseDeckNames(row?.decks ?? null).get(1)).toBe('Default');
      expect(parseNoteModels(row?.models).get(100)?.name).toBe('Basic');
    } finally {
      db.close();
    }
  });

  it('returns null for an empty col table', async () => {
    const db = await openDatabase(await buildCollectionDatabase({ notes: [], cards: [], emptyCol: true }));
    try {
      expect(readCollectionRow(db)).toBeNull();
    } finally {
      db.close();
    }
  });

  it('joins cards with notes ordered by deck, due and id', async () => {
    const db = await openDatabase(
      await buildCollectionDatabase({
        models: [BASIC_MODEL],
        notes: [
          { id: 10, modelId: 100, fields: ['Q1', 'A1'] },
          { id: 11, modelId: null, fields: ['Q2'] },
        ],
        cards: [
          { id: 3, noteId: 10, deckId: 2, due: 0 },
          { id: 2, noteId: 11, deckId: 1, due: 5, ord: 1 },
          { id: 1, noteId: 10, deckId: 1, due: 5 },
        ],
      })
    );
    try {
      expect(readCardNoteRows(db)).toEqual([
        { cardId: 1, noteId: 10, deckId: 1, ordinal: 0, modelId: 100, fields: 'Q1\x1fA1' },
        { cardId: 2, noteId: 11, deckId: 1, ordinal: 1, modelId: null, fields: 'Q2' },
        { cardId: 3, noteId: 10, deckId: 2, ordinal: 0, modelId: 100, fields: 'Q1\x1fA1' },
      ]);
    } finally {
      db.close();
    }
  });
});
