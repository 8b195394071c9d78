/**
 * Renderer for the subset of Mustache used by Anki card templates:
 * `{{Field}}`, `{{#Field}}…{{/Field}}`, `{{^Field}}…{{/Field}}` and
 * `{{!comment}}`. Field modifiers such as `cloze:` or `type:` are not
 * applied; a key resolves through its last colon-separated segment.
 *
 * Rendering happens in three passes: tokenize into a flat stream, pair
 * section tags with a stack, evaluate the stream. Malformed input never
 * throws.
 */

export type TemplateFieldValue = string | number | boolean | readonly unknown[] | null | undefined;
export type TemplateFields = Readonly<Record<string, TemplateFieldValue>>;

export type TemplateToken =
  | { kind: 'text'; value: string }
  | { kind: 'variable'; key: string }
  | { kind: 'section'; key: string; inverted: boolean }
  | { kind: 'close'; key: string }
  | { kind: 'comment' };

const OPEN = '{{';
const CLOSE = '}}';

/**
 * `cloze:Text` → `Text`, `  Front :: extra ` → `extra`.
 */
export function normalizeTemplateKey(key: string): string {
  const segments = key.trim().split(':');
  return (segments[segments.length - 1] ?? '').trim();
}

export function tokenizeTemplate(template: string): TemplateToken[] {
  const tokens: TemplateToken[] = [];
  let cursor = 0;

  while (cursor < template.length) {
    const start = template.indexOf(OPEN, cursor);
    if (start === -1) {
      tokens.push({ kind: 'text', value: template.slice(cursor) });
      break;
    }
    const end = template.indexOf(CLOSE, start + OPEN.length);
    if (end === -1) {
      // Unterminated tag: the remainder is plain text
      tokens.push({ kind: 'text', value: template.slice(cursor) });
      break;
    }
    if (start > cursor) {
      tokens.push({ kind: 'text', value: template.slice(cursor, start) });
    }
    tokens.push(parseTag(template.slice(start + OPEN.length, end)));
    cursor = end + CLOSE.length;
  }

  return tokens;
}

function parseTag(body: string): TemplateToken {
  const tag = body.trim();
  const sigil = tag.charAt(0);
  const key = tag.slice(1).trim();
  switch (sigil) {
    case '!':
      return { kind: 'comment' };
    case '#':
      return { kind: 'section', key, inverted: false };
    case '^':
      return { kind: 'section', key, inverted: true };
    case '/':
      return { kind: 'close', key };
    default:
      return { kind: 'variable', key: tag };
  }
}

/**
 * Map of section-open token index → matching close token index. Sections
 * whose close tag never appears, and close tags with no open section, are
 * left out.
 */
export function pairSections(tokens: readonly TemplateToken[]): Map<number, number> {
  const pairs = new Map<number, number>();
  const open: { index: number; name: string }[] = [];

  tokens.forEach((token, index) => {
    if (token.kind === 'section') {
      open.push({ index, name: normalizeTemplateKey(token.key) });
      return;
    }
    if (token.kind !== 'close') return;

    const name = normalizeTemplateKey(token.key);
    for (let depth = open.length - 1; depth >= 0; depth--) {
      if (open[depth].name === name) {
        pairs.set(open[depth].index, index);
        // Sections opened inside this one and never closed stay unpaired
        open.length = depth;
        return;
      }
    }
  });

  return pairs;
}

function resolveField(fields: TemplateFields, key: string): TemplateFieldValue {
  if (Object.prototype.hasOwnProperty.call(fields, key)) {
    return fields[key];
  }
  const normalized = normalizeTemplateKey(key);
  return Object.prototype.hasOwnProperty.call(fields, normalized) ? fields[normalized] : undefined;
}

export function isTruthyValue(value: TemplateFieldValue): boolean {
  if (typeof value === 'string') return value.trim().length > 0;
  if (Array.isArray(value)) return value.length > 0;
  return Boolean(value);
}

function stringifyValue(value: TemplateFieldValue): string {
  if (value === null || value === undefined) return '';
  if (Array.isArray(value)) return value.map((item) => String(item)).join('');
  return String(value);
}

function evaluate(
  tokens: readonly TemplateToken[],
  pairs: ReadonlyMap<number, number>,
  fields: TemplateFields,
  from: number,
  to: number
): string {
  let out = '';
  for (let i = from; i < to; i++) {
    const token = tokens[i];
    switch (token.kind) {
      case 'text':
        out += token.value;
        break;
      case 'variable':
        out += stringifyValue(resolveField(fields, token.key));
        break;
      case 'section': {
        const closeIndex = pairs.get(i);
        // Unclosed section: drop the tag, keep rendering what follows
        if (closeIndex === undefined) break;
        const truthy = isTruthyValue(resolveField(fields, token.key));
        if (truthy !== token.inverted) {
          out += evaluate(tokens, pairs, fields, i + 1, closeIndex);
        }
        i = closeIndex;
        break;
      }
      case 'close':
      case 'comment':
        break;
    }
  }
  return out;
}

export function renderTemplate(template: string, fields: TemplateFields): string {
  if (!template) return '';
  const tokens = tokenizeTemplate(template);
  return evaluate(tokens, pairSections(tokens), fields, 0, tokens.length);
}
