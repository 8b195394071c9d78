/**
 * Media handling for package ingestion: stored filenames, the alias map
 * from original names to stored names, and `<img src>` rewriting.
 */

import path from 'path';
import { copyFile, readdir, rm } from 'fs/promises';
import { existsSync } from 'fs';
import { MEDIA_DEFAULTS } from '../constants/anki.constants';

export type MediaAliasMap = Map<string, string>;

/** The tag's own `src` attribute; `data-src` and similar are not matched */
const QUOTED_IMG_SRC = /(<img\b[^>]*?\ssrc\s*=\s*)(['"])(.*?)\2/gi;
const UNQUOTED_IMG_SRC = /(<img\b[^>]*?\ssrc\s*=\s*)([^'"\s>]+)/gi;
/** `http:`, `data:`, `blob:` … and protocol-relative `//host` */
const EXTERNAL_SRC = /^(?:[a-z][a-z0-9+.-]*:|\/\/)/i;

/** Last path segment, whichever separator the reference uses. */
export function extractFilename(reference: string): string {
  const segments = reference.split(/[\\/]/);
  return segments[segments.length - 1] ?? '';
}

export function splitExtension(filename: string): { stem: string; extension: string } {
  const dot = filename.lastIndexOf('.');
  if (dot <= 0) return { stem: filename, extension: '' };
  return { stem: filename.slice(0, dot), extension: filename.slice(dot) };
}

/**
 * Basename of `filename` with everything outside `[A-Za-z0-9._-]` replaced
 * by `_`. Names that would be empty or point at a directory become the
 * placeholder name.
 */
export function sanitizeMediaFilename(filename: string): string {
  const base = extractFilename(filename.trim());
  const cleaned = base.replace(/[^A-Za-z0-9._-]/g, '_');
  if (!cleaned || cleaned === '.' || cleaned === '..') {
    return MEDIA_DEFAULTS.PLACEHOLDER_NAME;
  }
  return cleaned;
}

/**
 * `name` if it is free in `directory`, else `stem_1.ext`, `stem_2.ext`, …
 */
export function dedupeFilename(directory: string, name: string): string {
  if (!existsSync(path.join(directory, name))) return name;
  const { stem, extension } = splitExtension(name);
  let counter = 1;
  let candidate = `${stem}_${counter}${extension}`;
  while (existsSync(path.join(directory, candidate))) {
    counter += 1;
    candidate = `${stem}_${counter}${extension}`;
  }
  return candidate;
}

/**
 * Copy `source` into `mediaDir` under a sanitized, collision-free name and
 * return that name.
 */
export async function storeMediaFile(mediaDir: string, originalName: string, source: string): Promise<string> {
  const storedName = dedupeFilename(mediaDir, sanitizeMediaFilename(originalName));
  await copyFile(source, path.join(mediaDir, storedName));
  return storedName;
}

/**
 * Register `storedName` under the original name, its lowercase form, its
 * stem and its lowercase stem. An alias already taken keeps its first owner.
 */
export function registerMediaAliases(aliases: MediaAliasMap, originalName: string, storedName: string): void {
  const { stem } = splitExtension(originalName);
  for (const alias of [originalName, originalName.toLowerCase(), stem, stem.toLowerCase()]) {
    if (alias && !aliases.has(alias)) {
      aliases.set(alias, storedName);
    }
  }
}

/**
 * Exact name, then case-insensitive name, then extension-stripped stem.
 */
export function lookupMediaAlias(aliases: ReadonlyMap<string, string>, reference: string): string | undefined {
  if (!reference) return undefined;
  const { stem } = splitExtension(reference);
  return (
    aliases.get(reference) ??
    aliases.get(reference.toLowerCase()) ??
    aliases.get(stem) ??
    aliases.get(stem.toLowerCase())
  );
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/**
 * `/media/` + `/x.png` style joins without doubled or missing slashes.
 */
export function buildMediaUrl(storedName: string, mediaUrlPath: string): string {
  const prefix = mediaUrlPath.replace(/\/+$/, '');
  return `${prefix}/${storedName.replace(/^\/+/, '')}`;
}

/**
 * Canonical media prefix: leading slash, no trailing slash, `/media` when
 * empty.
 */
export function normalizeMediaUrlPath(value: string | null | undefined): string {
  const cleaned = (value ?? '').trim().replace(/\/+$/, '');
  if (!cleaned) return MEDIA_DEFAULTS.URL_PATH;
  return cleaned.startsWith('/') ? cleaned : `/${cleaned}`;
}

function resolveSource(src: string, aliases: ReadonlyMap<string, string>, mediaUrlPath: string): string | undefined {
  if (EXTERNAL_SRC.test(src) || src.startsWith(`${mediaUrlPath}/`)) return undefined;
  const storedName = lookupMediaAlias(aliases, extractFilename(safeDecode(src)));
  return storedName === undefined ? undefined : buildMediaUrl(storedName, mediaUrlPath);
}

/**
 * Point `<img src>` references (quoted or not) at the served media URL.
 * References the alias map cannot resolve are left as they are.
 */
export function rewriteMediaReferences(
  html: string,
  aliases: ReadonlyMap<string, string>,
  mediaUrlPath: string
): string {
  if (!html || aliases.size === 0) return html;

  const quoted = html.replace(QUOTED_IMG_SRC, (match, prefix: string, quote: string, src: string) => {
    const url = resolveSource(src, aliases, mediaUrlPath);
    return url === undefined ? match : `${prefix}${quote}${url}${quote}`;
  });

  return quoted.replace(UNQUOTED_IMG_SRC, (match, prefix: string, src: string) => {
    const url = resolveSource(src, aliases, mediaUrlPath);
    return url === undefined ? match : `${prefix}${url}`;
  });
}

/** Empty `mediaDir` before a fresh load; entries that cannot be removed are skipped. */
export async function prepareMediaDirectory(mediaDir: string): Promise<string[]> {
  const failures: string[] = [];
  let entries: string[];
  try {
    entries = await readdir(mediaDir);
  } catch {
    return failures;
  }
  for (const entry of entries) {
    try {
      await rm(path.join(mediaDir, entry), { recursive: true, force: true });
    } catch {
      failures.push(entry);
    }
  }
  return failures;
}
