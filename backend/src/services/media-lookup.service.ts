import path from 'path';
import { readdir, stat } from 'fs/promises';
import { MEDIA_DEFAULTS } from '../constants/anki.constants';
import type { DeckCollection } from '../models/deck-collection';
import { logger, serializeError } from '../utils/logger';

const log = logger.child('media-lookup');

/**
 * How a served name was found:
 * - `exact`: identical name on disk
 * - `map-exact` / `map-ci`: package alias map, case-sensitive / -insensitive
 * - `fs-ci`: single case-insensitive match on disk
 */
export type MediaLookupReason = 'exact' | 'map-exact' | 'map-ci' | 'fs-ci';

export interface MediaLookupResult {
  storedName: string;
  reason: MediaLookupReason;
}

export interface MediaLookupStats {
  count: number;
  totalTimeMs: number;
  avgLookupTimeMs: number | null;
}

export interface MediaLookupOptions {
  ttlMs?: number;
  /** Clock for cache expiry, in milliseconds */
  now?: () => number;
}

interface NamesEntry {
  readAt: number;
  names: string[];
  mtimeMs: number | null;
}

interface LookupEntry {
  storedAt: number;
  result: MediaLookupResult | null;
  mtimeMs: number | null;
}

function sameDirectoryVersion(stored: number | null, current: number | null): boolean {
  return stored === null || current === null || stored === current;
}

export class MediaLookupService {
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly namesCache = new Map<string, NamesEntry>();
  private readonly lookupCache = new Map<string, LookupEntry>();
  private count = 0;
  private totalTimeMs = 0;

  constructor(options: MediaLookupOptions = {}) {
    this.ttlMs = options.ttlMs ?? MEDIA_DEFAULTS.LOOKUP_TTL_SECONDS * 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Resolve a requested media filename to a file in `mediaDir`. Ambiguous
   * matches resolve to null; nothing is guessed.
   */
  async findMediaForFilename(
    mediaDir: string,
    filename: string,
    collection: DeckCollection | null
  ): Promise<MediaLookupResult | null> {
    if (!filename || /[\\/]/.test(filename)) return null;

    const directory = path.resolve(mediaDir);
    const cacheKey = `${directory}\u0000${filename}`;
    const mtimeMs = await this.directoryMtime(directory);

    const cached = this.lookupCache.get(cacheKey);
    if (cached && this.now() - cached.storedAt < this.ttlMs && sameDirectoryVersion(cached.mtimeMs, mtimeMs)) {
      return cached.result;
    }

    const remember = (result: MediaLookupResult | null): MediaLookupResult | null => {
      this.lookupCache.set(cacheKey, { storedAt: this.now(), result, mtimeMs });
      return result;
    };

    const aliases = collection?.mediaFilenames;
    if (aliases && aliases.size > 0) {
      const exact = aliases.get(filename);
      if (exact !== undefined) return remember({ storedName: exact, reason: 'map-exact' });

      const lower = filename.toLowerCase();
      const candidates = new Set<string>();
      for (const [alias, storedName] of aliases) {
        if (alias.toLowerCase() === lower) candidates.add(storedName);
      }
      if (candidates.size > 1) return remember(null);
      const [single] = candidates;
      if (single !== undefined) return remember({ storedName: single, reason: 'map-ci' });
    }

    const matches = await this.listCaseInsensitiveMatches(directory, filename, mtimeMs);
    if (matches.length > 1) {
      log.debug('Ambiguous media match', { filename, matches });
      return remember(null);
    }
    const [match] = matches;
    if (match === undefined) return null;
    return remember({ storedName: match, reason: match === filename ? 'exact' : 'fs-ci' });
  }

  /** `findMediaForFilename` with the elapsed time recorded in the stats. */
  async resolve(
    mediaDir: string,
    filename: string,
    collection: DeckCollection | null
  ): Promise<{ result: MediaLookupResult | null; elapsedMs: number }> {
    const start = performance.now();
    const result = await this.findMediaForFilename(mediaDir, filename, collection);
    const elapsedMs = performance.now() - start;
    this.count += 1;
    this.totalTimeMs += elapsedMs;
    return { result, elapsedMs };
  }

  /** Files in `mediaDir` whose name equals `filename` ignoring case. */
  async listCaseInsensitiveMatches(mediaDir: string, filename: string, mtimeMs?: number | null): Promise<string[]> {
    const directory = path.resolve(mediaDir);
    const names = await this.mediaNames(directory, mtimeMs === undefined ? await this.directoryMtime(directory) : mtimeMs);
    const lower = filename.toLowerCase();
    return names.filter((name) => name.toLowerCase() === lower);
  }

  getStats(): MediaLookupStats {
    return {
      count: this.count,
      totalTimeMs: Math.trunc(this.totalTimeMs),
      avgLookupTimeMs: this.count > 0 ? Math.trunc(this.totalTimeMs / this.count) : null,
    };
  }

  clear(): void {
    this.namesCache.clear();
    this.lookupCache.clear();
  }

  private async mediaNames(directory: string, mtimeMs: number | null): Promise<string[]> {
    const cached = this.namesCache.get(directory);
    if (cached && this.now() - cached.readAt < this.ttlMs && sameDirectoryVersion(cached.mtimeMs, mtimeMs)) {
      return cached.names;
    }

    let names: string[] = [];
    try {
      const entries = await readdir(directory, { withFileTypes: true });
      names = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch (error) {
      log.debug('Media directory unreadable', { directory, error: serializeError(error) });
    }
    this.namesCache.set(directory, { readAt: this.now(), names, mtimeMs });
    return names;
  }

  private async directoryMtime(directory: string): Promise<number | null> {
    try {
      return (await stat(directory)).mtimeMs;
    } catch {
      return null;
    }
  }
}
