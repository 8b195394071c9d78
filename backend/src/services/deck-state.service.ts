import os from 'os';
import path from 'path';
import type { Dirent } from 'fs';
import { mkdir, mkdtemp, readdir } from 'fs/promises';
import {
  DECK_FILTER_SHORTCUTS,
  DECK_NAME_SEPARATOR,
  MEDIA_DEFAULTS,
  TEMP_PREFIX,
} from '../constants/anki.constants';
import type { DeckCollection } from '../models/deck-collection';
import type { Card, LoadCollectionOptions } from '../types/deck';
import { DeckLoadError, NotFoundError, ServiceUnavailableError } from '../utils/errors';
import { logger, serializeError } from '../utils/logger';
import { normalizeMediaUrlPath, prepareMediaDirectory } from '../utils/media.utils';
import { DeckLoaderService } from './deck-loader.service';

const log = logger.child('deck-state');

export interface CollectionLoader {
  loadCollection(packagePath: string, options?: LoadCollectionOptions): Promise<DeckCollection>;
}

export interface DeckStateOptions {
  dataDir: string | null;
  mediaDirectory: string;
  mediaUrlPath?: string;
  loader?: CollectionLoader;
}

export interface LoadDeckResult {
  collection: DeckCollection;
  fromCache: boolean;
}

export interface DeckFilter {
  label: string;
  value: string;
  shortcut: string | null;
}

/** `<dataDir>/media`, or a fresh temp directory without a data dir. */
export async function resolveMediaDirectory(dataDir: string | null): Promise<string> {
  if (dataDir) {
    const mediaDir = path.resolve(dataDir, MEDIA_DEFAULTS.DIRECTORY_NAME);
    await mkdir(mediaDir, { recursive: true });
    return mediaDir;
  }
  return mkdtemp(path.join(os.tmpdir(), TEMP_PREFIX.MEDIA));
}

/** `.apkg` files directly inside `dataDir`, sorted by path. */
export async function discoverPackages(dataDir: string | null): Promise<string[]> {
  if (!dataDir) return [];
  let entries: Dirent[];
  try {
    entries = await readdir(dataDir, { withFileTypes: true });
  } catch (error) {
    log.warn('Data directory unreadable', { dataDir, error: serializeError(error) });
    return [];
  }
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.apkg'))
    .map((entry) => path.resolve(dataDir, entry.name))
    .sort();
}

export function selectStartingPackage(provided: string | null | undefined, packages: readonly string[]): string | null {
  if (provided) return path.resolve(provided);
  return packages[0] ?? null;
}

/** Top-level deck names (before `::`), case-insensitively sorted; the first nine get keyboard shortcuts. */
export function buildDeckFilters(collection: DeckCollection): DeckFilter[] {
  const roots = new Set<string>();
  for (const deck of collection.decks.values()) {
    roots.add(deck.name.split(DECK_NAME_SEPARATOR)[0] ?? deck.name);
  }
  return [...roots]
    .sort((a, b) => {
      const left = a.toLowerCase();
      const right = b.toLowerCase();
      return left < right ? -1 : left > right ? 1 : 0;
    })
    .map((root, index) => ({
      label: root,
      value: root,
      shortcut: DECK_FILTER_SHORTCUTS[index] ?? null,
    }));
}

/**
 * The serving layer's view of what is loaded: the current package and its
 * collection, the packages available for switching, and already loaded
 * collections keyed by resolved package path.
 */
export class DeckStateService {
  readonly dataDir: string | null;
  readonly mediaDirectory: string;
  readonly mediaUrlPath: string;

  private readonly loader: CollectionLoader;
  private readonly cache = new Map<string, DeckCollection>();
  private packages: string[] = [];
  private packagePath: string | null = null;
  private collection: DeckCollection | null = null;
  private pending: Promise<unknown> = Promise.resolve();

  constructor(options: DeckStateOptions) {
    this.dataDir = options.dataDir ? path.resolve(options.dataDir) : null;
    this.mediaDirectory = path.resolve(options.mediaDirectory);
    this.mediaUrlPath = normalizeMediaUrlPath(options.mediaUrlPath);
    this.loader = options.loader ?? new DeckLoaderService();
  }

  get currentCollection(): DeckCollection | null {
    return this.collection;
  }

  /** The current collection; 503 when nothing is loaded. */
  requireCollection(): DeckCollection {
    if (!this.collection) throw new ServiceUnavailableError('No deck package loaded');
    return this.collection;
  }

  get currentPackage(): string | null {
    return this.packagePath;
  }

  get availablePackages(): readonly string[] {
    return this.packages;
  }

  /** Discover packages and load the starting one. A failed load leaves no collection. */
  async initialize(preferredPackage?: string | null): Promise<DeckCollection | null> {
    this.packages = await discoverPackages(this.dataDir);
    const starting = selectStartingPackage(preferredPackage, this.packages);
    if (!starting) {
      log.warn('No deck package configured');
      return null;
    }
    return this.tryLoadDeck(starting);
  }

  async refreshPackages(): Promise<readonly string[]> {
    this.packages = await discoverPackages(this.dataDir);
    return this.packages;
  }

  /**
   * Make `packagePath` the current package. A fresh load with `cleanMedia`
   * empties the media directory first, which also invalidates every cached
   * collection.
   */
  loadDeck(packagePath: string, options: { cleanMedia?: boolean } = {}): Promise<LoadDeckResult> {
    return this.exclusive(() => this.loadDeckNow(path.resolve(packagePath), options.cleanMedia ?? true));
  }

  /** `loadDeck` that logs and returns null when the package cannot be loaded. */
  async tryLoadDeck(packagePath: string, options: { cleanMedia?: boolean } = {}): Promise<DeckCollection | null> {
    try {
      const { collection, fromCache } = await this.loadDeck(packagePath, options);
      log.info(fromCache ? 'Loaded deck from cache' : 'Loaded deck from file', {
        package: path.basename(packagePath),
      });
      return collection;
    } catch (error) {
      if (error instanceof DeckLoadError) {
        log.warn('Unable to load deck', {
          package: path.basename(packagePath),
          reason: error.reason,
          error: error.message,
        });
        return null;
      }
      throw error;
    }
  }

  /** Switch to a package in the data directory by file name. */
  async switchPackage(filename: string): Promise<LoadDeckResult> {
    await this.refreshPackages();
    const target = this.resolvePackageName(filename);
    if (!target) throw new NotFoundError('Package');
    return this.loadDeck(target);
  }

  /**
   * Cards whose ids appear in `favorites` (deck id → card ids), gathered from
   * every available package. The media directory is cleaned once, so the
   * media of all packages coexists afterwards.
   */
  collectFavoriteCards(favorites: ReadonlyMap<number, ReadonlySet<string>>): Promise<Card[]> {
    return this.exclusive(async () => {
      if (favorites.size === 0 || this.packages.length === 0) return [];

      const previous = this.packagePath;
      await this.cleanMediaDirectory();

      const cards: Card[] = [];
      for (const packagePath of this.packages) {
        let collection: DeckCollection;
        try {
          ({ collection } = await this.loadDeckNow(packagePath, false));
        } catch (error) {
          log.warn('Failed to load cards for favorites', {
            package: path.basename(packagePath),
            error: serializeError(error),
          });
          continue;
        }
        for (const [deckId, deck] of collection.decks) {
          const wanted = favorites.get(deckId);
          if (!wanted) continue;
          cards.push(...deck.cards.filter((card) => wanted.has(String(card.cardId))));
        }
      }

      if (previous) {
        try {
          await this.loadDeckNow(previous, false);
        } catch (error) {
          log.warn('Could not restore current deck', {
            package: path.basename(previous),
            error: serializeError(error),
          });
        }
      }
      return cards;
    });
  }

  private resolvePackageName(filename: string): string | null {
    if (!this.dataDir || !filename.endsWith('.apkg') || filename !== path.basename(filename)) {
      return null;
    }
    const target = path.resolve(this.dataDir, filename);
    return this.packages.includes(target) ? target : null;
  }

  private async loadDeckNow(packagePath: string, cleanMedia: boolean): Promise<LoadDeckResult> {
    const cached = this.cache.get(packagePath);
    if (cached) {
      this.packagePath = packagePath;
      this.collection = cached;
      return { collection: cached, fromCache: true };
    }

    try {
      if (cleanMedia) await this.cleanMediaDirectory();
      const collection = await this.loader.loadCollection(packagePath, {
        mediaDir: this.mediaDirectory,
        mediaUrlPath: this.mediaUrlPath,
      });
      this.cache.set(packagePath, collection);
      this.packagePath = packagePath;
      this.collection = collection;
      return { collection, fromCache: false };
    } catch (error) {
      this.packagePath = packagePath;
      this.collection = null;
      throw error;
    }
  }

  private async cleanMediaDirectory(): Promise<void> {
    const failures = await prepareMediaDirectory(this.mediaDirectory);
    if (failures.length > 0) {
      log.warn('Could not remove some media files', { failures });
    }
    this.cache.clear();
  }

  /** Run `task` after every previously queued task has settled. */
  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.pending.then(task, task);
    this.pending = run.catch(() => undefined);
    return run;
  }
}
