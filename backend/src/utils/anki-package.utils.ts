/**
 * @summary Unpacking of .apkg archives (fflate) into a scratch workspace.
 *
 * An .apkg is a ZIP archive containing:
 *   - `collection.anki21` or `collection.anki2`: the SQLite database
 *   - `media`: JSON object mapping numeric keys to filenames
 *   - `0`, `1`, `2`, …: the media files, named by key
 */

import path from 'path';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { unzipSync } from 'fflate';
import { z } from 'zod';
import { COLLECTION_FILENAMES, MEDIA_MANIFEST_FILENAME } from '../constants/anki.constants';

/** Archive key → original filename */
export type MediaManifest = Record<string, string>;

const MediaManifestSchema = z.record(z.string(), z.unknown());

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative !== '' && !relative.startsWith('..') && !path.isAbsolute(relative);
}

/**
 * Write every archive entry below `workspace`. Entries whose path would land
 * outside the workspace are skipped. Returns the names written.
 */
export async function extractArchive(archive: Uint8Array, workspace: string): Promise<string[]> {
  const entries = unzipSync(archive);
  const written: string[] = [];

  for (const [name, data] of Object.entries(entries)) {
    if (name.endsWith('/')) continue;
    const target = path.resolve(workspace, name);
    if (!isInside(workspace, target)) continue;
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, data);
    written.push(name);
  }

  return written;
}

/** First known collection database present in `workspace`, or null. */
export function findCollectionFile(workspace: string): string | null {
  for (const candidate of COLLECTION_FILENAMES) {
    const candidatePath = path.join(workspace, candidate);
    if (existsSync(candidatePath)) return candidatePath;
  }
  return null;
}

/**
 * Parse the `media` manifest of an extracted package. Absent manifest → `{}`.
 * Entries with an empty filename are dropped; a manifest that is not a JSON
 * object throws.
 */
export async function readMediaManifest(workspace: string): Promise<MediaManifest> {
  const manifestPath = path.join(workspace, MEDIA_MANIFEST_FILENAME);
  if (!existsSync(manifestPath)) return {};

  const raw = MediaManifestSchema.parse(JSON.parse(await readFile(manifestPath, 'utf-8')));
  const manifest: MediaManifest = {};
  for (const [key, filename] of Object.entries(raw)) {
    if (typeof filename === 'string' && filename) {
      manifest[key] = filename;
    }
  }
  return manifest;
}
