import path from 'path';
import { writeFile } from 'fs/promises';
import { afterEach, describe, expect, it } from 'vitest';
import { MediaLookupService } from '@/services/media-lookup.service';
import { DeckCollection } from '@/models/deck-collection';
import { cleanupTempDirs, makeTempDir } from '../utils/test-helpers';

function collectionWith(aliases: Record<string, string>, mediaDir: string): DeckCollection {
  return new DeckCollection(new Map(), new Map(Object.entries(aliases)), '/media', mediaDir);
}

describe('MediaLookupService', () => {
  afterEach(async () => {
    await cleanupTempDirs();
  });

  it('refuses to guess between files differing only by case', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'a.png'), 'lower');
    await writeFile(path.join(dir, 'A.png'), 'upper');

    const lookup = new MediaLookupService();
    expect(await lookup.findMediaForFilename(dir, 'a.png', null)).toBeNull();
  });

  it('prefers an exact alias map entry', async () => {
    const dir = await makeTempDir();
    const collection = collectionWith({ 'Photo.JPG': 'Photo.JPG', 'photo.jpg': 'Photo.JPG' }, dir);

    const lookup = new MediaLookupService();
    expect(await lookup.findMediaForFilename(dir, 'Photo.JPG', collection)).toEqual({
      storedName: 'Photo.JPG',
      reason: 'map-exact',
    });
  });

  it('matches alias map keys case-insensitively when they agree on one file', async () => {
    const dir = await makeTempDir();
    const collection = collectionWith({ 'Photo.JPG': 'Photo.JPG', 'photo.jpg': 'Photo.JPG' }, dir);

    const lookup = new MediaLookupService();
    expect(await lookup.findMediaForFilename(dir, 'PHOTO.JPG', collection)).toEqual({
      storedName: 'Photo.JPG',
      reason: 'map-ci',
    });
  });

  it('treats alias map keys pointing at different files as not found', async () => {
    const dir = await makeTempDir();
    const collection = collectionWith({ 'a.png': 'a.png', 'A.png': 'A_1.png' }, dir);

    const lookup = new MediaLookupService();
    expect(await lookup.findMediaForFilename(dir, 'A.PNG', collection)).toBeNull();
  });

  it('falls back to a single case-insensitive file on disk', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'Chart.png'), 'chart');

    const lookup = new MediaLookupService();
    expect(await lookup.findMediaForFilename(dir, 'chart.png', null)).toEqual({
      storedName: 'Chart.png',
      reason: 'fs-ci',
    });
    expect(await lookup.findMediaForFilename(dir, 'Chart.png', null)).toEqual({
      storedName: 'Chart.png',
      reason: 'exact',
    });
  });

  it('rejects names with path separators', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'x.png'), 'x');

    const lookup = new MediaLookupService();
    expect(await lookup.findMediaForFilename(dir, '../x.png', null)).toBeNull();
    expect(await lookup.findMediaForFilename(dir, 'sub\\x.png', null)).toBeNull();
  });

  it('serves cached results until the TTL expires', async () => {
    const dir = await makeTempDir();
    let now = 1_000;
    const lookup = new MediaLookupService({ ttlMs: 5_000, now: () => now });
    const collection = collectionWith({ 'x.png': 'x.png' }, dir);

    expect(await lookup.findMediaForFilename(dir, 'x.png', collection)).toEqual({
      storedName: 'x.png',
      reason: 'map-exact',
    });

    now += 4_999;
    expect(await lookup.findMediaForFilename(dir, 'x.png', null)).toEqual({
      storedName: 'x.png',
      reason: 'map-exact',
    });

    now += 1;
    expect(await lookup.findMediaForFilename(dir, 'x.png', null)).toBeNull();
  });

  it('drops cached lookups when the directory changes', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'Chart.png'), 'chart');
    const lookup = new MediaLookupService({ ttlMs: 60_000 });

    expect(await lookup.findMediaForFilename(dir, 'chart.png', null)).toEqual({
      storedName: 'Chart.png',
      reason: 'fs-ci',
    });

    await new Promise((resolve) => setTimeout(resolve, 20));
    await writeFile(path.join(dir, 'CHART.png'), 'second');

    expect(await lookup.findMediaForFilename(dir, 'chart.png', null)).toBeNull();
  });

  it('records lookup statistics', async () => {
    const dir = await makeTempDir();
    const lookup = new MediaLookupService();

    expect(lookup.getStats()).toEqual({ count: 0, totalTimeMs: 0, avgLookupTimeMs: null });

    await lookup.resolve(dir, 'missing.png', null);
    await lookup.resolve(dir, 'missing.png', null);

    const stats = lookup.getStats();
    expect(stats.count).toBe(2);
    expect(stats.avgLookupTimeMs).toEqual(expect.any(Number));
  });

  it('lists case-insensitive matches', async () => {
    const dir = await makeTempDir();
    await writeFile(path.join(dir, 'a.png'), 'lower');
    await writeFile(path.join(dir, 'A.png'), 'upper');
    await writeFile(path.join(dir, 'b.png'), 'other');

    const lookup = new MediaLookupService();
    expect((await lookup.listCaseInsensitiveMatches(dir, 'A.PNG')).sort()).toEqual(['A.png', 'a.png']);
  });
});
