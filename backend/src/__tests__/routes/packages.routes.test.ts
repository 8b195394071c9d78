import request from 'supertest';
import { afterEach, describe, expect, it } from 'vitest';
import { createTestApp } from '../utils/app-fixtures';
import { basicAndClozeFixture, DEFAULT_DECK_ID } from '../utils/apkg-fixtures';
import { cleanupTempDirs } from '../utils/test-helpers';

afterEach(cleanupTempDirs);

function twoPackages() {
  return {
    'a.apkg': basicAndClozeFixture(),
    'b.apkg': { ...basicAndClozeFixture(), decks: { [DEFAULT_DECK_ID]: 'Other' } },
  };
}

describe('Package routes', () => {
  it('lists packages and the current one', async () => {
    const { app } = await createTestApp({ packages: twoPackages() });

    const res = await request(app).get('/api/packages');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      success: true,
      data: { packages: ['a.apkg', 'b.apkg'], current: 'a.apkg', loaded: true },
    });
  });

  it('switches to another package', async () => {
    const { app } = await createTestApp({ packages: twoPackages() });

    const res = await request(app).post('/api/packages/switch').send({ filename: 'b.apkg' });

    expect(res.status).toBe(200);
    expect(res.body.data).toEqual({ current: 'b.apkg', fromCache: false, decks: 1, totalCards: 2 });

    const decks = await request(app).get('/api/decks');
    expect(decks.body.data.decks).toEqual([{ id: 1, name: 'Other', cardCount: 2 }]);
    expect(decks.body.data.currentPackage).toBe('b.apkg');
  });

  it('serves the current package from cache', async () => {
    const { app } = await createTestApp({ packages: twoPackages() });

    const res = await request(app).post('/api/packages/switch').send({ filename: 'a.apkg' });

    expect(res.body.data).toMatchObject({ current: 'a.apkg', fromCache: true });
  });

  it('answers 404 for a package outside the data directory', async () => {
    const { app } = await createTestApp({ packages: twoPackages() });

    const res = await request(app).post('/api/packages/switch').send({ filename: 'missing.apkg' });

    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ success: false, error: 'Package not found' });
  });

  it('rejects a filename that is not a package', async () => {
    const { app } = await createTestApp({ packages: twoPackages() });

    const res = await request(app).post('/api/packages/switch').send({ filename: 'notes.txt' });

    expect(res.status).toBe(400);
    expect(res.body.details).toEqual([{ path: 'filename', message: 'Filename must end in .apkg' }]);
  });
});
