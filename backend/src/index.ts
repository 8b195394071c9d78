import { createApp } from './app';
import {
  DECK_VIEWER_DATA_DIR,
  DECK_VIEWER_DEV,
  DECK_VIEWER_PACKAGE,
  HOST,
  MEDIA_LOOKUP_TTL_SECONDS,
  MEDIA_URL_PATH,
  NODE_ENV,
  PORT,
} from './config/env';
import { DeckStateService, resolveMediaDirectory } from './services/deck-state.service';
import { MediaLookupService } from './services/media-lookup.service';
import { RatingsService } from './services/ratings.service';
import { logger, serializeError } from './utils/logger';

async function startServer() {
  const dataDir = DECK_VIEWER_DATA_DIR ?? null;
  const mediaDirectory = await resolveMediaDirectory(dataDir);
  logger.info('Media directory ready', { mediaDirectory });

  const deckState = new DeckStateService({ dataDir, mediaDirectory, mediaUrlPath: MEDIA_URL_PATH });
  const ratings = new RatingsService(dataDir);
  const mediaLookup = new MediaLookupService({ ttlMs: MEDIA_LOOKUP_TTL_SECONDS * 1000 });

  await deckState.initialize(DECK_VIEWER_PACKAGE);

  const app = createApp({ deckState, ratings, mediaLookup, devEndpoints: DECK_VIEWER_DEV });

  app.listen(PORT, HOST, () => {
    logger.info('Server started', { port: PORT, host: HOST, nodeEnv: NODE_ENV });
    logger.info('Health endpoint ready', { url: `http://localhost:${PORT}/health` });
    if (DECK_VIEWER_DEV) {
      logger.info('Media diagnostics enabled', { url: `http://localhost:${PORT}/dev/media-stats` });
    }
  });
}

startServer().catch((error) => {
  logger.error('Failed to start server', { error: serializeError(error) });
  process.exit(1);
});
