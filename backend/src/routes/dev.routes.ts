import { Router } from 'express';
import type { AppServices } from '../app';
import { asyncHandler } from '../middleware/errorHandler';
import { validateParams } from '../middleware/validation';
import { MediaFilenameParamsSchema } from '../schemas/package.schemas';

/**
 * Media troubleshooting endpoints. Only mounted when DECK_VIEWER_DEV is set.
 */
export function createDevRouter({ deckState, mediaLookup }: AppServices): Router {
  const router = Router();

  /**
   * GET /dev/media-matches/:filename
   * Files in the media directory matching the name case-insensitively
   */
  router.get('/media-matches/:filename', validateParams(MediaFilenameParamsSchema), asyncHandler(async (req, res) => {
    const { filename } = MediaFilenameParamsSchema.parse(req.params);
    const matches = await mediaLookup.listCaseInsensitiveMatches(deckState.mediaDirectory, filename);
    return res.json({ success: true, data: { requested: filename, matches } });
  }));

  /**
   * GET /dev/media-stats
   */
  router.get('/media-stats', (_req, res) => {
    return res.json({ success: true, data: mediaLookup.getStats() });
  });

  return router;
}
