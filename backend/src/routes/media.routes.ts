import { Router } from 'express';
import type { AppServices } from '../app';
import { HTTP_HEADERS } from '../constants/http.constants';
import { asyncHandler } from '../middleware/errorHandler';
import { validateParams } from '../middleware/validation';
import { MediaFilenameParamsSchema } from '../schemas/package.schemas';
import { NotFoundError } from '../utils/errors';

/** Mounted at the configured media URL prefix. */
export function createMediaRouter({ deckState, mediaLookup }: AppServices): Router {
  const router = Router();

  router.get('/:filename', validateParams(MediaFilenameParamsSchema), asyncHandler(async (req, res, next) => {
    const { filename } = MediaFilenameParamsSchema.parse(req.params);
    const { result, elapsedMs } = await mediaLookup.resolve(
      deckState.mediaDirectory,
      filename,
      deckState.currentCollection
    );
    if (!result) {
      throw new NotFoundError('Media file');
    }

    res.setHeader(HTTP_HEADERS.MEDIA_LOOKUP_TIME, String(Math.trunc(elapsedMs)));
    if (result.reason !== 'exact') {
      res.setHeader(HTTP_HEADERS.MEDIA_FALLBACK, result.reason);
    }
    res.sendFile(result.storedName, { root: deckState.mediaDirectory }, (err) => {
      if (err) next(err);
    });
  }));

  return router;
}
