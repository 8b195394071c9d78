import path from 'path';
import { Router } from 'express';
import type { AppServices } from '../app';
import { asyncHandler } from '../middleware/errorHandler';
import { validateRequest } from '../middleware/validation';
import { SwitchPackageSchema } from '../schemas/package.schemas';

export function createPackagesRouter({ deckState }: AppServices): Router {
  const router = Router();

  /**
   * GET /api/packages
   * Packages available in the data directory and the current one
   */
  router.get('/', asyncHandler(async (_req, res) => {
    const packages = await deckState.refreshPackages();
    const current = deckState.currentPackage;
    return res.json({
      success: true,
      data: {
        packages: packages.map((packagePath) => path.basename(packagePath)),
        current: current ? path.basename(current) : null,
        loaded: deckState.currentCollection !== null,
      },
    });
  }));

  /**
   * POST /api/packages/switch
   */
  router.post('/switch', validateRequest(SwitchPackageSchema), asyncHandler(async (req, res) => {
    const { filename } = SwitchPackageSchema.parse(req.body);
    const { collection, fromCache } = await deckState.switchPackage(filename);
    return res.json({
      success: true,
      data: { current: filename, fromCache, decks: collection.decks.size, totalCards: collection.totalCards },
    });
  }));

  return router;
}
