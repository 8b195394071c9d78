import express, { Express, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import rateLimit from 'express-rate-limit';
import { errorHandler } from './middleware/errorHandler';
import { requestIdMiddleware } from './middleware/requestId';
import { getAllowedOrigins, RATE_LIMIT_WINDOW_MS, RATE_LIMIT_MAX, MAX_REQUEST_SIZE, NODE_ENV } from './config/env';
import { HTTP_STATUS, HTTP_HEADERS, SECURITY_HEADERS } from './constants/http.constants';
import type { DeckStateService } from './services/deck-state.service';
import type { MediaLookupService } from './services/media-lookup.service';
import type { RatingsService } from './services/ratings.service';
import { createDecksRouter } from './routes/decks.routes';
import { createCardsRouter } from './routes/cards.routes';
import { createFavoritesRouter } from './routes/favorites.routes';
import { createPackagesRouter } from './routes/packages.routes';
import { createMediaRouter } from './routes/media.routes';
import { createDevRouter } from './routes/dev.routes';

export interface AppServices {
  deckState: DeckStateService;
  ratings: RatingsService;
  mediaLookup: MediaLookupService;
  /** Mount /dev/* diagnostics */
  devEndpoints?: boolean;
}

export function createApp(services: AppServices): Express {
  const app = express();

  // Trust first proxy (e.g. nginx) so req.ip reflects X-Forwarded-For
  app.set('trust proxy', 1);

  // Security headers
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'"],
        scriptSrc: ["'self'"],
        imgSrc: ["'self'", 'data:', 'https:'],
        connectSrc: ["'self'"],
        fontSrc: ["'self'"],
        objectSrc: ["'none'"],
        mediaSrc: ["'self'"],
        frameSrc: ["'none'"],
        baseUri: ["'self'"],
        formAction: ["'self'"],
        upgradeInsecureRequests: NODE_ENV === 'production' ? [] : null,
      },
    },
    hsts: {
      maxAge: SECURITY_HEADERS.HSTS_MAX_AGE_SECONDS,
      includeSubDomains: SECURITY_HEADERS.HSTS_INCLUDE_SUBDOMAINS,
      preload: SECURITY_HEADERS.HSTS_PRELOAD,
    },
    xContentTypeOptions: true,
    xFrameOptions: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  // Request ID for tracing
  app.use(requestIdMiddleware);

  app.use(cors({
    origin: (origin, callback) => {
      if (!origin) return callback(null, true);
      if (getAllowedOrigins().includes(origin)) return callback(null, true);
      callback(new Error('Not allowed by CORS'));
    },
    optionsSuccessStatus: HTTP_HEADERS.OPTIONS_SUCCESS_STATUS,
  }));

  app.use('/api/', rateLimit({
    windowMs: RATE_LIMIT_WINDOW_MS,
    limit: RATE_LIMIT_MAX,
    message: { success: false, error: 'Too many requests from this IP, please try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  }));

  // Request logging
  morgan.token<Request, Response>('request-id', (req) => req.requestId ?? '-');
  app.use(morgan(':method :url :status :response-time ms req_id=:request-id', {
    skip: () => NODE_ENV === 'test',
  }));

  app.use(express.json({ limit: MAX_REQUEST_SIZE }));

  app.get('/health', (_req: Request, res: Response) => {
    return res.status(HTTP_STATUS.OK).json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'deck-viewer-backend',
      collectionLoaded: services.deckState.currentCollection !== null,
      uptime: process.uptime(),
    });
  });

  app.use('/api/decks', createDecksRouter(services));
  app.use('/api/cards', createCardsRouter(services));
  app.use('/api/favorites', createFavoritesRouter(services));
  app.use('/api/packages', createPackagesRouter(services));
  app.use(services.deckState.mediaUrlPath, createMediaRouter(services));
  if (services.devEndpoints) {
    app.use('/dev', createDevRouter(services));
  }

  // 404 handler
  app.use((_req: Request, res: Response) => {
    return res.status(HTTP_STATUS.NOT_FOUND).json({
      success: false,
      error: 'Route not found',
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
