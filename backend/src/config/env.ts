/**
 * Environment Configuration Validation
 *
 * Loads env in order: root .env (shared) then backend/.env (backend-specific).
 * Runtime env (shell exports, CI, container `environment`) always wins.
 */

import path from 'path';
import { z } from 'zod';
import dotenv from 'dotenv';
import { MEDIA_DEFAULTS } from '../constants/anki.constants';

const backendRoot = path.resolve(__dirname, '..', '..');
const repoRoot = path.basename(backendRoot) === 'dist'
  ? path.resolve(backendRoot, '..', '..')
  : path.resolve(backendRoot, '..');
dotenv.config({ path: path.join(repoRoot, '.env'), quiet: true });
dotenv.config({ path: path.join(backendRoot, '.env'), quiet: true });

const optionalPath = z
  .string()
  .optional()
  .transform((s) => (s && s.trim()) || undefined);

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.string().regex(/^\d+$/).transform(Number).default(5000),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Deck sources
  /** Package loaded at startup; defaults to the first .apkg in the data dir */
  DECK_VIEWER_PACKAGE: optionalPath,
  /** Directory holding .apkg files, the media directory and ratings */
  DECK_VIEWER_DATA_DIR: optionalPath,

  // Media
  MEDIA_URL_PATH: z.string().optional(),
  MEDIA_LOOKUP_TTL_SECONDS: z
    .string()
    .regex(/^\d*\.?\d+$/)
    .transform(Number)
    .default(MEDIA_DEFAULTS.LOOKUP_TTL_SECONDS),

  // Developer diagnostics (/dev/* routes)
  DECK_VIEWER_DEV: z
    .enum(['true', 'false', '1', '0'])
    .optional()
    .transform((v) => v === 'true' || v === '1'),

  // CORS
  CORS_ORIGIN: z.string().url().or(z.string().regex(/^http:\/\/localhost:\d+$/)).default('http://localhost:3000'),
  CORS_ORIGINS: z.string().optional(), // Comma-separated list

  // Security
  RATE_LIMIT_WINDOW_MS: z.string().regex(/^\d+$/).transform(Number).default(60000),
  RATE_LIMIT_MAX: z.string().regex(/^\d+$/).transform(Number).default(600),

  // Request limits
  MAX_REQUEST_SIZE: z.string().default('100kb'),
});

export type Env = z.infer<typeof EnvSchema>;

let env: Env;

export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    env = EnvSchema.parse(source);
    return env;
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment configuration:');
      error.issues.forEach((issue) => {
        const issuePath = issue.path.join('.');
        console.error(`  - ${issuePath}: ${issue.message}`);
      });
      console.error('\nPlease check your .env file.');
      process.exit(1);
    }
    throw error;
  }
}

// Validate on import
export const config = validateEnv();

export const {
  NODE_ENV,
  PORT,
  HOST,
  LOG_LEVEL,
  DECK_VIEWER_PACKAGE,
  DECK_VIEWER_DATA_DIR,
  MEDIA_URL_PATH,
  MEDIA_LOOKUP_TTL_SECONDS,
  DECK_VIEWER_DEV,
  CORS_ORIGIN,
  CORS_ORIGINS,
  RATE_LIMIT_WINDOW_MS,
  RATE_LIMIT_MAX,
  MAX_REQUEST_SIZE,
} = config;

/** CORS allowed origins (from CORS_ORIGINS or [CORS_ORIGIN]). */
export function getAllowedOrigins(): string[] {
  if (config.CORS_ORIGINS) {
    return config.CORS_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean);
  }
  return [config.CORS_ORIGIN];
}
