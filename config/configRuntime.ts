// Filename: config/configRuntime.ts

import dotenv from 'dotenv';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { log, LOG } from '../utils/log.js';

// Config specific emoji
const LOG_EMOJI = '⚙️';

// This file is in config/, so project root is one level up
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const projectRoot = join(__dirname, '..');

/**
 * Loads .env.local outside production. Missing files are fine; variables may
 * come from the host.
 */
export function loadLocalEnv(): void {
  if (process.env.VERCEL_ENV === 'production') {
    return;
  }
  const result = dotenv.config({ path: join(projectRoot, '.env.local') });
  if (!result.error) {
    log(`${LOG_EMOJI} Loaded .env.local`, LOG);
  }
}

const optionalUrl = z.string().url().optional();

const RuntimeEnvSchema = z.object({
  CACHE_TTL_SECONDS: z.coerce.number().positive().default(24 * 60 * 60),
  CACHE_MAX_SIZE: z.coerce.number().int().positive().default(1000),
  CACHE_KEY_PRECISION: z.coerce.number().int().min(0).max(8).default(4),

  RATE_LIMIT_PER_MINUTE: z.coerce.number().int().positive().default(60),
  RATE_LIMIT_PER_HOUR: z.coerce.number().int().positive().default(1000),
  RATE_LIMIT_MAX_CLIENTS: z.coerce.number().int().positive().default(10_000),

  PROVIDER_TIMEOUT_SECONDS: z.coerce.number().positive().optional(),
  PROVIDER_MAX_RETRIES: z.coerce.number().int().min(0).optional(),
  RETRY_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
  PARALLEL_RACE_WIDTH: z.coerce.number().int().positive().default(1),

  SENTINEL2_API_URL: optionalUrl,
  LANDSAT_API_URL: optionalUrl,
  MODIS_API_URL: optionalUrl,
  SENTINEL1_API_URL: optionalUrl,
});

export interface RuntimeConfig {
  cache: {
    ttlSeconds: number;
    maxSize: number;
    keyPrecision: number;
  };
  rateLimit: {
    maxPerMinute: number;
    maxPerHour: number;
    maxClients: number;
  };
  providers: {
    perAttemptTimeoutMs?: number;
    maxRetries?: number;
    retryBackoffMs: number;
    raceWidth: number;
    urls: {
      SENTINEL_2_L2A?: string;
      LANDSAT_8_9_L2?: string;
      MODIS_TERRA_AQUA?: string;
      SENTINEL_1_RTC?: string;
    };
  };
}

/**
 * Validates environment variables into the runtime configuration.
 * Empty strings count as unset.
 * @throws ConfigurationError listing every invalid variable.
 */
export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = RuntimeEnvSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('Invalid runtime configuration.', details);
  }

  const e = parsed.data;
  return {
    cache: {
      ttlSeconds: e.CACHE_TTL_SECONDS,
      maxSize: e.CACHE_MAX_SIZE,
      keyPrecision: e.CACHE_KEY_PRECISION,
    },
    rateLimit: {
      maxPerMinute: e.RATE_LIMIT_PER_MINUTE,
      maxPerHour: e.RATE_LIMIT_PER_HOUR,
      maxClients: e.RATE_LIMIT_MAX_CLIENTS,
    },
    providers: {
      perAttemptTimeoutMs:
        e.PROVIDER_TIMEOUT_SECONDS === undefined ? undefined : Math.round(e.PROVIDER_TIMEOUT_SECONDS * 1000),
      maxRetries: e.PROVIDER_MAX_RETRIES,
      retryBackoffMs: e.RETRY_BACKOFF_MS,
      raceWidth: e.PARALLEL_RACE_WIDTH,
      urls: {
        SENTINEL_2_L2A: e.SENTINEL2_API_URL,
        LANDSAT_8_9_L2: e.LANDSAT_API_URL,
        MODIS_TERRA_AQUA: e.MODIS_API_URL,
        SENTINEL_1_RTC: e.SENTINEL1_API_URL,
      },
    },
  };
}
