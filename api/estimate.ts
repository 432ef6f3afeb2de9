// Filename: api/estimate.ts

import type { VercelRequest, VercelResponse } from '@vercel/node';
import { z } from 'zod';
import { ALL_WEATHER_CONDITIONS } from '../constants/SelectionClasses.js';
import { ChainExhaustedError } from '../core/errors.js';
import type { FieldEstimateService } from '../core/FieldEstimateService.js';
import { getEstimateService } from '../core/serviceInstance.js';
import type { EstimateRequest } from '../core/types.js';
import type { NutrientEstimate } from '../features/nutrients/index.js';
import { log, ERR, WARN, INFO } from '../utils/log.js';

// API Handler specific emoji
const LOG_EMOJI = '🖥️';

/**
 * Expected structure of the incoming request body.
 */
export const EstimateBodySchema = z.object({
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  date: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date'),
  cropType: z.string().trim().min(1),
  weather: z.enum(ALL_WEATHER_CONDITIONS).optional(),
  params: z.record(z.union([z.string(), z.number()])).optional(),
});

export type EstimateBody = z.infer<typeof EstimateBodySchema>;

function firstHeader(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first?.trim() || undefined;
}

/**
 * Client identity for admission control: an explicit x-client-id, else the
 * first forwarded address, else the socket address.
 */
export function resolveClientId(req: VercelRequest): string {
  const explicit = firstHeader(req.headers['x-client-id']);
  if (explicit) {
    return explicit;
  }
  const forwarded = firstHeader(req.headers['x-forwarded-for'])?.split(',')[0]?.trim();
  return forwarded || req.socket?.remoteAddress || 'anonymous';
}

export function toEstimateRequest(body: EstimateBody): EstimateRequest {
  return {
    location: { lat: body.lat, lon: body.lon },
    date: body.date,
    cropType: body.cropType,
    ...(body.params ? { params: body.params } : {}),
    ...(body.weather ? { context: { weather: body.weather } } : {}),
  };
}

/**
 * Builds the /api/estimate handler around a service accessor.
 */
export function createEstimateHandler(resolveService: () => FieldEstimateService<NutrientEstimate>) {
  return async function handler(req: VercelRequest, res: VercelResponse) {
    if (req.method !== 'POST') {
      log(`${LOG_EMOJI} Handler: Invalid method ${req.method}`, WARN);
      return res.status(405).json({ error: 'Method Not Allowed. Use POST.' });
    }

    try {
      const service = resolveService();

      // --- 1. Rate Limiting ---
      // Every request is charged, including ones with a malformed body
      const clientId = resolveClientId(req);
      const decision = service.admit(clientId);
      if (!decision.allowed) {
        log(`${LOG_EMOJI} Handler: 🚫 ${clientId} rate limited (${decision.reason})`, WARN);
        res.setHeader('Retry-After', String(decision.retryAfterSeconds));
        return res.status(429).json({
          error: 'Rate limit exceeded.',
          reason: decision.reason,
          retryAfterSeconds: decision.retryAfterSeconds,
        });
      }
      res.setHeader('X-RateLimit-Remaining-Minute', String(decision.minuteRemaining));
      res.setHeader('X-RateLimit-Remaining-Hour', String(decision.hourRemaining));

      // --- 2. Input Validation ---
      const parsed = EstimateBodySchema.safeParse(req.body);
      if (!parsed.success) {
        log(`${LOG_EMOJI} Handler: Invalid request body from ${clientId}`, WARN);
        return res.status(400).json({
          error: 'Invalid request body.',
          details: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        });
      }
      const request = toEstimateRequest(parsed.data);

      log(`${LOG_EMOJI} Handler: Request received: ${request.cropType} at ${request.location.lat},${request.location.lon}`, INFO);

      // --- 3. Estimate Resolution ---
      const result = await service.handle(request);

      // --- 4. Success Response ---
      res.setHeader('Cache-Control', 'no-store');
      return res.status(200).json({
        data: result.value,
        metadata: {
          key: result.key,
          provider: result.provider,
          fallbackLevel: result.fallbackLevel,
          fromCache: result.fromCache,
          dataQuality: result.dataQuality,
          confidenceScore: result.confidenceScore,
          appliedRules: result.appliedRules,
          attempts: result.attempts,
          durationMs: result.durationMs,
        },
      });
    } catch (error) {
      // --- 5. Error Handling ---
      const errorMessage = error instanceof Error ? error.message : 'Unknown internal error';
      if (error instanceof ChainExhaustedError) {
        log(`${LOG_EMOJI} Handler: ❌ No provider could answer. Error: ${errorMessage}`, ERR);
        return res.status(503).json({ error: 'No data source could answer the request.', details: errorMessage });
      }
      log(`${LOG_EMOJI} Handler: ❌ Failed to resolve estimate. Error: ${errorMessage}`, ERR);
      return res.status(500).json({ error: 'Failed to resolve estimate.', details: errorMessage });
    }
  };
}

export default createEstimateHandler(getEstimateService);
