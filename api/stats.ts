// Filename: api/stats.ts

import type { VercelRequest, VercelResponse } from '@vercel/node';
import type { FieldEstimateService } from '../core/FieldEstimateService.js';
import { getEstimateService } from '../core/serviceInstance.js';
import type { NutrientEstimate } from '../features/nutrients/index.js';
import { log, ERR, WARN } from '../utils/log.js';

const LOG_EMOJI = '📊';

/**
 * Builds the /api/stats handler: cache, rate limiter and fallback snapshots.
 */
export function createStatsHandler(resolveService: () => FieldEstimateService<NutrientEstimate>) {
  return async function handler(req: VercelRequest, res: VercelResponse) {
    if (req.method !== 'GET') {
      log(`${LOG_EMOJI} Stats: Invalid method ${req.method}`, WARN);
      return res.status(405).json({ error: 'Method Not Allowed. Use GET.' });
    }

    try {
      const service = resolveService();
      res.setHeader('Cache-Control', 'no-store');
      return res.status(200).json({
        cache: service.cacheStats(),
        rateLimit: service.rateLimitStats(),
        fallback: service.fallbackStats(),
      });
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown internal error';
      log(`${LOG_EMOJI} Stats: ❌ ${errorMessage}`, ERR);
      return res.status(500).json({ error: 'Failed to read statistics.', details: errorMessage });
    }
  };
}

export default createStatsHandler(getEstimateService);
