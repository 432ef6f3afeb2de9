// Filename: api/routing.ts

import type { VercelRequest, VercelResponse } from '@vercel/node';
import estimateHandler from './estimate.js';
import statsHandler from './stats.js';

/**
 * 📎 Routes requests based on query parameters 👀
 * - ?stats -> Cache, rate limit and fallback statistics
 * - ?estimate -> Nutrient estimate (POST)
 * - (none) -> Service description
 */
export async function routeRequest(req: VercelRequest, res: VercelResponse): Promise<void> {
  const hasStats = req.query.stats !== undefined;
  const hasEstimate = req.query.estimate !== undefined;

  if (hasStats) {
    await statsHandler(req, res);
  } else if (hasEstimate) {
    await estimateHandler(req, res);
  } else {
    res.status(200).json({
      service: 'field-estimate-proxy',
      endpoints: {
        'POST /api/estimate': 'Soil nutrient estimate for {lat, lon, date, cropType, weather?, params?}',
        'GET /api/stats': 'Cache, rate limiter and fallback statistics',
      },
    });
  }
}
