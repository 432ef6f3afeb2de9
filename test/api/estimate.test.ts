// Filename: test/api/estimate.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { VercelRequest, VercelResponse } from '@vercel/node';
import { createEstimateHandler, resolveClientId, toEstimateRequest } from '../../api/estimate.js';
import { loadRuntimeConfig } from '../../config/configRuntime.js';
import { ChainExhaustedError } from '../../core/errors.js';
import { createNutrientEstimateService } from '../../core/FieldEstimateService.js';
import type { FieldEstimateService } from '../../core/FieldEstimateService.js';
import type { BaselineTable, NutrientEstimate } from '../../features/nutrients/types.js';
import { ManualClock } from '../../utils/clock.js';

// Mock the log module
vi.mock('../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

const table: BaselineTable = {
  searchRadiusKm: 50,
  maxSites: 5,
  regionalDefaults: { nitrogenKgHa: 200, phosphorusKgHa: 25, potassiumKgHa: 150, organicCarbonPercent: 1.5 },
  cropAdjustments: {},
  sites: [
    {
      id: 'T-1',
      name: 'Test Plot',
      lat: 20.27,
      lon: 81.49,
      nitrogenKgHa: 300,
      phosphorusKgHa: 30,
      potassiumKgHa: 200,
      organicCarbonPercent: 0.5,
    },
  ],
};

const validBody = { lat: 20.27, lon: 81.49, date: '2024-06-01', cropType: 'millet' };

describe('Estimate Endpoint Tests', () => {
  let service: FieldEstimateService<NutrientEstimate>;
  let handler: ReturnType<typeof createEstimateHandler>;
  let mockReq: Partial<VercelRequest>;
  let mockRes: Partial<VercelResponse>;

  beforeEach(() => {
    service = createNutrientEstimateService(
      loadRuntimeConfig({ RATE_LIMIT_PER_MINUTE: '2', RETRY_BACKOFF_MS: '0' }),
      { clock: new ManualClock(0), table }
    );
    handler = createEstimateHandler(() => service);

    mockReq = {
      method: 'POST',
      query: {},
      headers: { 'x-client-id': 'client-a' },
      body: { ...validBody },
    };
    mockRes = {
      status: vi.fn().mockReturnThis(),
      json: vi.fn().mockReturnThis(),
      setHeader: vi.fn().mockReturnThis(),
    };
  });

  it('should reject non-POST requests', async () => {
    mockReq.method = 'GET';

    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenCalledWith(405);
    expect(mockRes.json).toHaveBeenCalledWith({ error: 'Method Not Allowed. Use POST.' });
  });

  it('should reject a body that fails validation', async () => {
    mockReq.body = { ...validBody, lat: 200 };

    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenCalledWith(400);
    expect(mockRes.json).toHaveBeenCalledWith({
      error: 'Invalid request body.',
      details: ['lat: Number must be less than or equal to 90'],
    });
  });

  it('should charge malformed bodies against the rate limit', async () => {
    mockReq.body = { cropType: 'millet' };
    await handler(mockReq as VercelRequest, mockRes as VercelResponse);
    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    mockReq.body = { ...validBody };
    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenNthCalledWith(1, 400);
    expect(mockRes.status).toHaveBeenNthCalledWith(2, 400);
    expect(mockRes.status).toHaveBeenLastCalledWith(429);
    expect(service.rateLimitStats()).toMatchObject({ totalChecks: 3, deniedChecks: 1 });
  });

  it('should answer with the estimate and its provenance', async () => {
    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenCalledWith(200);
    expect(mockRes.setHeader).toHaveBeenCalledWith('X-RateLimit-Remaining-Minute', '1');
    expect(mockRes.setHeader).toHaveBeenCalledWith('X-RateLimit-Remaining-Hour', '999');
    expect(mockRes.json).toHaveBeenCalledWith(
      expect.objectContaining({
        data: expect.objectContaining({ nitrogenKgHa: 300, ndvi: 0.7 }),
        metadata: expect.objectContaining({
          key: 'estimate:20.2700,81.4900:2024-06-01:crop_MILLET',
          provider: 'SOIL_HEALTH_BASELINE',
          fallbackLevel: 5,
          fromCache: false,
          dataQuality: 'basic',
        }),
      })
    );
  });

  it('should answer 429 with Retry-After once the client is over its limit', async () => {
    await handler(mockReq as VercelRequest, mockRes as VercelResponse);
    await handler(mockReq as VercelRequest, mockRes as VercelResponse);
    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenLastCalledWith(429);
    expect(mockRes.setHeader).toHaveBeenCalledWith('Retry-After', '60');
    expect(mockRes.json).toHaveBeenLastCalledWith({
      error: 'Rate limit exceeded.',
      reason: 'minute_limit_exceeded',
      retryAfterSeconds: 60,
    });
  });

  it('should answer 503 when no provider could answer', async () => {
    vi.spyOn(service, 'handle').mockRejectedValueOnce(new ChainExhaustedError('estimate:test', []));

    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenCalledWith(503);
    expect(mockRes.json).toHaveBeenCalledWith({
      error: 'No data source could answer the request.',
      details: 'All providers failed for estimate:test after 0 attempts',
    });
  });

  it('should answer 500 on unexpected failures', async () => {
    vi.spyOn(service, 'handle').mockRejectedValueOnce(new Error('disk on fire'));

    await handler(mockReq as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenCalledWith(500);
    expect(mockRes.json).toHaveBeenCalledWith({ error: 'Failed to resolve estimate.', details: 'disk on fire' });
  });

  describe('resolveClientId', () => {
    it('should prefer the explicit client id', () => {
      const req = { headers: { 'x-client-id': ' farm-7 ', 'x-forwarded-for': '10.0.0.1' } };
      expect(resolveClientId(req as unknown as VercelRequest)).toBe('farm-7');
    });

    it('should use the first forwarded address', () => {
      const req = { headers: { 'x-forwarded-for': '10.0.0.1, 10.0.0.2' } };
      expect(resolveClientId(req as unknown as VercelRequest)).toBe('10.0.0.1');
    });

    it('should fall back to anonymous', () => {
      const req = { headers: {} };
      expect(resolveClientId(req as unknown as VercelRequest)).toBe('anonymous');
    });
  });

  describe('toEstimateRequest', () => {
    it('should carry the weather into the selection context', () => {
      expect(toEstimateRequest({ ...validBody, weather: 'RAIN', params: { depth: 30 } })).toEqual({
        location: { lat: 20.27, lon: 81.49 },
        date: '2024-06-01',
        cropType: 'millet',
        params: { depth: 30 },
        context: { weather: 'RAIN' },
      });
    });
  });
});
