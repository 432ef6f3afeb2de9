// Filename: test/api/routing.test.ts

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { VercelRequest, VercelResponse } from '@vercel/node';

vi.mock('../../api/estimate.js', () => ({ default: vi.fn() }));
vi.mock('../../api/stats.js', () => ({ default: vi.fn() }));

import estimateHandler from '../../api/estimate.js';
import statsHandler from '../../api/stats.js';
import handler from '../../api/index.js';

describe('Request Routing', () => {
  let mockRes: Partial<VercelResponse>;

  beforeEach(() => {
    vi.clearAllMocks();
    mockRes = {
      status: vi.fn().mockReturnThis(),
      json: vi.fn().mockReturnThis(),
    };
  });

  it('should route ?stats to the stats handler', async () => {
    const req = { method: 'GET', query: { stats: '' } };

    await handler(req as unknown as VercelRequest, mockRes as VercelResponse);

    expect(statsHandler).toHaveBeenCalledTimes(1);
    expect(estimateHandler).not.toHaveBeenCalled();
  });

  it('should route ?estimate to the estimate handler', async () => {
    const req = { method: 'POST', query: { estimate: '' } };

    await handler(req as unknown as VercelRequest, mockRes as VercelResponse);

    expect(estimateHandler).toHaveBeenCalledTimes(1);
    expect(statsHandler).not.toHaveBeenCalled();
  });

  it('should describe the service without a switch', async () => {
    const req = { method: 'GET', query: {} };

    await handler(req as unknown as VercelRequest, mockRes as VercelResponse);

    expect(mockRes.status).toHaveBeenCalledWith(200);
    expect(mockRes.json).toHaveBeenCalledWith(expect.objectContaining({ service: 'field-estimate-proxy' }));
  });
});
