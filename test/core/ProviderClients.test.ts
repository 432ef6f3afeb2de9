// Filename: test/core/ProviderClients.test.ts

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  ProviderInvalidResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from '../../core/errors.js';
import { createBaselineAdapter, createProviderClients, createSatelliteAdapter } from '../../core/ProviderClients.js';
import type { AttemptDeadline } from '../../core/types.js';
import type { BaselineTable } from '../../features/nutrients/types.js';

// Mock log
vi.mock('../../utils/log.js', () => ({
  log: vi.fn(),
  ERR: 1,
  WARN: 3,
  LOG: 5,
  INFO: 7,
  TMI: 9,
}));

const location = { lat: 20.27, lon: 81.49 };
const BASE_URL = 'https://s2.example.test/estimate?key=test-secret';

function deadline(controller = new AbortController()): AttemptDeadline {
  return { signal: controller.signal, deadlineAt: Date.now() + 1000, timeoutMs: 1000 };
}

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

const validBody = {
  nitrogenKgHa: 251.5,
  phosphorusKgHa: 21,
  potassiumKgHa: 160,
  organicCarbonPercent: 0.6,
  ndvi: 0.54,
  observedOn: '2024-05-30',
  cloudCoverPercent: 12,
};

describe('ProviderClients', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('createSatelliteAdapter', () => {
    it('should query the endpoint and validate the body', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(validBody));
      const client = createSatelliteAdapter('SENTINEL_2_L2A', BASE_URL);

      const estimate = await client.fetch(location, '2024-06-01', { cropType: 'rice', depth: 30 }, deadline());

      expect(estimate).toEqual({
        nitrogenKgHa: 251.5,
        phosphorusKgHa: 21,
        potassiumKgHa: 160,
        organicCarbonPercent: 0.6,
        ndvi: 0.54,
        observedOn: '2024-05-30',
      });

      const url = new URL(String(fetchMock.mock.calls[0][0]));
      expect(url.origin + url.pathname).toBe('https://s2.example.test/estimate');
      expect(url.searchParams.get('key')).toBe('test-secret');
      expect(url.searchParams.get('lat')).toBe('20.27');
      expect(url.searchParams.get('lon')).toBe('81.49');
      expect(url.searchParams.get('date')).toBe('2024-06-01');
      expect(url.searchParams.get('cropType')).toBe('rice');
      expect(url.searchParams.get('depth')).toBe('30');
    });

    it('should default missing optional fields', async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({ nitrogenKgHa: 200, phosphorusKgHa: 20, potassiumKgHa: 150, organicCarbonPercent: 0.5 })
      );
      const client = createSatelliteAdapter('SENTINEL_1_RTC', BASE_URL);

      const estimate = await client.fetch(location, '2024-06-01', {}, deadline());
      expect(estimate.ndvi).toBeNull();
      expect(estimate.observedOn).toBeNull();
    });

    it('should report unavailable without a configured endpoint', async () => {
      const client = createSatelliteAdapter('LANDSAT_8_9_L2', undefined);

      await expect(client.fetch(location, '2024-06-01', {}, deadline())).rejects.toBeInstanceOf(
        ProviderUnavailableError
      );
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it.each([
      [503, ProviderUnavailableError],
      [500, ProviderUnavailableError],
      [429, ProviderUnavailableError],
      [401, ProviderUnavailableError],
      [404, ProviderInvalidResponseError],
      [422, ProviderInvalidResponseError],
    ])('should map status %i to %o', async (status, expected) => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ error: 'nope' }, status));
      const client = createSatelliteAdapter('MODIS_TERRA_AQUA', BASE_URL);

      await expect(client.fetch(location, '2024-06-01', {}, deadline())).rejects.toBeInstanceOf(expected);
    });

    it('should treat a body that is not JSON as an invalid response', async () => {
      fetchMock.mockResolvedValueOnce(new Response('<html>maintenance</html>', { status: 200 }));
      const client = createSatelliteAdapter('SENTINEL_2_L2A', BASE_URL);

      await expect(client.fetch(location, '2024-06-01', {}, deadline())).rejects.toBeInstanceOf(
        ProviderInvalidResponseError
      );
    });

    it('should treat a body of the wrong shape as an invalid response', async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ nitrogenKgHa: 'high' }));
      const client = createSatelliteAdapter('SENTINEL_2_L2A', BASE_URL);

      const error = await client.fetch(location, '2024-06-01', {}, deadline()).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ProviderInvalidResponseError);
      if (error instanceof ProviderInvalidResponseError) {
        expect(error.kind).toBe('invalid_response');
        expect(error.details).toContain('nitrogenKgHa');
      }
    });

    it('should treat a network failure as unavailable', async () => {
      fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
      const client = createSatelliteAdapter('SENTINEL_2_L2A', BASE_URL);

      await expect(client.fetch(location, '2024-06-01', {}, deadline())).rejects.toBeInstanceOf(
        ProviderUnavailableError
      );
    });

    it('should surface the timeout that aborted the request', async () => {
      const controller = new AbortController();
      const timeout = new ProviderTimeoutError('SENTINEL_2_L2A', 1000);
      controller.abort(timeout);
      fetchMock.mockRejectedValueOnce(abortError());
      const client = createSatelliteAdapter('SENTINEL_2_L2A', BASE_URL);

      await expect(client.fetch(location, '2024-06-01', {}, deadline(controller))).rejects.toBe(timeout);
    });

    it('should report a plain abort as a timeout', async () => {
      const controller = new AbortController();
      controller.abort();
      fetchMock.mockRejectedValueOnce(abortError());
      const client = createSatelliteAdapter('SENTINEL_2_L2A', BASE_URL);

      await expect(client.fetch(location, '2024-06-01', {}, deadline(controller))).rejects.toBeInstanceOf(
        ProviderTimeoutError
      );
    });
  });

  describe('createBaselineAdapter', () => {
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

    it('should answer locally from the reference table', async () => {
      const client = createBaselineAdapter(table);
      const estimate = await client.fetch(location, '2024-06-01', { cropType: 'millet' }, deadline());

      expect(estimate.nitrogenKgHa).toBe(300);
      expect(estimate.ndvi).toBe(0.7);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  describe('createProviderClients', () => {
    it('should define a client for every provider', () => {
      const clients = createProviderClients({}, createTable());
      expect(Object.keys(clients).sort()).toEqual([
        'LANDSAT_8_9_L2',
        'MODIS_TERRA_AQUA',
        'SENTINEL_1_RTC',
        'SENTINEL_2_L2A',
        'SOIL_HEALTH_BASELINE',
      ]);
    });
  });
});

function abortError(): Error {
  return Object.assign(new Error('This operation was aborted'), { name: 'AbortError' });
}

function createTable(): BaselineTable {
  return {
    searchRadiusKm: 50,
    maxSites: 5,
    regionalDefaults: { nitrogenKgHa: 200, phosphorusKgHa: 25, potassiumKgHa: 150, organicCarbonPercent: 1.5 },
    cropAdjustments: {},
    sites: [],
  };
}
