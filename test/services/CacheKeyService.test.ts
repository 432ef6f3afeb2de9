// Filename: test/services/CacheKeyService.test.ts

import { describe, it, expect, vi } from 'vitest';
import { getRequestCacheKey, KEY_PREFIXES } from '../../services/CacheKeyService.js';

// Mock log
vi.mock('../../utils/log.js', () => ({
  log: vi.fn(),
  TMI: 9,
}));

const base = {
  location: { lat: 20.123456, lon: 81.98764 },
  date: '2024-06-01',
  cropType: 'rice',
};

describe('CacheKeyService', () => {
  describe('getRequestCacheKey', () => {
    it('should build the key from rounded coordinates, day and crop', () => {
      const key = getRequestCacheKey(base);
      expect(key).toBe('estimate:20.1235,81.9876:2024-06-01:crop_RICE');
      expect(key.startsWith(KEY_PREFIXES.ESTIMATE)).toBe(true);
    });

    it('should produce the same key regardless of parameter order', () => {
      const key1 = getRequestCacheKey({ ...base, params: { depth: 30, band: 'nir' } });
      const key2 = getRequestCacheKey({ ...base, params: { band: 'nir', depth: 30 } });

      expect(key1).toBe(key2);
      expect(key1).toBe('estimate:20.1235,81.9876:2024-06-01:band_NIR&crop_RICE&depth_30');
    });

    it('should produce the same key regardless of parameter name case', () => {
      const key1 = getRequestCacheKey({ ...base, params: { B: 1, a: 2 } });
      const key2 = getRequestCacheKey({ ...base, params: { b: 1, A: 2 } });

      expect(key1).toBe(key2);
      expect(key1).toBe('estimate:20.1235,81.9876:2024-06-01:a_2&b_1&crop_RICE');
    });

    it('should collapse a parameter that repeats the crop', () => {
      expect(getRequestCacheKey({ ...base, params: { CROP: 'rice' } })).toBe(getRequestCacheKey(base));
    });

    it('should normalize case and whitespace of string values', () => {
      expect(getRequestCacheKey({ ...base, cropType: '  Rice ' })).toBe(getRequestCacheKey(base));
    });

    it('should share a key for points closer than the rounding precision', () => {
      const a = getRequestCacheKey({ ...base, location: { lat: 20.12341, lon: 81.5 } });
      const b = getRequestCacheKey({ ...base, location: { lat: 20.12344, lon: 81.5 } });
      expect(a).toBe(b);
    });

    it('should not render a negative zero', () => {
      const key = getRequestCacheKey({ ...base, location: { lat: -0.00001, lon: 0.00001 } });
      expect(key).toBe('estimate:0.0000,0.0000:2024-06-01:crop_RICE');
    });

    it('should ignore the time of day', () => {
      expect(getRequestCacheKey({ ...base, date: '2024-06-01T10:30:00Z' })).toBe(getRequestCacheKey(base));
    });

    it('should honour a custom precision', () => {
      expect(getRequestCacheKey(base, 2)).toBe('estimate:20.12,81.99:2024-06-01:crop_RICE');
    });

    it('should separate different crops and dates', () => {
      expect(getRequestCacheKey({ ...base, cropType: 'wheat' })).not.toBe(getRequestCacheKey(base));
      expect(getRequestCacheKey({ ...base, date: '2024-06-02' })).not.toBe(getRequestCacheKey(base));
    });
  });
});
