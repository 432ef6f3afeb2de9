// Filename: test/config/configProviders.test.ts

import { describe, it, expect } from 'vitest';
import { buildProviderChain, PROVIDER_DESCRIPTORS } from '../../config/configProviders.js';
import { ConfigurationError } from '../../core/errors.js';

describe('buildProviderChain', () => {
  it('should order descriptors by priority rank', () => {
    const shuffled = [...PROVIDER_DESCRIPTORS].reverse();
    expect(buildProviderChain(shuffled).map((d) => d.priorityRank)).toEqual([1, 2, 3, 4, 5]);
  });

  it('should apply overrides to every provider except the baseline', () => {
    const chain = buildProviderChain(PROVIDER_DESCRIPTORS, { perAttemptTimeoutMs: 1500, maxRetries: 0 });

    expect(chain.slice(0, 4).every((d) => d.perAttemptTimeoutMs === 1500 && d.maxRetries === 0)).toBe(true);
    expect(chain[4].name).toBe('SOIL_HEALTH_BASELINE');
    expect(chain[4].perAttemptTimeoutMs).toBe(5000);
  });

  it('should leave the shared defaults untouched', () => {
    buildProviderChain(PROVIDER_DESCRIPTORS, { maxRetries: 7 });
    expect(PROVIDER_DESCRIPTORS[0].maxRetries).toBe(2);
  });

  it('should reject duplicate provider names', () => {
    expect(() => buildProviderChain([PROVIDER_DESCRIPTORS[0], PROVIDER_DESCRIPTORS[0]])).toThrow(ConfigurationError);
  });

  it('should reject more than one baseline', () => {
    const second = { ...PROVIDER_DESCRIPTORS[3], baseline: true };
    expect(() => buildProviderChain([PROVIDER_DESCRIPTORS[4], second])).toThrow(
      'Only one baseline provider is allowed, found: SOIL_HEALTH_BASELINE, SENTINEL_1_RTC'
    );
  });
});
