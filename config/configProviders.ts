// Filename: config/configProviders.ts

import type { ProviderName } from '../constants/ProviderNames.js';
import type { ProviderDescriptor } from '../core/types.js';
import { ConfigurationError } from '../core/errors.js';

/**
 * Default provider chain, highest priority first. Timeouts are per attempt.
 */
export const PROVIDER_DESCRIPTORS: readonly ProviderDescriptor[] = [
  {
    priorityRank: 1,
    name: 'SENTINEL_2_L2A',
    label: 'Sentinel-2 L2A',
    nominalResolutionMeters: 10,
    nominalRevisitDays: 5,
    perAttemptTimeoutMs: 30_000,
    maxRetries: 2,
    cloudTolerant: false,
    alwaysAvailable: false,
    baseline: false,
    dataQuality: 'excellent',
    confidenceScore: 0.95,
    unavailableRegions: [],
  },
  {
    priorityRank: 2,
    name: 'LANDSAT_8_9_L2',
    label: 'Landsat-8/9 L2',
    nominalResolutionMeters: 30,
    nominalRevisitDays: 16,
    perAttemptTimeoutMs: 30_000,
    maxRetries: 2,
    cloudTolerant: false,
    alwaysAvailable: false,
    baseline: false,
    dataQuality: 'good',
    confidenceScore: 0.9,
    unavailableRegions: [],
  },
  {
    priorityRank: 3,
    name: 'MODIS_TERRA_AQUA',
    label: 'MODIS Terra/Aqua',
    nominalResolutionMeters: 250,
    nominalRevisitDays: 1,
    perAttemptTimeoutMs: 20_000,
    maxRetries: 2,
    cloudTolerant: false,
    alwaysAvailable: false,
    baseline: false,
    dataQuality: 'acceptable',
    confidenceScore: 0.8,
    unavailableRegions: [],
  },
  {
    priorityRank: 4,
    name: 'SENTINEL_1_RTC',
    label: 'Sentinel-1 RTC',
    nominalResolutionMeters: 10,
    nominalRevisitDays: 12,
    perAttemptTimeoutMs: 30_000,
    maxRetries: 1,
    cloudTolerant: true,
    alwaysAvailable: false,
    baseline: false,
    dataQuality: 'acceptable',
    confidenceScore: 0.75,
    unavailableRegions: [],
  },
  {
    priorityRank: 5,
    name: 'SOIL_HEALTH_BASELINE',
    label: 'Soil Health Baseline',
    nominalResolutionMeters: 5_000,
    nominalRevisitDays: null,
    perAttemptTimeoutMs: 5_000,
    maxRetries: 0,
    cloudTolerant: true,
    alwaysAvailable: true,
    baseline: true,
    dataQuality: 'basic',
    confidenceScore: 0.7,
    unavailableRegions: [],
  },
];

export interface DescriptorOverrides {
  perAttemptTimeoutMs?: number;
  maxRetries?: number;
}

/**
 * Sorts descriptors into the default fallback sequence (priorityRank, then
 * declaration order) and applies global overrides to the non-baseline ones.
 * @throws ConfigurationError on duplicate names or more than one baseline.
 */
export function buildProviderChain(
  descriptors: readonly ProviderDescriptor[],
  overrides: DescriptorOverrides = {}
): ProviderDescriptor[] {
  const seen = new Set<ProviderName>();
  for (const descriptor of descriptors) {
    if (seen.has(descriptor.name)) {
      throw new ConfigurationError(`Provider ${descriptor.name} is declared more than once.`);
    }
    seen.add(descriptor.name);
  }

  const baselines = descriptors.filter((d) => d.baseline);
  if (baselines.length > 1) {
    throw new ConfigurationError(
      `Only one baseline provider is allowed, found: ${baselines.map((d) => d.name).join(', ')}`
    );
  }

  return descriptors
    .map((descriptor, index) => ({ descriptor, index }))
    .sort((a, b) => a.descriptor.priorityRank - b.descriptor.priorityRank || a.index - b.index)
    .map(({ descriptor }) =>
      descriptor.baseline
        ? descriptor
        : {
            ...descriptor,
            perAttemptTimeoutMs: overrides.perAttemptTimeoutMs ?? descriptor.perAttemptTimeoutMs,
            maxRetries: overrides.maxRetries ?? descriptor.maxRetries,
          }
    );
}
