// Filename: core/types.ts

import type { ProviderName } from '../constants/ProviderNames.js';
import type {
  GrowthRateClass,
  RemotenessClass,
  ValueClass,
  WeatherCondition,
} from '../constants/SelectionClasses.js';

export interface GeoPoint {
  lat: number;
  lon: number;
}

export interface BoundingBox {
  minLat: number;
  maxLat: number;
  minLon: number;
  maxLon: number;
}

/** Domain parameters forwarded to providers and folded into the cache key. */
export type RequestParams = Record<string, string | number>;

export interface EstimateRequest {
  location: GeoPoint;
  /** Calendar date, YYYY-MM-DD. */
  date: string;
  cropType: string;
  params?: RequestParams;
  /** Caller-supplied conditions; anything missing is derived. */
  context?: Partial<SelectionContext>;
}

export type DataQuality = 'excellent' | 'good' | 'acceptable' | 'basic';

/**
 * Static description of one provider. The order of priorityRank across all
 * descriptors is the default fallback sequence.
 */
export interface ProviderDescriptor {
  readonly priorityRank: number;
  readonly name: ProviderName;
  readonly label: string;
  readonly nominalResolutionMeters: number;
  /** Days between passes; null for static sources. */
  readonly nominalRevisitDays: number | null;
  readonly perAttemptTimeoutMs: number;
  readonly maxRetries: number;
  readonly cloudTolerant: boolean;
  readonly alwaysAvailable: boolean;
  /** The terminal source used when everything else has failed. */
  readonly baseline: boolean;
  readonly dataQuality: DataQuality;
  readonly confidenceScore: number;
  readonly unavailableRegions: readonly BoundingBox[];
}

export interface SelectionContext {
  weather: WeatherCondition;
  remoteness: RemotenessClass;
  valueClass: ValueClass;
  growthRate: GrowthRateClass;
}

export interface AttemptDeadline {
  /** Aborted on timeout or when another provider wins the request. */
  signal: AbortSignal;
  /** Epoch milliseconds. */
  deadlineAt: number;
  timeoutMs: number;
}

/**
 * Uniform fetch capability of a data source. Failures are thrown as
 * ProviderError subclasses.
 */
export interface ProviderAdapter<T> {
  fetch(location: GeoPoint, date: string, params: RequestParams, deadline: AttemptDeadline): Promise<T>;
}

export type AttemptOutcome = 'success' | 'timeout' | 'error' | 'skipped';

export interface AttemptRecord {
  provider: ProviderName;
  /** 1-based attempt number for this provider within the request. */
  attempt: number;
  startedAt: number;
  outcome: AttemptOutcome;
  latencyMs: number;
  error?: string;
}

export interface EstimateResult<T> {
  key: string;
  value: T;
  provider: ProviderName;
  /** Position of the provider in the default chain, 1-based. */
  fallbackLevel: number;
  fromCache: boolean;
  dataQuality: DataQuality;
  confidenceScore: number;
  attempts: AttemptRecord[];
  appliedRules: string[];
  durationMs: number;
}

/** What the cache holds for one request key. */
export interface CachedEstimate<T> {
  value: T;
  provider: ProviderName;
  fallbackLevel: number;
  fetchedAt: number;
}
