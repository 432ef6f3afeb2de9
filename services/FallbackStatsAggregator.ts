// Filename: services/FallbackStatsAggregator.ts

import type { ProviderName } from '../constants/ProviderNames.js';
import type { AttemptOutcome, AttemptRecord } from '../core/types.js';
import { log, LOG } from '../utils/log.js';

// Stats specific emoji
const LOG_EMOJI = '📊';

export interface RequestOutcome {
  succeeded: boolean;
  fromCache: boolean;
  durationMs: number;
  provider?: ProviderName;
  fallbackLevel?: number;
  attempts: readonly AttemptRecord[];
}

export type AttemptOutcomeCounts = Record<AttemptOutcome, number>;

export interface ProviderUsageStats {
  successCount: number;
  /** Share of successful requests this provider answered. */
  successSharePercent: number;
  attempts: AttemptOutcomeCounts;
}

export interface FallbackStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  cacheHits: number;
  successRatePercent: number;
  averageResponseTimeMs: number;
  providerUsage: Record<string, ProviderUsageStats>;
  /** Successful non-cached requests per fallback level. */
  levelUsage: Record<string, number>;
}

function emptyOutcomes(): AttemptOutcomeCounts {
  return { success: 0, timeout: 0, error: 0, skipped: 0 };
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 10000) / 100;
}

/**
 * Process-wide request statistics. Passed by reference to whatever records
 * into it; each top-level request is folded in exactly once, in one
 * synchronous call, so readers never see a half-applied update.
 */
export class FallbackStatsAggregator {
  private totalRequests = 0;
  private successfulRequests = 0;
  private failedRequests = 0;
  private cacheHits = 0;
  private averageResponseTimeMs = 0;
  private providerSuccesses = new Map<ProviderName, number>();
  private providerAttempts = new Map<ProviderName, AttemptOutcomeCounts>();
  private levelUsage = new Map<number, number>();

  public record(outcome: RequestOutcome): void {
    this.totalRequests++;
    if (outcome.succeeded) {
      this.successfulRequests++;
    } else {
      this.failedRequests++;
    }

    // Running mean over every request, cached or not
    this.averageResponseTimeMs += (outcome.durationMs - this.averageResponseTimeMs) / this.totalRequests;

    if (outcome.fromCache) {
      this.cacheHits++;
    } else if (outcome.succeeded && outcome.provider !== undefined && outcome.fallbackLevel !== undefined) {
      this.providerSuccesses.set(outcome.provider, (this.providerSuccesses.get(outcome.provider) ?? 0) + 1);
      this.levelUsage.set(outcome.fallbackLevel, (this.levelUsage.get(outcome.fallbackLevel) ?? 0) + 1);
    }

    for (const attempt of outcome.attempts) {
      let counts = this.providerAttempts.get(attempt.provider);
      if (!counts) {
        counts = emptyOutcomes();
        this.providerAttempts.set(attempt.provider, counts);
      }
      counts[attempt.outcome]++;
    }
  }

  public snapshot(): FallbackStats {
    const providers = new Set<ProviderName>([...this.providerSuccesses.keys(), ...this.providerAttempts.keys()]);
    const freshSuccesses = this.successfulRequests - this.cacheHits;

    const providerUsage: Record<string, ProviderUsageStats> = {};
    for (const provider of providers) {
      const successCount = this.providerSuccesses.get(provider) ?? 0;
      providerUsage[provider] = {
        successCount,
        successSharePercent: percent(successCount, freshSuccesses),
        attempts: { ...(this.providerAttempts.get(provider) ?? emptyOutcomes()) },
      };
    }

    const levelUsage: Record<string, number> = {};
    for (const [level, count] of [...this.levelUsage.entries()].sort((a, b) => a[0] - b[0])) {
      levelUsage[String(level)] = count;
    }

    return {
      totalRequests: this.totalRequests,
      successfulRequests: this.successfulRequests,
      failedRequests: this.failedRequests,
      cacheHits: this.cacheHits,
      successRatePercent: percent(this.successfulRequests, this.totalRequests),
      averageResponseTimeMs: Math.round(this.averageResponseTimeMs * 100) / 100,
      providerUsage,
      levelUsage,
    };
  }

  public reset(): void {
    this.totalRequests = 0;
    this.successfulRequests = 0;
    this.failedRequests = 0;
    this.cacheHits = 0;
    this.averageResponseTimeMs = 0;
    this.providerSuccesses = new Map();
    this.providerAttempts = new Map();
    this.levelUsage = new Map();
    log(`${LOG_EMOJI} Fallback statistics reset`, LOG);
  }
}
