// Filename: core/FieldEstimateService.ts

import { buildProviderChain, PROVIDER_DESCRIPTORS } from '../config/configProviders.js';
import type { RuntimeConfig } from '../config/configRuntime.js';
import { loadBaselineTable } from '../features/nutrients/index.js';
import type { BaselineTable, NutrientEstimate } from '../features/nutrients/index.js';
import { FallbackStatsAggregator } from '../services/FallbackStatsAggregator.js';
import type { FallbackStats } from '../services/FallbackStatsAggregator.js';
import { SelectionContextService } from '../services/SelectionContextService.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { log, INFO, WARN } from '../utils/log.js';
import { RateLimitExceededError } from './errors.js';
import { FallbackOrchestrator } from './FallbackOrchestrator.js';
import type { ProviderRegistration, ResultTransform } from './FallbackOrchestrator.js';
import { createProviderClients } from './ProviderClients.js';
import { RateLimiter } from './RateLimiter.js';
import type { AdmissionDecision, RateLimitStats } from './RateLimiter.js';
import { TtlCache } from './TtlCache.js';
import type { CacheStats } from './TtlCache.js';
import type { CachedEstimate, EstimateRequest, EstimateResult } from './types.js';

const LOG_EMOJI = '🌱';

export interface FieldEstimateServiceDeps<T> {
  limiter: RateLimiter;
  cache: TtlCache<CachedEstimate<T>>;
  stats: FallbackStatsAggregator;
  orchestrator: FallbackOrchestrator<T>;
}

/**
 * Entry point for callers: admission control in front of the cached,
 * fallback-backed estimate lookup, plus the three statistics views.
 */
export class FieldEstimateService<T> {
  constructor(private readonly deps: FieldEstimateServiceDeps<T>) {}

  public admit(clientId: string): AdmissionDecision {
    return this.deps.limiter.admit(clientId);
  }

  public handle(request: EstimateRequest): Promise<EstimateResult<T>> {
    return this.deps.orchestrator.handle(request);
  }

  /**
   * Admits, then handles. A denied request never reaches the cache or a provider.
   * @throws RateLimitExceededError when the client is over either window.
   */
  public async serve(clientId: string, request: EstimateRequest): Promise<EstimateResult<T>> {
    const decision = this.admit(clientId);
    if (!decision.allowed) {
      log(`${LOG_EMOJI} 🚫 ${clientId} denied (${decision.reason}), retry in ${decision.retryAfterSeconds}s`, WARN);
      throw new RateLimitExceededError(clientId, decision.retryAfterSeconds);
    }
    return this.handle(request);
  }

  public cacheStats(): CacheStats {
    return this.deps.cache.stats();
  }

  public rateLimitStats(): RateLimitStats {
    return this.deps.limiter.stats();
  }

  public fallbackStats(): FallbackStats {
    return this.deps.stats.snapshot();
  }
}

export interface NutrientServiceOptions {
  clock?: Clock;
  table?: BaselineTable;
  transform?: ResultTransform<NutrientEstimate>;
}

/**
 * Wires the nutrient estimate service from runtime configuration: default
 * descriptors with env overrides, HTTP satellite clients and the bundled
 * baseline table.
 */
export function createNutrientEstimateService(
  config: RuntimeConfig,
  options: NutrientServiceOptions = {}
): FieldEstimateService<NutrientEstimate> {
  const clock = options.clock ?? systemClock;
  const table = options.table ?? loadBaselineTable();

  const chain = buildProviderChain(PROVIDER_DESCRIPTORS, {
    perAttemptTimeoutMs: config.providers.perAttemptTimeoutMs,
    maxRetries: config.providers.maxRetries,
  });
  const clients = createProviderClients(config.providers.urls, table);
  const providers: ProviderRegistration<NutrientEstimate>[] = chain.map((descriptor) => ({
    descriptor,
    adapter: clients[descriptor.name],
  }));

  const cache = new TtlCache<CachedEstimate<NutrientEstimate>>({
    ttlSeconds: config.cache.ttlSeconds,
    maxSize: config.cache.maxSize,
    clock,
  });
  const stats = new FallbackStatsAggregator();
  const limiter = new RateLimiter(config.rateLimit, clock);
  const orchestrator = new FallbackOrchestrator<NutrientEstimate>({
    providers,
    cache,
    stats,
    transform: options.transform,
    resolveContext: SelectionContextService.resolverFor(table),
    keyPrecision: config.cache.keyPrecision,
    retryBackoffMs: config.providers.retryBackoffMs,
    raceWidth: config.providers.raceWidth,
    clock,
  });

  log(
    `${LOG_EMOJI} Estimate service ready: ${chain.map((d) => d.name).join(' -> ')}, race width ${config.providers.raceWidth}`,
    INFO
  );
  return new FieldEstimateService({ limiter, cache, stats, orchestrator });
}
