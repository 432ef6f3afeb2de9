// Filename: core/FallbackOrchestrator.ts

import { setTimeout as delay } from 'timers/promises';
import type { ProviderName } from '../constants/ProviderNames.js';
import { buildProviderChain } from '../config/configProviders.js';
import { getRequestCacheKey, DEFAULT_KEY_PRECISION } from '../services/CacheKeyService.js';
import type { FallbackStatsAggregator } from '../services/FallbackStatsAggregator.js';
import { attemptTimeoutFor, selectProviderOrder } from '../services/ProviderSelectionPolicy.js';
import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { log, ERR, INFO, TMI, WARN } from '../utils/log.js';
import {
  ChainExhaustedError,
  ConfigurationError,
  ProviderTimeoutError,
  ProviderUnavailableError,
  isProviderError,
} from './errors.js';
import type { TtlCache } from './TtlCache.js';
import type {
  AttemptRecord,
  CachedEstimate,
  EstimateRequest,
  EstimateResult,
  ProviderAdapter,
  ProviderDescriptor,
  SelectionContext,
} from './types.js';

// Orchestrator specific emoji
const LOG_EMOJI = '🛰️';

export interface ProviderRegistration<T> {
  descriptor: ProviderDescriptor;
  adapter: ProviderAdapter<T>;
}

/**
 * Post-processing applied to a winning provider's value before it is cached.
 */
export type ResultTransform<T> = (value: T, source: { request: EstimateRequest; descriptor: ProviderDescriptor }) => T;

export interface FallbackOrchestratorOptions<T> {
  providers: readonly ProviderRegistration<T>[];
  cache: TtlCache<CachedEstimate<T>>;
  stats: FallbackStatsAggregator;
  transform?: ResultTransform<T>;
  resolveContext?: (request: EstimateRequest) => SelectionContext;
  keyPrecision?: number;
  /** First retry waits this long; each further retry doubles it. */
  retryBackoffMs?: number;
  /** How many leading providers may be in flight at once. */
  raceWidth?: number;
  clock?: Clock;
}

export const DEFAULT_SELECTION_CONTEXT: SelectionContext = {
  weather: 'UNKNOWN',
  remoteness: 'UNKNOWN',
  valueClass: 'STANDARD',
  growthRate: 'STEADY',
};

type ProviderRun<T> =
  | { ok: true; value: T; descriptor: ProviderDescriptor }
  | { ok: false; error: unknown };

interface ActiveAttempt {
  provider: ProviderName;
  attempt: number;
  startedAt: number;
}

/**
 * Request-scoped bookkeeping for one provider walk. Once closed, running
 * attempts are abandoned and nothing more is recorded.
 */
interface WalkState {
  controller: AbortController;
  attempts: AttemptRecord[];
  active: Set<ActiveAttempt>;
  closed: boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Answers estimate requests from the cache or, on a miss, from the first
 * provider in the policy-ordered chain that produces a usable value.
 *
 * Each provider gets 1 + maxRetries attempts, each bounded by its own
 * timeout, with exponential backoff in between. With raceWidth > 1 the
 * leading providers run concurrently; the first success wins, the lowest
 * ranked one if several settle together, and the rest are cancelled. When
 * every provider has failed the baseline source answers.
 */
export class FallbackOrchestrator<T> {
  private readonly chain: ProviderDescriptor[];
  private readonly adapters = new Map<ProviderName, ProviderAdapter<T>>();
  private readonly levels = new Map<ProviderName, number>();
  private readonly clock: Clock;
  private readonly keyPrecision: number;
  private readonly retryBackoffMs: number;
  private readonly raceWidth: number;
  private readonly transform: ResultTransform<T>;
  private readonly resolveContext: (request: EstimateRequest) => SelectionContext;

  constructor(private readonly options: FallbackOrchestratorOptions<T>) {
    if (options.providers.length === 0) {
      throw new ConfigurationError('FallbackOrchestrator requires at least one provider.');
    }

    this.chain = buildProviderChain(options.providers.map((p) => p.descriptor));
    for (const { descriptor, adapter } of options.providers) {
      this.adapters.set(descriptor.name, adapter);
    }
    this.chain.forEach((descriptor, index) => this.levels.set(descriptor.name, index + 1));

    if (!this.chain.some((d) => d.baseline)) {
      log(`${LOG_EMOJI} ⚠️ No baseline provider configured. Exhausted chains will fail requests.`, WARN);
    }

    this.clock = options.clock ?? systemClock;
    this.keyPrecision = options.keyPrecision ?? DEFAULT_KEY_PRECISION;
    this.retryBackoffMs = options.retryBackoffMs ?? 1000;
    this.raceWidth = Math.max(1, options.raceWidth ?? 1);
    this.transform = options.transform ?? ((value) => value);
    this.resolveContext =
      options.resolveContext ?? ((request) => ({ ...DEFAULT_SELECTION_CONTEXT, ...request.context }));
  }

  /**
   * Resolves one request.
   * @throws ChainExhaustedError when no provider, baseline included, answered.
   */
  public async handle(request: EstimateRequest): Promise<EstimateResult<T>> {
    const startedAt = this.clock.now();
    const key = getRequestCacheKey(
      { location: request.location, date: request.date, cropType: request.cropType, params: request.params },
      this.keyPrecision
    );

    // --- 1. Cache check ---
    const cached = this.options.cache.get(key);
    if (cached) {
      const durationMs = this.clock.now() - startedAt;
      this.options.stats.record({
        succeeded: true,
        fromCache: true,
        durationMs,
        provider: cached.provider,
        fallbackLevel: cached.fallbackLevel,
        attempts: [],
      });
      log(`${LOG_EMOJI} ⚡ Cache hit for ${key}, served by ${cached.provider} earlier`, TMI);
      return this.buildResult(key, cached, true, [], [], durationMs);
    }

    // --- 2. Provider walk ---
    const context = this.resolveContext(request);
    const decision = selectProviderOrder(this.chain, request.location, context);
    log(`${LOG_EMOJI} Smart selection for ${key}: ${decision.reasons.join('; ')}`, INFO);

    const attempts: AttemptRecord[] = decision.excluded.map(({ descriptor, reason }) => ({
      provider: descriptor.name,
      attempt: 0,
      startedAt,
      outcome: 'skipped',
      latencyMs: 0,
      error: reason,
    }));

    let entry: CachedEstimate<T>;
    try {
      const winner = await this.resolveProviders(key, request, context, decision.ordered, attempts);
      const value = this.transform(winner.value, { request, descriptor: winner.descriptor });
      entry = {
        value,
        provider: winner.descriptor.name,
        fallbackLevel: this.levelOf(winner.descriptor.name),
        fetchedAt: this.clock.now(),
      };
    } catch (error) {
      this.options.stats.record({
        succeeded: false,
        fromCache: false,
        durationMs: this.clock.now() - startedAt,
        attempts,
      });
      log(`${LOG_EMOJI} ❌ Request ${key} failed: ${describeError(error)}`, ERR);
      throw error;
    }

    // --- 3. Store and report ---
    this.options.cache.put(key, entry);
    const durationMs = this.clock.now() - startedAt;
    this.options.stats.record({
      succeeded: true,
      fromCache: false,
      durationMs,
      provider: entry.provider,
      fallbackLevel: entry.fallbackLevel,
      attempts,
    });
    log(
      `${LOG_EMOJI} 🎯 ${key} answered by ${entry.provider} at level ${entry.fallbackLevel} in ${durationMs}ms`,
      INFO
    );
    return this.buildResult(key, entry, false, attempts, decision.appliedRules, durationMs);
  }

  /**
   * Walks the ordered providers up to the baseline, then asks the baseline
   * itself. If a promoted baseline fails, the providers ordered after it
   * still get their turn.
   */
  private async resolveProviders(
    key: string,
    request: EstimateRequest,
    context: SelectionContext,
    ordered: readonly ProviderDescriptor[],
    attempts: AttemptRecord[]
  ): Promise<{ value: T; descriptor: ProviderDescriptor }> {
    const baselineIndex = ordered.findIndex((d) => d.baseline);
    const baseline = baselineIndex === -1 ? undefined : ordered[baselineIndex];
    const before = baseline ? ordered.slice(0, baselineIndex) : ordered;
    const after = baseline ? ordered.slice(baselineIndex + 1) : [];

    const winner = await this.walk(before, request, context, attempts);
    if (winner) {
      return winner;
    }
    if (!baseline) {
      throw new ChainExhaustedError(key, attempts);
    }

    if (before.length > 0) {
      log(`${LOG_EMOJI} 🔄 All providers failed for ${key}, using ${baseline.label}`, WARN);
    }
    const state = this.openWalk(attempts);
    let run: ProviderRun<T>;
    try {
      run = await this.runProvider(baseline, request, context, state);
    } finally {
      this.closeWalk(state);
    }
    if (run.ok) {
      return run;
    }
    log(`${LOG_EMOJI} ❌ Baseline ${baseline.name} failed for ${key}: ${describeError(run.error)}`, ERR);

    const rest = await this.walk(after, request, context, attempts);
    if (rest) {
      return rest;
    }
    throw new ChainExhaustedError(key, attempts, run.error);
  }

  /**
   * Runs providers with at most raceWidth in flight. Resolves with the first
   * success, or undefined once every provider has used up its retries.
   */
  private async walk(
    providers: readonly ProviderDescriptor[],
    request: EstimateRequest,
    context: SelectionContext,
    attempts: AttemptRecord[]
  ): Promise<{ value: T; descriptor: ProviderDescriptor } | undefined> {
    if (providers.length === 0) {
      return undefined;
    }

    const state = this.openWalk(attempts);
    const inFlight = new Map<number, Promise<void>>();
    const settled = new Map<number, ProviderRun<T>>();
    let next = 0;

    const launch = (): void => {
      while (inFlight.size < this.raceWidth && next < providers.length) {
        const index = next++;
        const run = this.runProvider(providers[index], request, context, state).then((result) => {
          settled.set(index, result);
        });
        inFlight.set(index, run);
      }
    };

    try {
      launch();
      while (inFlight.size > 0) {
        await Promise.race(inFlight.values());

        // Everything that settled in the same turn is visible here; the
        // lowest-ranked success wins.
        let winner: { value: T; descriptor: ProviderDescriptor } | undefined;
        for (const index of [...settled.keys()].sort((a, b) => a - b)) {
          inFlight.delete(index);
          const result = settled.get(index);
          if (!winner && result?.ok) {
            winner = result;
          }
        }
        settled.clear();

        if (winner) {
          return winner;
        }
        launch();
      }
      return undefined;
    } finally {
      this.closeWalk(state);
    }
  }

  /**
   * Tries one provider up to 1 + maxRetries times. Never rejects.
   */
  private async runProvider(
    descriptor: ProviderDescriptor,
    request: EstimateRequest,
    context: SelectionContext,
    state: WalkState
  ): Promise<ProviderRun<T>> {
    const adapter = this.adapters.get(descriptor.name);
    if (!adapter) {
      return {
        ok: false,
        error: new ProviderUnavailableError(descriptor.name, `No adapter registered for ${descriptor.name}`),
      };
    }

    const timeoutMs = attemptTimeoutFor(descriptor, context.weather);
    const maxAttempts = descriptor.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (state.closed) {
        return { ok: false, error: lastError };
      }

      try {
        const value = await this.attemptOnce(descriptor, adapter, request, timeoutMs, attempt, state);
        if (attempt > 1) {
          log(`${LOG_EMOJI} ✅ ${descriptor.name} succeeded on attempt ${attempt}`, INFO);
        }
        return { ok: true, value, descriptor };
      } catch (error) {
        lastError = error;
        log(`${LOG_EMOJI} ⚠️ ${descriptor.name} attempt ${attempt} failed: ${describeError(error)}`, WARN);
      }

      if (attempt < maxAttempts) {
        const waitMs = this.retryBackoffMs * 2 ** (attempt - 1);
        if (waitMs > 0) {
          log(`${LOG_EMOJI} ⏳ Retrying ${descriptor.name} in ${waitMs}ms...`, TMI);
          const resumed = await delay(waitMs, true, { signal: state.controller.signal }).catch(() => false);
          if (!resumed) {
            return { ok: false, error: lastError };
          }
        }
      }
    }

    log(`${LOG_EMOJI} ❌ ${descriptor.name} failed after ${maxAttempts} attempts`, WARN);
    return { ok: false, error: lastError };
  }

  /**
   * One physical attempt, bounded by timeoutMs and by the walk's abort signal.
   */
  private async attemptOnce(
    descriptor: ProviderDescriptor,
    adapter: ProviderAdapter<T>,
    request: EstimateRequest,
    timeoutMs: number,
    attempt: number,
    state: WalkState
  ): Promise<T> {
    const startedAt = this.clock.now();
    const active: ActiveAttempt = { provider: descriptor.name, attempt, startedAt };
    state.active.add(active);

    const attemptController = new AbortController();
    let rejectTimedOut: (error: Error) => void = () => undefined;
    let rejectCancelled: (error: Error) => void = () => undefined;
    const timedOut = new Promise<never>((_, reject) => {
      rejectTimedOut = reject;
    });
    const cancelled = new Promise<never>((_, reject) => {
      rejectCancelled = reject;
    });

    const timer = setTimeout(() => {
      const error = new ProviderTimeoutError(descriptor.name, timeoutMs);
      attemptController.abort(error);
      rejectTimedOut(error);
    }, timeoutMs);
    const onCancel = (): void => {
      attemptController.abort(state.controller.signal.reason);
      rejectCancelled(new Error(`${descriptor.name} attempt cancelled`));
    };
    state.controller.signal.addEventListener('abort', onCancel, { once: true });

    const fetched = new Promise<T>((resolve) => {
      resolve(
        adapter.fetch(request.location, request.date, { ...(request.params ?? {}), cropType: request.cropType }, {
          signal: attemptController.signal,
          deadlineAt: startedAt + timeoutMs,
          timeoutMs,
        })
      );
    });

    try {
      const value = await Promise.race([fetched, timedOut, cancelled]);
      this.recordAttempt(state, active, 'success');
      return value;
    } catch (error) {
      this.recordAttempt(state, active, error instanceof ProviderTimeoutError ? 'timeout' : 'error', error);
      throw isProviderError(error)
        ? error
        : new ProviderUnavailableError(descriptor.name, describeError(error));
    } finally {
      clearTimeout(timer);
      state.controller.signal.removeEventListener('abort', onCancel);
      state.active.delete(active);
    }
  }

  private recordAttempt(
    state: WalkState,
    active: ActiveAttempt,
    outcome: AttemptRecord['outcome'],
    error?: unknown
  ): void {
    if (state.closed) {
      // Already written off as skipped when the walk closed
      return;
    }
    state.attempts.push({
      provider: active.provider,
      attempt: active.attempt,
      startedAt: active.startedAt,
      outcome,
      latencyMs: this.clock.now() - active.startedAt,
      ...(error === undefined ? {} : { error: describeError(error) }),
    });
  }

  private openWalk(attempts: AttemptRecord[]): WalkState {
    return { controller: new AbortController(), attempts, active: new Set(), closed: false };
  }

  /**
   * Writes off attempts still running as skipped, then cancels them.
   */
  private closeWalk(state: WalkState): void {
    if (state.closed) {
      return;
    }
    const now = this.clock.now();
    for (const active of state.active) {
      state.attempts.push({
        provider: active.provider,
        attempt: active.attempt,
        startedAt: active.startedAt,
        outcome: 'skipped',
        latencyMs: now - active.startedAt,
        error: 'cancelled after another provider answered',
      });
    }
    state.closed = true;
    state.controller.abort();
  }

  private levelOf(provider: ProviderName): number {
    return this.levels.get(provider) ?? this.chain.length;
  }

  private buildResult(
    key: string,
    entry: CachedEstimate<T>,
    fromCache: boolean,
    attempts: AttemptRecord[],
    appliedRules: readonly string[],
    durationMs: number
  ): EstimateResult<T> {
    const descriptor = this.chain.find((d) => d.name === entry.provider);
    return {
      key,
      value: entry.value,
      provider: entry.provider,
      fallbackLevel: entry.fallbackLevel,
      fromCache,
      dataQuality: descriptor?.dataQuality ?? 'basic',
      confidenceScore: descriptor?.confidenceScore ?? 0,
      attempts,
      appliedRules: [...appliedRules],
      durationMs,
    };
  }
}
