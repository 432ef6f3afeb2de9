// Filename: core/RateLimiter.ts

/**
 * Per-client admission control with two independent fixed windows.
 *
 * Each client gets a 60-second and a 3600-second counter. A request is
 * admitted only while both have budget, and admission charges both. A window
 * whose reset time has passed is zeroed lazily by the next check, which also
 * starts the new window.
 *
 * State per client is created on first sight and kept in least-recently-seen
 * order; once more than maxClients identities are tracked, the stalest is
 * dropped.
 */

import type { Clock } from '../utils/clock.js';
import { systemClock } from '../utils/clock.js';
import { log, LOG, TMI, WARN } from '../utils/log.js';

// Rate limiter specific emoji
const LOG_EMOJI = '🚦';

export const MINUTE_WINDOW_MS = 60 * 1000;
export const HOUR_WINDOW_MS = 60 * 60 * 1000;

export interface RateLimitConfig {
  maxPerMinute: number;
  maxPerHour: number;
  /** Upper bound on tracked client identities. */
  maxClients: number;
}

export type AdmissionDecision =
  | { allowed: true; minuteRemaining: number; hourRemaining: number }
  | { allowed: false; reason: 'minute_limit_exceeded' | 'hour_limit_exceeded'; retryAfterSeconds: number };

interface RateLimitState {
  minuteCount: number;
  minuteResetAt: number;
  hourCount: number;
  hourResetAt: number;
}

export interface ClientRateLimitStats {
  currentRequestsMinute: number;
  maxRequestsMinute: number;
  currentRequestsHour: number;
  maxRequestsHour: number;
}

export interface RateLimitStats {
  totalChecks: number;
  deniedChecks: number;
  blockRatePercent: number;
  trackedClients: number;
  maxTrackedClients: number;
  clients: Record<string, ClientRateLimitStats>;
}

export class RateLimiter {
  private readonly clients = new Map<string, RateLimitState>();
  private readonly clock: Clock;
  private config: RateLimitConfig;
  private totalChecks = 0;
  private deniedChecks = 0;

  constructor(config: RateLimitConfig, clock: Clock = systemClock) {
    this.config = { ...config };
    this.clock = clock;
    log(
      `${LOG_EMOJI} Rate limiter initialized: ${config.maxPerMinute}/min, ${config.maxPerHour}/hour, ${config.maxClients} clients`,
      LOG
    );
  }

  public admit(clientId: string): AdmissionDecision {
    const now = this.clock.now();
    const state = this.touch(clientId, now);
    this.totalChecks++;

    if (now >= state.minuteResetAt) {
      state.minuteCount = 0;
      state.minuteResetAt = now + MINUTE_WINDOW_MS;
    }
    if (now >= state.hourResetAt) {
      state.hourCount = 0;
      state.hourResetAt = now + HOUR_WINDOW_MS;
    }

    const minuteExhausted = state.minuteCount >= this.config.maxPerMinute;
    const hourExhausted = state.hourCount >= this.config.maxPerHour;

    if (minuteExhausted || hourExhausted) {
      this.deniedChecks++;
      const untilReset = Math.min(state.minuteResetAt - now, state.hourResetAt - now);
      const retryAfterSeconds = Math.max(0, Math.ceil(untilReset / 1000));
      const reason = minuteExhausted ? 'minute_limit_exceeded' : 'hour_limit_exceeded';
      log(
        `${LOG_EMOJI} 🚫 Rate limit exceeded for ${clientId}: ${state.minuteCount}/${this.config.maxPerMinute} per minute, ${state.hourCount}/${this.config.maxPerHour} per hour`,
        WARN
      );
      return { allowed: false, reason, retryAfterSeconds };
    }

    state.minuteCount++;
    state.hourCount++;
    log(`${LOG_EMOJI} Admitted ${clientId} (${state.minuteCount}/min, ${state.hourCount}/hour)`, TMI);

    return {
      allowed: true,
      minuteRemaining: this.config.maxPerMinute - state.minuteCount,
      hourRemaining: this.config.maxPerHour - state.hourCount,
    };
  }

  /**
   * Current usage for one client. Windows that have lapsed read as zero;
   * nothing is reset or reordered.
   */
  public clientStats(clientId: string): ClientRateLimitStats {
    const now = this.clock.now();
    const state = this.clients.get(clientId);
    return {
      currentRequestsMinute: state && now < state.minuteResetAt ? state.minuteCount : 0,
      maxRequestsMinute: this.config.maxPerMinute,
      currentRequestsHour: state && now < state.hourResetAt ? state.hourCount : 0,
      maxRequestsHour: this.config.maxPerHour,
    };
  }

  public stats(): RateLimitStats {
    const clients: Record<string, ClientRateLimitStats> = {};
    for (const clientId of this.clients.keys()) {
      clients[clientId] = this.clientStats(clientId);
    }
    return {
      totalChecks: this.totalChecks,
      deniedChecks: this.deniedChecks,
      blockRatePercent:
        this.totalChecks === 0 ? 0 : Math.round((this.deniedChecks / this.totalChecks) * 10000) / 100,
      trackedClients: this.clients.size,
      maxTrackedClients: this.config.maxClients,
      clients,
    };
  }

  public resetClient(clientId: string): boolean {
    const removed = this.clients.delete(clientId);
    if (removed) {
      log(`${LOG_EMOJI} 🔄 Rate limit reset for client: ${clientId}`, LOG);
    }
    return removed;
  }

  public resetAll(): void {
    this.clients.clear();
    this.totalChecks = 0;
    this.deniedChecks = 0;
    log(`${LOG_EMOJI} 🔄 All rate limits reset`, LOG);
  }

  /**
   * Changes the caps for subsequent checks. Counters already accrued stay.
   */
  public updateLimits(limits: Partial<RateLimitConfig>): void {
    this.config = { ...this.config, ...limits };
    log(
      `${LOG_EMOJI} 🔄 Rate limits updated: ${this.config.maxPerMinute}/min, ${this.config.maxPerHour}/hour`,
      LOG
    );
  }

  /**
   * Returns the client's state, creating it on first sight, and marks it as
   * most recently seen.
   */
  private touch(clientId: string, now: number): RateLimitState {
    let state = this.clients.get(clientId);
    if (state) {
      this.clients.delete(clientId);
    } else {
      state = {
        minuteCount: 0,
        minuteResetAt: now + MINUTE_WINDOW_MS,
        hourCount: 0,
        hourResetAt: now + HOUR_WINDOW_MS,
      };
    }
    this.clients.set(clientId, state);

    while (this.clients.size > this.config.maxClients) {
      const stalest = this.clients.keys().next();
      if (stalest.done) {
        break;
      }
      this.clients.delete(stalest.value);
      log(`${LOG_EMOJI} Dropped rate limit state for least recently seen client ${stalest.value}`, TMI);
    }
    return state;
  }
}
