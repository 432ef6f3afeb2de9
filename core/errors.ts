// Filename: core/errors.ts

import type { ProviderName } from '../constants/ProviderNames.js';
import type { AttemptRecord } from './types.js';

export const PROVIDER_FAILURE_KINDS = ['timeout', 'unavailable', 'invalid_response'] as const;

export type ProviderFailureKind = (typeof PROVIDER_FAILURE_KINDS)[number];

/**
 * Base class for a single failed provider attempt. These never leave the
 * orchestrator; they are retried, then the walk moves on.
 */
export abstract class ProviderError extends Error {
  public abstract readonly kind: ProviderFailureKind;

  constructor(
    public provider: ProviderName,
    message: string,
    public details?: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class ProviderTimeoutError extends ProviderError {
  public readonly kind = 'timeout';

  constructor(provider: ProviderName, public timeoutMs: number) {
    super(provider, `${provider} did not answer within ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderUnavailableError extends ProviderError {
  public readonly kind = 'unavailable';

  constructor(provider: ProviderName, message: string, details?: string) {
    super(provider, message, details);
    this.name = 'ProviderUnavailableError';
  }
}

export class ProviderInvalidResponseError extends ProviderError {
  public readonly kind = 'invalid_response';

  constructor(provider: ProviderName, message: string, details?: string) {
    super(provider, message, details);
    this.name = 'ProviderInvalidResponseError';
  }
}

/**
 * Raised to callers when admission control denies a request.
 */
export class RateLimitExceededError extends Error {
  constructor(
    public clientId: string,
    public retryAfterSeconds: number
  ) {
    super(`Rate limit exceeded for ${clientId}. Retry in ${retryAfterSeconds}s.`);
    this.name = 'RateLimitExceededError';
  }
}

/**
 * Every provider failed, baseline included. Only reachable through a broken
 * configuration or a faulty baseline client.
 */
export class ChainExhaustedError extends Error {
  constructor(
    public requestKey: string,
    public attempts: AttemptRecord[],
    public lastError?: unknown
  ) {
    super(`All providers failed for ${requestKey} after ${attempts.length} attempts`);
    this.name = 'ChainExhaustedError';
  }
}

export class ConfigurationError extends Error {
  constructor(message: string, public details?: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function isProviderError(error: unknown): error is ProviderError {
  return error instanceof ProviderError;
}
