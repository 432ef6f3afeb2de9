// Filename: utils/httpClient.ts

import { log, ERR, TMI, WARN } from './log.js';

/**
 * Failure talking to an upstream estimate endpoint. Status 0 means no
 * response arrived at all.
 */
export class HttpError extends Error {
  constructor(
    public status: number,
    public message: string,
    public url: string,
    public details?: string
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export interface HttpRequestOptions {
  headers?: Record<string, string>;
  method?: string;
  body?: string;
  /** Provider name used to tag log lines. */
  context?: string;
  /** Aborting rethrows the signal's reason, not a fetch error. */
  signal?: AbortSignal;
}

/** Query parameters whose values never reach the logs. */
const SECRET_PARAMS = ['api_key', 'apikey', 'key', 'token', 'access_token'];

const describeError = (error: unknown): string => (error instanceof Error ? error.message : 'Unknown error');

/**
 * GETs (by default) a provider endpoint and returns the parsed body, unvalidated.
 * @throws HttpError on a network failure, a non-2xx status or a body that is not JSON.
 */
export async function fetchJson(url: string, options: HttpRequestOptions = {}): Promise<unknown> {
  const response = await send(url, options);
  try {
    const data: unknown = await response.json();
    return data;
  } catch (error) {
    if (options.signal?.aborted) {
      throw options.signal.reason;
    }
    log(`Unreadable JSON from ${maskSensitiveUrl(url)}: ${describeError(error)}`, ERR);
    throw new HttpError(response.status, `Failed to parse JSON response: ${describeError(error)}`, url, describeError(error));
  }
}

async function send(url: string, options: HttpRequestOptions): Promise<Response> {
  const context = options.context || 'HTTP';
  const method = options.method || 'GET';
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...(options.body !== undefined ? { 'Content-Type': 'application/json' } : {}),
    ...options.headers,
  };

  log(`[${context}] ${method} ${maskSensitiveUrl(url)}`, TMI);

  let response: Response;
  try {
    response = await fetch(url, { method, headers, body: options.body, signal: options.signal });
  } catch (error) {
    if (options.signal?.aborted) {
      throw options.signal.reason;
    }
    log(`[${context}] Network error: ${describeError(error)}`, ERR);
    throw new HttpError(0, `Failed to fetch from ${context}: ${describeError(error)}`, url, describeError(error));
  }

  log(`[${context}] Response: ${response.status} ${response.statusText}`, TMI);
  warnOnQuota(response, context);

  if (!response.ok) {
    const errorText = await response.text().catch(() => 'Unable to read error response');
    log(`[${context}] ❌ ${response.status}: ${errorText.substring(0, 200)}`, ERR);
    throw new HttpError(
      response.status,
      `${context} responded with status ${response.status}: ${response.statusText}`,
      url,
      errorText
    );
  }
  return response;
}

function warnOnQuota(response: Response, context: string): void {
  const remaining = response.headers.get('x-ratelimit-remaining') ?? response.headers.get('ratelimit-remaining');
  if (remaining !== null && parseInt(remaining, 10) < 10) {
    log(`[${context}] ⚠️ Upstream quota low (${remaining} left)`, WARN);
  }
  if (response.status === 429) {
    log(`[${context}] ⚠️ Upstream refused with 429`, WARN);
  }
}

export function maskSensitiveUrl(url: string): string {
  return SECRET_PARAMS.reduce(
    (masked, param) => masked.replace(new RegExp(`([?&])${param}=[^&]+`, 'gi'), `$1${param}=***MASKED***`),
    url
  );
}
