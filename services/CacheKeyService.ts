// Filename: services/CacheKeyService.ts

import type { GeoPoint, RequestParams } from "../core/types.js";
import { log, TMI } from "../utils/log.js";

// Key Service specific emoji
const LOG_EMOJI = "🔑";

/**
 * Everything that decides whether two requests may share one upstream answer.
 */
export interface RequestKeyParams {
  location: GeoPoint;
  /** Calendar date; anything after the day part is dropped. */
  date: string;
  cropType: string;
  params?: RequestParams;
}

// --- Key Prefixes ---
export const KEY_PREFIXES = {
  ESTIMATE: "estimate:",
};

/** ~11m at the equator; finer than any provider resolves. */
export const DEFAULT_KEY_PRECISION = 4;

// --- Private Utility ---

/**
 * Rounds a coordinate to a fixed number of decimals and renders it without a
 * negative zero, so -0.00001 and 0.00001 share a key.
 */
function roundCoordinate(value: number, precision: number): string {
  const factor = 10 ** precision;
  const rounded = Math.round(value * factor) / factor;
  return (rounded === 0 ? 0 : rounded).toFixed(precision);
}

/**
 * Converts a parameters object into a sorted, deterministic string.
 * Keys are lower-cased before sorting, so neither key order nor key case
 * changes the result; string values are trimmed and upper-cased. Identical
 * parts collapse into one.
 */
function getSortedParamString(params: RequestParams): string {
  const parts = Object.entries(params).map(([key, value]) => {
    const normalized = typeof value === "string" ? value.trim().toUpperCase() : String(value);
    return `${key.trim().toLowerCase()}_${normalized}`;
  });
  return [...new Set(parts)].sort().join("&");
}

// --- Public Key Generation ---

/**
 * Builds the cache key for an estimate request.
 * @param params - Location, date and domain parameters of the request.
 * @param precision - Decimal places kept on latitude and longitude.
 */
export function getRequestCacheKey(
  params: RequestKeyParams,
  precision: number = DEFAULT_KEY_PRECISION
): string {
  const { location, date, cropType } = params;
  const lat = roundCoordinate(location.lat, precision);
  const lon = roundCoordinate(location.lon, precision);
  const day = date.trim().slice(0, 10);

  const sortedParams = getSortedParamString({ ...(params.params ?? {}), crop: cropType });

  const key = `${KEY_PREFIXES.ESTIMATE}${lat},${lon}:${day}:${sortedParams}`;
  log(`${LOG_EMOJI} Key Service: Request key -> ${key}`, TMI);
  return key;
}
