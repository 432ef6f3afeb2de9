// Filename: core/ProviderClients.ts

import type { ProviderName } from "../constants/ProviderNames.js";
import { estimateFromBaseline, loadBaselineTable, NutrientEstimateSchema } from "../features/nutrients/index.js";
import type { BaselineTable, NutrientEstimate } from "../features/nutrients/index.js";
import { log, WARN, TMI } from "../utils/log.js";
import { fetchJson, HttpError } from "../utils/httpClient.js";
import {
  ProviderError,
  ProviderInvalidResponseError,
  ProviderTimeoutError,
  ProviderUnavailableError,
} from "./errors.js";
import type { AttemptDeadline, ProviderAdapter } from "./types.js";

// Provider Clients specific emoji
const LOG_EMOJI = "🌐";

export type SatelliteProviderName = Exclude<ProviderName, "SOIL_HEALTH_BASELINE">;

/** Base URL per satellite provider; a missing entry leaves that provider unavailable. */
export type ProviderUrls = Partial<Record<SatelliteProviderName, string>>;

/** Statuses that say the upstream is down or refusing us rather than answering badly. */
const UNAVAILABLE_STATUSES = new Set([0, 401, 403, 408, 429]);

/**
 * Maps whatever a fetch threw onto a provider failure kind.
 */
export function toProviderError(provider: ProviderName, error: unknown, deadline: AttemptDeadline): ProviderError {
  if (error instanceof ProviderError) {
    return error;
  }

  if (deadline.signal.aborted) {
    return new ProviderTimeoutError(provider, deadline.timeoutMs);
  }

  if (error instanceof HttpError) {
    if (UNAVAILABLE_STATUSES.has(error.status) || error.status >= 500) {
      if (error.status === 429) {
        log(`${LOG_EMOJI} ${provider}: ⚠️ Rate limit exceeded (429). Triggering failover.`, WARN);
      }
      return new ProviderUnavailableError(provider, error.message, error.details);
    }
    return new ProviderInvalidResponseError(provider, error.message, error.details);
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ProviderUnavailableError(provider, message);
}

/**
 * Client for a satellite estimate endpoint: GET {baseUrl}?lat=&lon=&date=&...params,
 * answering with a NutrientEstimate body.
 */
export function createSatelliteAdapter(
  provider: SatelliteProviderName,
  baseUrl: string | undefined
): ProviderAdapter<NutrientEstimate> {
  return {
    async fetch(location, date, params, deadline) {
      if (!baseUrl) {
        throw new ProviderUnavailableError(provider, `No endpoint configured for ${provider}`);
      }

      const url = new URL(baseUrl);
      url.searchParams.set("lat", String(location.lat));
      url.searchParams.set("lon", String(location.lon));
      url.searchParams.set("date", date);
      for (const [key, value] of Object.entries(params)) {
        url.searchParams.set(key, String(value));
      }

      let body: unknown;
      try {
        body = await fetchJson(url.toString(), { signal: deadline.signal, context: provider });
      } catch (error) {
        throw toProviderError(provider, error, deadline);
      }

      const parsed = NutrientEstimateSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderInvalidResponseError(
          provider,
          `${provider} answered with an unexpected body`,
          parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
        );
      }
      return parsed.data;
    },
  };
}

/**
 * Client for the bundled soil health table. Answers locally; the crop type
 * arrives in params.
 */
export function createBaselineAdapter(table: BaselineTable = loadBaselineTable()): ProviderAdapter<NutrientEstimate> {
  return {
    async fetch(location, _date, params) {
      const cropType = params.cropType === undefined ? "" : String(params.cropType);
      log(`${LOG_EMOJI} Baseline Client: estimating ${location.lat},${location.lon} for ${cropType || "any crop"}`, TMI);
      return estimateFromBaseline(table, location, cropType);
    },
  };
}

/**
 * A map of all defined providers to their client.
 */
export function createProviderClients(
  urls: ProviderUrls,
  table?: BaselineTable
): Record<ProviderName, ProviderAdapter<NutrientEstimate>> {
  return {
    // Optical
    SENTINEL_2_L2A: createSatelliteAdapter("SENTINEL_2_L2A", urls.SENTINEL_2_L2A),
    LANDSAT_8_9_L2: createSatelliteAdapter("LANDSAT_8_9_L2", urls.LANDSAT_8_9_L2),
    MODIS_TERRA_AQUA: createSatelliteAdapter("MODIS_TERRA_AQUA", urls.MODIS_TERRA_AQUA),

    // Radar
    SENTINEL_1_RTC: createSatelliteAdapter("SENTINEL_1_RTC", urls.SENTINEL_1_RTC),

    // Reference table
    SOIL_HEALTH_BASELINE: createBaselineAdapter(table),
  };
}
