// Filename: services/SelectionContextService.ts

import { HIGH_VALUE_CROPS, RAPID_GROWTH_CROPS } from "../constants/CropClasses.js";
import type { EstimateRequest, SelectionContext } from "../core/types.js";
import { nearestSiteDistanceKm } from "../features/nutrients/index.js";
import type { BaselineTable } from "../features/nutrients/index.js";
import { log, TMI } from "../utils/log.js";

const LOG_EMOJI = "🧭";

/** Further than this from every reference site counts as sparse coverage. */
export const REMOTE_DISTANCE_KM = 25;

function matchesAny(cropType: string, keywords: readonly string[]): boolean {
  const normalized = cropType.trim().toUpperCase();
  return normalized.length > 0 && keywords.some((keyword) => normalized.includes(keyword));
}

/**
 * Derives the coarse conditions the selection policy works from. Fields the
 * caller supplied on the request win over derived ones.
 */
export class SelectionContextService {
  public static deriveSelectionContext(request: EstimateRequest, table: BaselineTable): SelectionContext {
    const distanceKm = nearestSiteDistanceKm(table, request.location);

    const derived: SelectionContext = {
      weather: "UNKNOWN",
      remoteness: distanceKm === null ? "UNKNOWN" : distanceKm > REMOTE_DISTANCE_KM ? "SPARSE" : "COVERED",
      valueClass: matchesAny(request.cropType, HIGH_VALUE_CROPS) ? "HIGH_VALUE" : "STANDARD",
      growthRate: matchesAny(request.cropType, RAPID_GROWTH_CROPS) ? "RAPID" : "STEADY",
    };

    const context: SelectionContext = { ...derived, ...request.context };
    log(
      `${LOG_EMOJI} Context for ${request.cropType}: ${context.weather}/${context.remoteness}/${context.valueClass}/${context.growthRate}` +
        (distanceKm === null ? "" : ` (nearest site ${distanceKm.toFixed(1)}km)`),
      TMI
    );
    return context;
  }

  /** Binds a resolver to one reference table, for the orchestrator. */
  public static resolverFor(table: BaselineTable): (request: EstimateRequest) => SelectionContext {
    return (request) => SelectionContextService.deriveSelectionContext(request, table);
  }
}
