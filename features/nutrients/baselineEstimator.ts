/**
 * Soil Health Baseline
 *
 * Village-level nutrient estimates from the bundled reference site table.
 * An inverse-distance weighted average of the nearest sites, adjusted for
 * the crop where the table lists one. Always answers: a point with no site
 * in range gets the regional defaults.
 */

import { readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { ConfigurationError } from '../../core/errors.js';
import type { GeoPoint } from '../../core/types.js';
import { haversineKm } from '../../utils/geo.js';
import { log, LOG, TMI } from '../../utils/log.js';
import { BaselineTableSchema } from './types.js';
import type { BaselineTable, NutrientEstimate, SiteMatch } from './types.js';

const LOG_EMOJI = '🌾';

// This file is in features/nutrients/, so project root is two levels up
const __dirname = dirname(fileURLToPath(import.meta.url));
export const DEFAULT_BASELINE_TABLE_PATH = join(__dirname, '..', '..', 'data', 'baselineSites.json');

/** Sites closer than this weigh as if they were this far. */
const MIN_WEIGHT_DISTANCE_KM = 0.1;

let defaultTable: BaselineTable | undefined;

/**
 * Reads and validates a baseline table. The bundled table is read once.
 * @throws ConfigurationError when the file is missing or malformed.
 */
export function loadBaselineTable(path: string = DEFAULT_BASELINE_TABLE_PATH): BaselineTable {
  if (path === DEFAULT_BASELINE_TABLE_PATH && defaultTable) {
    return defaultTable;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Cannot read baseline table at ${path}`, message);
  }

  const parsed = BaselineTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid baseline table at ${path}`, parsed.error.message);
  }

  log(`${LOG_EMOJI} Loaded ${parsed.data.sites.length} baseline reference sites`, LOG);
  if (path === DEFAULT_BASELINE_TABLE_PATH) {
    defaultTable = parsed.data;
  }
  return parsed.data;
}

/**
 * Sites within the table's search radius, nearest first, at most maxSites.
 */
export function findNearestSites(table: BaselineTable, point: GeoPoint): SiteMatch[] {
  return table.sites
    .map((site) => ({ site, distanceKm: haversineKm(point, site) }))
    .filter((match) => match.distanceKm <= table.searchRadiusKm)
    .sort((a, b) => a.distanceKm - b.distanceKm)
    .slice(0, table.maxSites);
}

/**
 * Distance to the closest site in the whole table, or null for an empty table.
 */
export function nearestSiteDistanceKm(table: BaselineTable, point: GeoPoint): number | null {
  let nearest: number | null = null;
  for (const site of table.sites) {
    const distance = haversineKm(point, site);
    if (nearest === null || distance < nearest) {
      nearest = distance;
    }
  }
  return nearest;
}

const round = (value: number, places: number): number => {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
};

/**
 * NDVI implied by soil fertility, for parity with the satellite estimates.
 */
export function ndviFromSoil(nitrogenKgHa: number, organicCarbonPercent: number): number {
  const estimate = (nitrogenKgHa / 300) * 0.6 + (organicCarbonPercent / 2) * 0.4;
  return round(Math.min(0.8, Math.max(0.1, estimate)), 4);
}

export function estimateFromBaseline(table: BaselineTable, point: GeoPoint, cropType: string): NutrientEstimate {
  const matches = findNearestSites(table, point);

  let nitrogen = table.regionalDefaults.nitrogenKgHa;
  let phosphorus = table.regionalDefaults.phosphorusKgHa;
  let potassium = table.regionalDefaults.potassiumKgHa;
  let organicCarbon = table.regionalDefaults.organicCarbonPercent;

  if (matches.length > 0) {
    const weights = matches.map((m) => 1 / Math.max(m.distanceKm, MIN_WEIGHT_DISTANCE_KM));
    const total = weights.reduce((sum, w) => sum + w, 0);
    const weighted = (pick: (m: SiteMatch) => number): number =>
      matches.reduce((sum, m, i) => sum + pick(m) * (weights[i] / total), 0);

    nitrogen = weighted((m) => m.site.nitrogenKgHa);
    phosphorus = weighted((m) => m.site.phosphorusKgHa);
    potassium = weighted((m) => m.site.potassiumKgHa);
    organicCarbon = weighted((m) => m.site.organicCarbonPercent);
  } else {
    log(`${LOG_EMOJI} No reference site within ${table.searchRadiusKm}km, using regional defaults`, TMI);
  }

  const adjustment = table.cropAdjustments[cropType.trim().toUpperCase()];
  if (adjustment) {
    nitrogen *= adjustment.nitrogen;
    phosphorus *= adjustment.phosphorus;
    potassium *= adjustment.potassium;
  }

  return {
    nitrogenKgHa: round(nitrogen, 2),
    phosphorusKgHa: round(phosphorus, 2),
    potassiumKgHa: round(potassium, 2),
    organicCarbonPercent: round(organicCarbon, 3),
    ndvi: ndviFromSoil(nitrogen, organicCarbon),
    observedOn: null,
  };
}
