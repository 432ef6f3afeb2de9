/**
 * Soil Nutrients
 *
 * Estimate shape shared by every provider, and the reference-site baseline.
 */

export {
  loadBaselineTable,
  findNearestSites,
  nearestSiteDistanceKm,
  estimateFromBaseline,
  ndviFromSoil,
  DEFAULT_BASELINE_TABLE_PATH,
} from './baselineEstimator.js';

export { NutrientEstimateSchema, BaselineTableSchema, BaselineSiteSchema } from './types.js';

export type { NutrientEstimate, BaselineSite, BaselineTable, CropAdjustment, SiteMatch } from './types.js';
