// Filename: constants/ProviderNames.ts

/**
 * --- PROVIDERS ---
 * Every data source the estimate chain can consult, in default priority order.
 */
export const ALL_PROVIDER_NAMES = [
  "SENTINEL_2_L2A", // Optical, 10m, 5-day revisit.
  "LANDSAT_8_9_L2", // Optical, 30m, 16-day revisit.
  "MODIS_TERRA_AQUA", // Optical, 250m, daily revisit.
  "SENTINEL_1_RTC", // Radar, sees through cloud.
  "SOIL_HEALTH_BASELINE", // Offline reference table. Always answers.
] as const;

export type ProviderName = (typeof ALL_PROVIDER_NAMES)[number];
