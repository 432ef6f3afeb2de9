/**
 * Type definitions for soil nutrient estimates
 */

import { z } from 'zod';

/**
 * Body every satellite provider endpoint answers with. Unknown fields are
 * stripped.
 */
export const NutrientEstimateSchema = z.object({
  nitrogenKgHa: z.number().nonnegative(),
  phosphorusKgHa: z.number().nonnegative(),
  potassiumKgHa: z.number().nonnegative(),
  organicCarbonPercent: z.number().nonnegative(),
  /** Mean NDVI over the field; absent for sources without optical bands. */
  ndvi: z.number().min(-1).max(1).nullable().default(null),
  /** Acquisition date of the scene the estimate came from. */
  observedOn: z.string().nullable().default(null),
});

export type NutrientEstimate = z.infer<typeof NutrientEstimateSchema>;

/**
 * One reference site of the bundled soil health table
 */
export const BaselineSiteSchema = z.object({
  id: z.string(),
  name: z.string(),
  lat: z.number().min(-90).max(90),
  lon: z.number().min(-180).max(180),
  nitrogenKgHa: z.number().nonnegative(),
  phosphorusKgHa: z.number().nonnegative(),
  potassiumKgHa: z.number().nonnegative(),
  organicCarbonPercent: z.number().nonnegative(),
});

export type BaselineSite = z.infer<typeof BaselineSiteSchema>;

const CropAdjustmentSchema = z.object({
  nitrogen: z.number().positive(),
  phosphorus: z.number().positive(),
  potassium: z.number().positive(),
});

export type CropAdjustment = z.infer<typeof CropAdjustmentSchema>;

export const BaselineTableSchema = z.object({
  searchRadiusKm: z.number().positive(),
  maxSites: z.number().int().positive(),
  regionalDefaults: z.object({
    nitrogenKgHa: z.number().nonnegative(),
    phosphorusKgHa: z.number().nonnegative(),
    potassiumKgHa: z.number().nonnegative(),
    organicCarbonPercent: z.number().nonnegative(),
  }),
  cropAdjustments: z.record(CropAdjustmentSchema),
  sites: z.array(BaselineSiteSchema),
});

export type BaselineTable = z.infer<typeof BaselineTableSchema>;

/**
 * A reference site with its distance from the requested point
 */
export interface SiteMatch {
  site: BaselineSite;
  distanceKm: number;
}
