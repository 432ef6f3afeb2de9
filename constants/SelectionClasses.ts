// Filename: constants/SelectionClasses.ts

/**
 * --- SELECTION CONTEXT CLASSES ---
 * Coarse request conditions the selection policy reorders the provider chain on.
 */
export const ALL_WEATHER_CONDITIONS = ["CLEAR", "PARTLY_CLOUDY", "CLOUDY", "RAIN", "STORM", "UNKNOWN"] as const;
export type WeatherCondition = (typeof ALL_WEATHER_CONDITIONS)[number];

/** Conditions under which optical imagery is mostly cloud. */
export const HEAVY_WEATHER_CONDITIONS: readonly WeatherCondition[] = ["CLOUDY", "RAIN", "STORM"];

export const ALL_REMOTENESS_CLASSES = ["COVERED", "SPARSE", "UNKNOWN"] as const;
export type RemotenessClass = (typeof ALL_REMOTENESS_CLASSES)[number];

export const ALL_VALUE_CLASSES = ["STANDARD", "HIGH_VALUE"] as const;
export type ValueClass = (typeof ALL_VALUE_CLASSES)[number];

export const ALL_GROWTH_RATE_CLASSES = ["STEADY", "RAPID"] as const;
export type GrowthRateClass = (typeof ALL_GROWTH_RATE_CLASSES)[number];
