// Filename: constants/CropClasses.ts

/**
 * --- CROP CLASSES ---
 * Crop keywords matched (as substrings, upper case) against a request's crop type.
 */
export const HIGH_VALUE_CROPS = ["RICE", "WHEAT", "CORN", "VEGETABLES", "FRUITS"] as const;

export const RAPID_GROWTH_CROPS = [
  "LETTUCE",
  "SPINACH",
  "RADISH",
  "CUCUMBER",
  "TOMATO",
  "PEPPER",
  "HERBS",
  "MICROGREENS",
] as const;
