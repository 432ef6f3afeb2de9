// Filename: core/serviceInstance.ts

import { loadLocalEnv, loadRuntimeConfig } from '../config/configRuntime.js';
import type { NutrientEstimate } from '../features/nutrients/index.js';
import { createNutrientEstimateService } from './FieldEstimateService.js';
import type { FieldEstimateService } from './FieldEstimateService.js';

let instance: FieldEstimateService<NutrientEstimate> | undefined;

/**
 * Process-wide estimate service, built from the environment on first use.
 * Cache, limiter and statistics live as long as the process does.
 * @throws ConfigurationError when the environment is invalid.
 */
export function getEstimateService(): FieldEstimateService<NutrientEstimate> {
  if (!instance) {
    loadLocalEnv();
    instance = createNutrientEstimateService(loadRuntimeConfig());
  }
  return instance;
}
