// Filename: services/ProviderSelectionPolicy.ts

/**
 * Provider Selection Policy
 *
 * Reorders the default provider chain for a single request from its
 * SelectionContext. Each rule moves one class of providers to the front and
 * leaves everything else in its previous relative order. Reordering never
 * drops a provider; only hard constraints (regional coverage gaps, optical
 * sensors in a storm) exclude one, and the baseline is never excluded.
 *
 * Everything here is pure and synchronous.
 */

import { HEAVY_WEATHER_CONDITIONS } from '../constants/SelectionClasses.js';
import type { WeatherCondition } from '../constants/SelectionClasses.js';
import type { BoundingBox, GeoPoint, ProviderDescriptor, SelectionContext } from '../core/types.js';
import { log, TMI } from '../utils/log.js';

const LOG_EMOJI = '🧠';

/**
 * The reordering rules, highest precedence first.
 */
export enum SelectionRule {
  /** Heavy cloud or precipitation: cloud-tolerant sources first. */
  CLOUD_TOLERANT_FIRST = 'CLOUD_TOLERANT_FIRST',
  /** Sparse ground coverage: the lowest-tier always-available source first. */
  ALWAYS_AVAILABLE_FIRST = 'ALWAYS_AVAILABLE_FIRST',
  /** High-value crop: the sharpest source first. */
  HIGHEST_RESOLUTION_FIRST = 'HIGHEST_RESOLUTION_FIRST',
  /** Rapidly changing crop: the most frequent revisit first. */
  MOST_FREQUENT_REVISIT_FIRST = 'MOST_FREQUENT_REVISIT_FIRST',
}

export interface ExcludedProvider {
  descriptor: ProviderDescriptor;
  reason: string;
}

export interface SelectionDecision {
  ordered: ProviderDescriptor[];
  excluded: ExcludedProvider[];
  /** Rules that matched, highest precedence first. */
  appliedRules: SelectionRule[];
  reasons: string[];
}

interface RuleDefinition {
  rule: SelectionRule;
  matches(context: SelectionContext): boolean;
  /** Names the providers this rule promotes, given the current order. */
  pick(order: readonly ProviderDescriptor[]): ProviderDescriptor[];
  reason(context: SelectionContext): string;
}

function isHeavyWeather(weather: WeatherCondition): boolean {
  return HEAVY_WEATHER_CONDITIONS.includes(weather);
}

const RULES: readonly RuleDefinition[] = [
  {
    rule: SelectionRule.CLOUD_TOLERANT_FIRST,
    matches: (context) => isHeavyWeather(context.weather),
    pick: (order) => order.filter((d) => d.cloudTolerant && !d.baseline),
    reason: (context) =>
      `${context.weather} conditions detected - prioritizing cloud-tolerant sources over optical imagery`,
  },
  {
    rule: SelectionRule.ALWAYS_AVAILABLE_FIRST,
    matches: (context) => context.remoteness === 'SPARSE',
    pick: (order) => {
      const lowestTier = order
        .filter((d) => d.alwaysAvailable)
        .reduce<ProviderDescriptor | undefined>(
          (worst, d) => (!worst || d.priorityRank > worst.priorityRank ? d : worst),
          undefined
        );
      return lowestTier ? [lowestTier] : [];
    },
    reason: () => 'Sparse data coverage - prioritizing the always-available reference source',
  },
  {
    rule: SelectionRule.HIGHEST_RESOLUTION_FIRST,
    matches: (context) => context.valueClass === 'HIGH_VALUE',
    pick: (order) => {
      const sharpest = order.reduce<ProviderDescriptor | undefined>(
        (best, d) =>
          !best ||
          d.nominalResolutionMeters < best.nominalResolutionMeters ||
          (d.nominalResolutionMeters === best.nominalResolutionMeters && d.priorityRank < best.priorityRank)
            ? d
            : best,
        undefined
      );
      return sharpest ? [sharpest] : [];
    },
    reason: () => 'High-value crop - prioritizing the highest-resolution source',
  },
  {
    rule: SelectionRule.MOST_FREQUENT_REVISIT_FIRST,
    matches: (context) => context.growthRate === 'RAPID',
    pick: (order) => {
      const fastest = order.reduce<ProviderDescriptor | undefined>((best, d) => {
        if (d.nominalRevisitDays === null) {
          return best;
        }
        if (!best || best.nominalRevisitDays === null) {
          return d;
        }
        return d.nominalRevisitDays < best.nominalRevisitDays ||
          (d.nominalRevisitDays === best.nominalRevisitDays && d.priorityRank < best.priorityRank)
          ? d
          : best;
      }, undefined);
      return fastest ? [fastest] : [];
    },
    reason: () => 'Rapid growth crop - prioritizing the most frequently revisiting source',
  },
];

/**
 * Moves the picked providers to the front, keeping their own relative order
 * and the relative order of everything else.
 */
export function promote(
  order: readonly ProviderDescriptor[],
  picked: readonly ProviderDescriptor[]
): ProviderDescriptor[] {
  const names = new Set(picked.map((d) => d.name));
  const front = order.filter((d) => names.has(d.name));
  const rest = order.filter((d) => !names.has(d.name));
  return [...front, ...rest];
}

function contains(box: BoundingBox, point: GeoPoint): boolean {
  return point.lat >= box.minLat && point.lat <= box.maxLat && point.lon >= box.minLon && point.lon <= box.maxLon;
}

/**
 * Returns why a provider must not be attempted for this request, or null.
 */
export function exclusionReason(
  descriptor: ProviderDescriptor,
  location: GeoPoint,
  context: SelectionContext
): string | null {
  if (descriptor.baseline) {
    return null;
  }
  if (descriptor.unavailableRegions.some((box) => contains(box, location))) {
    return `${descriptor.label} has no coverage at this location`;
  }
  if (context.weather === 'STORM' && !descriptor.cloudTolerant) {
    return `${descriptor.label} skipped due to storm conditions`;
  }
  return null;
}

/**
 * Orders the chain for one request.
 *
 * Matching rules are applied from lowest to highest precedence, so the
 * highest-precedence match ends up at the very front while the promotions of
 * lower rules still show in the order behind it.
 * @param chain - Descriptors in default order.
 */
export function selectProviderOrder(
  chain: readonly ProviderDescriptor[],
  location: GeoPoint,
  context: SelectionContext
): SelectionDecision {
  const excluded: ExcludedProvider[] = [];
  let order: ProviderDescriptor[] = [];
  for (const descriptor of chain) {
    const reason = exclusionReason(descriptor, location, context);
    if (reason) {
      excluded.push({ descriptor, reason });
    } else {
      order.push(descriptor);
    }
  }

  const matched = RULES.filter((definition) => definition.matches(context));
  for (const definition of [...matched].reverse()) {
    order = promote(order, definition.pick(order));
  }

  const decision: SelectionDecision = {
    ordered: order,
    excluded,
    appliedRules: matched.map((definition) => definition.rule),
    reasons: matched.length
      ? matched.map((definition) => definition.reason(context))
      : ['Standard conditions - using default provider priority order'],
  };

  log(
    `${LOG_EMOJI} Selection: ${decision.reasons.join('; ')} -> ${order.map((d) => d.name).join(', ')}` +
      (excluded.length ? ` (excluded: ${excluded.map((e) => e.descriptor.name).join(', ')})` : ''),
    TMI
  );

  return decision;
}

/**
 * Scales a provider's per-attempt timeout for the weather: slower in cloud or
 * rain, faster in clear sky.
 */
export function attemptTimeoutFor(descriptor: ProviderDescriptor, weather: WeatherCondition): number {
  if (isHeavyWeather(weather)) {
    return Math.round(descriptor.perAttemptTimeoutMs * 1.5);
  }
  if (weather === 'CLEAR') {
    return Math.round(descriptor.perAttemptTimeoutMs * 0.8);
  }
  return descriptor.perAttemptTimeoutMs;
}
