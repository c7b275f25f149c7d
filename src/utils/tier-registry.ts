/**
 * Tier Registry
 *
 * Read-only set of tier configurations, validated once at construction.
 * Registry order is the tier priority used to settle ZIP conflicts.
 */

import { ConfigurationError } from './errors';
import { TierConfig, TierId, TIER_IDS } from '../types/tiers';

/**
 * Collect every semantic problem in a tier configuration set.
 * Returns an empty list when the set is valid.
 */
export function validateTierConfigs(configs: TierConfig[]): string[] {
  const issues: string[] = [];
  const byId = new Map<TierId, TierConfig>();

  for (const config of configs) {
    if (byId.has(config.tier_id)) {
      issues.push(`${config.tier_id}: configured more than once`);
      continue;
    }
    byId.set(config.tier_id, config);
  }

  for (const config of byId.values()) {
    const { tier_id, business_hours: hours } = config;

    if (!config.offer_id.trim()) {
      issues.push(`${tier_id}: offer_id is empty`);
    }
    if (!Number.isInteger(config.max_calls_per_hour) || config.max_calls_per_hour < 1) {
      issues.push(`${tier_id}: max_calls_per_hour must be a positive integer`);
    }
    if (!Number.isInteger(hours.start_hour) || hours.start_hour < 0 || hours.start_hour > 23) {
      issues.push(`${tier_id}: start_hour must be an integer 0-23`);
    }
    if (!Number.isInteger(hours.end_hour) || hours.end_hour < 1 || hours.end_hour > 24) {
      issues.push(`${tier_id}: end_hour must be an integer 1-24`);
    }
    // Windows never span midnight
    if (hours.start_hour >= hours.end_hour) {
      issues.push(
        `${tier_id}: business hours ${hours.start_hour}-${hours.end_hour} are inverted or empty`
      );
    }
    if (!hours.timezone.trim()) {
      issues.push(`${tier_id}: timezone is empty`);
    }
    if (config.fallback_tier !== null && !byId.has(config.fallback_tier)) {
      issues.push(`${tier_id}: fallback_tier ${config.fallback_tier} is not configured`);
    }
  }

  // Follow each chain; revisiting a tier means a cycle
  for (const start of byId.keys()) {
    const seen: TierId[] = [start];
    let next = byId.get(start)?.fallback_tier ?? null;

    while (next !== null) {
      if (seen.includes(next)) {
        issues.push(`${start}: fallback chain loops (${[...seen, next].join(' -> ')})`);
        break;
      }
      seen.push(next);
      next = byId.get(next)?.fallback_tier ?? null;
    }
  }

  return issues;
}

export class TierRegistry {
  private readonly tiers: Map<TierId, TierConfig>;

  /**
   * @throws ConfigurationError when any tier fails validation
   */
  constructor(configs: TierConfig[]) {
    const issues = validateTierConfigs(configs);
    if (issues.length > 0) {
      throw new ConfigurationError(issues);
    }

    // Canonical order, independent of the order configs were supplied in
    const ordered = [...configs].sort(
      (a, b) => TIER_IDS.indexOf(a.tier_id) - TIER_IDS.indexOf(b.tier_id)
    );

    this.tiers = new Map(
      ordered.map((config) => [
        config.tier_id,
        Object.freeze({ ...config, business_hours: Object.freeze({ ...config.business_hours }) }),
      ])
    );
  }

  get(tierId: TierId): TierConfig {
    const config = this.tiers.get(tierId);
    if (!config) {
      throw new Error(`Unknown tier: ${tierId}`);
    }
    return config;
  }

  /** Configured tiers in priority order */
  list(): TierConfig[] {
    return Array.from(this.tiers.values());
  }

  /** Configured tier ids in priority order */
  priority(): TierId[] {
    return Array.from(this.tiers.keys());
  }

  /**
   * Tiers visited when routing to `tierId`, starting with `tierId` itself.
   */
  fallbackChain(tierId: TierId): TierId[] {
    const chain: TierId[] = [];
    let current: TierId | null = tierId;

    while (current !== null) {
      chain.push(current);
      current = this.get(current).fallback_tier;
    }

    return chain;
  }
}
