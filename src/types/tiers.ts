/**
 * Tier Types
 *
 * A tier is a priced routing destination: an offer on the bidding API with
 * its own business-hours window, hourly call cap and fallback target.
 */

export const TIER_IDS = ['tier_1', 'tier_2', 'tier_3'] as const;

export type TierId = (typeof TIER_IDS)[number];

export interface BusinessHours {
  /** First open hour, local time (0-23) */
  start_hour: number;
  /** Hour at which the window closes, local time (exclusive, 1-24) */
  end_hour: number;
  /** IANA timezone the window is expressed in (e.g., "US/Eastern") */
  timezone: string;
}

export interface TierConfig {
  tier_id: TierId;
  /** Offer identifier on the bidding API */
  offer_id: string;
  business_hours: BusinessHours;
  /** Maximum accepted calls per clock hour */
  max_calls_per_hour: number;
  /** Tier tried next when this one is closed or at capacity (null = end of chain) */
  fallback_tier: TierId | null;
}

export function isTierId(value: string): value is TierId {
  return (TIER_IDS as readonly string[]).includes(value);
}
