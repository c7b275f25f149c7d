/**
 * Routing Decision Types
 */

import { TierId } from './tiers';

/** Gate results for one tier visited while walking the fallback chain */
export interface TierAttempt {
  tier: TierId;
  business_hours_ok: boolean;
  rate_limit_ok: boolean;
}

export interface FallbackResolution {
  chosen_tier: TierId;
  /** True only when a tier other than the original was selected by its gates */
  fallback_used: boolean;
  attempts: TierAttempt[];
}

export interface RoutingDecision {
  routed: true;
  zip_code: string;
  original_tier: TierId;
  chosen_tier: TierId;
  /** Offer of the chosen tier */
  offer_id: string;
  fallback_used: boolean;
  /** Business-hours gate result of the original tier */
  business_hours_ok: boolean;
  /** Rate-limit probe result of the original tier */
  rate_limit_ok: boolean;
  attempts: TierAttempt[];
}

export type UnroutedReason = 'zip_not_found' | 'invalid_zip';

export interface Unrouted {
  routed: false;
  reason: UnroutedReason;
  zip_code: string;
}

export type RouteResult = RoutingDecision | Unrouted;

/** Rate limit commit result */
export interface RateLimitResult {
  allowed: boolean;
  limit: number;
  /** Count in the current hour bucket after this call */
  count: number;
  remaining: number;
  reset_in_seconds: number;
}
