/**
 * Fallback Resolver
 *
 * Picks the tier a call is actually sent to.
 *
 * Starting at the original tier, each tier in its fallback chain is tested
 * with the business-hours gate and a rate-limit probe. The first tier that
 * passes both is selected and its counter committed.
 *
 * If every tier in the chain fails, the original tier is selected anyway and
 * its counter committed, with fallback_used = false. Gate failures are
 * advisory: once a tier owns the ZIP the call is always sent somewhere.
 */

import { BusinessHoursGate } from './business-hours';
import { RateLimiter } from './ratelimit';
import { TierRegistry } from './tier-registry';
import { FallbackResolution, TierAttempt } from '../types/routing';
import { TierId } from '../types/tiers';

export class FallbackResolver {
  constructor(
    private readonly registry: TierRegistry,
    private readonly gate: BusinessHoursGate,
    private readonly limiter: RateLimiter
  ) {}

  resolve(originalTier: TierId, now: Date): FallbackResolution {
    const attempts: TierAttempt[] = [];

    // Chains are validated acyclic, so this visits each tier at most once
    for (const tier of this.registry.fallbackChain(originalTier)) {
      const attempt: TierAttempt = {
        tier,
        business_hours_ok: this.gate.isOpen(tier, now),
        rate_limit_ok: this.limiter.checkOk(tier, now),
      };
      attempts.push(attempt);

      if (attempt.business_hours_ok && attempt.rate_limit_ok) {
        this.limiter.recordAndCheck(tier, now);
        return {
          chosen_tier: tier,
          fallback_used: tier !== originalTier,
          attempts,
        };
      }
    }

    // Chain exhausted: last-resort override to the original tier
    this.limiter.recordAndCheck(originalTier, now);
    return {
      chosen_tier: originalTier,
      fallback_used: false,
      attempts,
    };
  }
}
