/**
 * Routing Engine
 *
 * ZIP lookup → fallback resolution → routing decision.
 *
 * All mutable routing state (ZIP snapshot, rate counters, call history) lives
 * in one RoutingEngineState created by the service and passed to whatever
 * needs it. Nothing here performs I/O; the outbound bid request and the data
 * download are collaborators.
 */

import { Logger } from 'pino';
import { BusinessHoursGate } from './business-hours';
import { FallbackResolver } from './fallback';
import { OutcomeRecorder } from './outcomes';
import { RateLimiter } from './ratelimit';
import { TierRegistry } from './tier-registry';
import { ZipIndexStore, normalizeZip } from './zip-index';
import { RouteResult } from '../types/routing';

export interface RoutingEngineState {
  registry: TierRegistry;
  zips: ZipIndexStore;
  limiter: RateLimiter;
  gate: BusinessHoursGate;
  resolver: FallbackResolver;
  recorder: OutcomeRecorder;
  log: Logger;
}

export interface RoutingEngineOptions {
  registry: TierRegistry;
  logger: Logger;
  historyCapacity?: number;
  /** Millisecond clock for call timing */
  clock?: () => number;
}

export function createRoutingEngineState(options: RoutingEngineOptions): RoutingEngineState {
  const { registry, logger } = options;
  const log = logger.child({ component: 'routing' });

  const gate = new BusinessHoursGate(registry, log);
  const limiter = new RateLimiter(registry);

  return {
    registry,
    zips: new ZipIndexStore(registry.priority(), log),
    limiter,
    gate,
    resolver: new FallbackResolver(registry, gate, limiter),
    recorder: new OutcomeRecorder(log, {
      capacity: options.historyCapacity,
      clock: options.clock,
    }),
    log,
  };
}

/**
 * Route one call.
 *
 * Returns Unrouted (not an error) when the ZIP is malformed or no tier owns it.
 * A routed decision has already committed one call against the chosen tier's
 * hourly counter.
 */
export function routeCall(
  state: RoutingEngineState,
  zip: string | number,
  callerId: string,
  now: Date
): RouteResult {
  const zipCode = normalizeZip(zip);
  if (zipCode === null) {
    state.log.info({ caller_id: callerId, zip_code: String(zip) }, 'Malformed ZIP, call not routed');
    return { routed: false, reason: 'invalid_zip', zip_code: String(zip) };
  }

  const originalTier = state.zips.lookup(zipCode);
  if (originalTier === null) {
    state.log.info({ caller_id: callerId, zip_code: zipCode }, 'ZIP not in any tier');
    return { routed: false, reason: 'zip_not_found', zip_code: zipCode };
  }

  const resolution = state.resolver.resolve(originalTier, now);
  const originalAttempt = resolution.attempts[0];
  const chosen = state.registry.get(resolution.chosen_tier);

  state.log.info(
    {
      caller_id: callerId,
      zip_code: zipCode,
      original_tier: originalTier,
      chosen_tier: chosen.tier_id,
      fallback_used: resolution.fallback_used,
    },
    'Call routed'
  );

  return {
    routed: true,
    zip_code: zipCode,
    original_tier: originalTier,
    chosen_tier: chosen.tier_id,
    offer_id: chosen.offer_id,
    fallback_used: resolution.fallback_used,
    business_hours_ok: originalAttempt.business_hours_ok,
    rate_limit_ok: originalAttempt.rate_limit_ok,
    attempts: resolution.attempts,
  };
}
