/**
 * Call Event Handler
 *
 * Full lifecycle of one inbound call event:
 *
 * 1. Start a pending call record
 * 2. Route the ZIP (lookup → fallback resolution)
 * 3. Unrouted → record no_tier, no bid request sent
 * 4. Routed → send the bid request for the chosen offer
 * 5. Record success / api_error / exception
 *
 * The routing decision is final before the bid request goes out: a failed
 * bid is recorded, never retried or re-routed. Every path records the call
 * exactly once, including unexpected exceptions (which are then rethrown).
 */

import { errorMessage } from './errors';
import { routeCall, RoutingEngineState } from './routing';
import { BidClient, BidResult } from '../types/bidding';
import { CallRecord } from '../types/calls';
import { RoutingDecision } from '../types/routing';

export const UNROUTED_STATUS = 'ZIP code not in any tier — no ping sent';

export interface CallEventInput {
  caller_id: string;
  zip_code: string | number;
}

export interface CallEventResult {
  call_id: string;
  /** Human-readable summary, as returned to the webhook caller */
  status: string;
  decision?: RoutingDecision;
  bid?: BidResult;
  record: CallRecord | null;
}

export function describeDecision(decision: RoutingDecision): string {
  return `ZIP matched ${decision.chosen_tier.toUpperCase()} → Offer ${decision.offer_id}`;
}

export async function handleCallEvent(
  state: RoutingEngineState,
  bid: BidClient,
  input: CallEventInput,
  now: Date = new Date()
): Promise<CallEventResult> {
  const pending = state.recorder.begin({
    caller_id: input.caller_id,
    zip_code: String(input.zip_code),
    now: now.getTime(),
  });

  let decision: RoutingDecision | undefined;

  try {
    const route = routeCall(state, input.zip_code, input.caller_id, now);

    if (!route.routed) {
      const record = pending.complete({ status: 'no_tier', zip_code: route.zip_code });
      return { call_id: pending.call_id, status: UNROUTED_STATUS, record };
    }

    decision = route;

    const result = await bid({
      offer_id: decision.offer_id,
      caller_id: input.caller_id,
      zip_code: decision.zip_code,
    });

    const status = result.ok ? 'success' : result.status_code === null ? 'exception' : 'api_error';
    if (!result.ok) {
      state.log.warn(
        { call_id: pending.call_id, offer_id: decision.offer_id, status, err: result.error },
        'Bid request failed'
      );
    }

    const record = pending.complete({
      status,
      zip_code: decision.zip_code,
      original_tier: decision.original_tier,
      chosen_tier: decision.chosen_tier,
      offer_id: decision.offer_id,
      fallback_used: decision.fallback_used,
      business_hours_ok: decision.business_hours_ok,
      rate_limit_ok: decision.rate_limit_ok,
      external_call_id: result.external_call_id,
      error: result.error,
    });

    return {
      call_id: pending.call_id,
      status: describeDecision(decision),
      decision,
      bid: result,
      record,
    };
  } catch (error) {
    if (!pending.isCompleted) {
      pending.complete({
        status: 'exception',
        zip_code: decision?.zip_code,
        original_tier: decision?.original_tier,
        chosen_tier: decision?.chosen_tier,
        offer_id: decision?.offer_id,
        fallback_used: decision?.fallback_used,
        business_hours_ok: decision?.business_hours_ok,
        rate_limit_ok: decision?.rate_limit_ok,
        error: errorMessage(error),
      });
    }
    throw error;
  }
}
