/**
 * Call Record & Analytics Types
 *
 * A CallRecord is the audit entry for one inbound call event. It is created
 * when the request starts and recorded exactly once, after the outbound bid
 * request (if any) has finished.
 */

import { TierId } from './tiers';

export type CallStatus = 'success' | 'api_error' | 'no_tier' | 'exception';

export interface CallRecord {
  /** Unique identifier assigned when the call starts */
  call_id: string;

  /** Unix epoch milliseconds - when the call event was received */
  timestamp: number;

  caller_id: string;

  /** Normalized 5-digit ZIP, or the raw value when it could not be normalized */
  zip_code: string;

  /** Tier owning the ZIP (null = unrouted) */
  original_tier: TierId | null;

  /** Tier the call was sent to (null = unrouted) */
  chosen_tier: TierId | null;

  offer_id: string | null;

  fallback_used: boolean;
  business_hours_ok: boolean;
  rate_limit_ok: boolean;

  status: CallStatus;

  /** Wall time from request start to finalization */
  response_time_ms: number;

  /** Identifier returned by the bidding API, when it returned one */
  external_call_id: string | null;

  /** Failure detail for api_error / exception */
  error: string | null;
}

export interface AnalyticsAggregate {
  total_calls: number;
  successful_calls: number;
  /** Every status other than success, including no_tier */
  failed_calls: number;
  fallback_calls: number;
  by_status: Record<CallStatus, number>;
  /** Keyed by chosen tier; "unrouted" for calls without one */
  by_tier: Record<string, number>;
  /** Keyed by UTC hour of the call ("00"-"23") */
  by_hour: Record<string, number>;
  /** Keyed by 5-digit ZIP; "invalid" for inputs that are not one */
  by_zip: Record<string, number>;
  avg_response_time_ms: number;
  history_size: number;
  history_capacity: number;
  first_call_at: number | null;
  last_call_at: number | null;
}
