/**
 * Bid Request Types
 *
 * Payload and outcome of the outbound bid request sent for a routed call.
 */

/** JSON body sent to the bidding API */
export interface BidRequestPayload {
  campaign_id: string;
  caller_id: string;
  zip_code: string;
}

export interface BidRequestParams {
  offer_id: string;
  caller_id: string;
  zip_code: string;
}

export interface BidResult {
  /** True for a 2xx response */
  ok: boolean;
  /** HTTP status (null when the request never completed) */
  status_code: number | null;
  /** Identifier extracted from the response body, if present */
  external_call_id: string | null;
  /** Parsed response body (raw text when it was not JSON) */
  body: unknown;
  /** Network or timeout failure message */
  error: string | null;
}

export type BidClient = (params: BidRequestParams) => Promise<BidResult>;
