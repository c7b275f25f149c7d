/**
 * Bid Request Client
 *
 * Sends the outbound bid request for a routed call:
 *
 *   POST {api_base}/affiliate/offers/{offer_id}/bid-requests
 *   X-Api-Key: {api_key}
 *   { campaign_id, caller_id, zip_code }
 *
 * Never throws. A non-2xx response comes back with ok = false and the status
 * code; a network failure or timeout comes back with status_code = null and
 * the error message. The caller decides what to record.
 */

import { BidClient, BidRequestPayload, BidResult } from '../types/bidding';
import { errorMessage } from './errors';

export interface BidClientOptions {
  apiBase: string;
  apiKey: string;
  campaignId: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

const ID_FIELDS = ['id', 'bid_id', 'call_id', 'request_id'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Pull an identifier out of a bid response body ({ id }, { data: { id } }, ...)
 */
export function extractExternalCallId(body: unknown): string | null {
  if (!isRecord(body)) {
    return null;
  }

  for (const field of ID_FIELDS) {
    const value = body[field];
    if (typeof value === 'string' && value.length > 0) return value;
    if (typeof value === 'number') return String(value);
  }

  return isRecord(body.data) ? extractExternalCallId(body.data) : null;
}

async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    // Not JSON; keep the raw text for the record
    return text;
  }
}

export function createBidClient(options: BidClientOptions): BidClient {
  const doFetch = options.fetch ?? fetch;
  const base = options.apiBase.replace(/\/+$/, '');

  return async ({ offer_id, caller_id, zip_code }): Promise<BidResult> => {
    const payload: BidRequestPayload = {
      campaign_id: options.campaignId,
      caller_id,
      zip_code,
    };

    try {
      const response = await doFetch(
        `${base}/affiliate/offers/${encodeURIComponent(offer_id)}/bid-requests`,
        {
          method: 'POST',
          headers: {
            'X-Api-Key': options.apiKey,
            'Content-Type': 'application/json; charset=utf-8',
          },
          body: JSON.stringify(payload),
          signal: AbortSignal.timeout(options.timeoutMs),
        }
      );

      const body = await readBody(response);

      return {
        ok: response.ok,
        status_code: response.status,
        external_call_id: response.ok ? extractExternalCallId(body) : null,
        body,
        error: response.ok ? null : `Bid API responded ${response.status}`,
      };
    } catch (error) {
      return {
        ok: false,
        status_code: null,
        external_call_id: null,
        body: null,
        error: errorMessage(error),
      };
    }
  };
}
