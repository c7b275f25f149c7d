/**
 * Bidding API Configuration
 */

export const BID_API_BASE = process.env.BID_API_BASE || 'https://www.marketcall.com/api/v1';

/** Sent as X-Api-Key on every bid request */
export const BID_API_KEY = process.env.BID_API_KEY || '';

export const BID_CAMPAIGN_ID = process.env.BID_CAMPAIGN_ID || '323747';

/** Abort the bid request after this many milliseconds */
export const BID_TIMEOUT_MS = parseInt(process.env.BID_TIMEOUT_MS || '10000', 10);
