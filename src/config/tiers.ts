/**
 * Tier Catalog
 *
 * Default routing tiers. Offer ids can be overridden per tier through the
 * environment; a complete catalog can be supplied as a JSON file through
 * TIERS_CONFIG_PATH.
 */

import { readFileSync } from 'fs';
import { Value } from '@sinclair/typebox/value';
import { TierConfigListSchema } from '../api/schemas';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { TierRegistry } from '../utils/tier-registry';
import { TierConfig } from '../types/tiers';

const TIERS_CONFIG_PATH = process.env.TIERS_CONFIG_PATH || '';

export const TIER_CATALOG: TierConfig[] = [
  {
    tier_id: 'tier_1',
    offer_id: process.env.TIER_1_OFFER_ID || '11558',
    business_hours: { start_hour: 9, end_hour: 21, timezone: 'US/Eastern' },
    max_calls_per_hour: 100,
    fallback_tier: 'tier_2',
  },
  {
    tier_id: 'tier_2',
    offer_id: process.env.TIER_2_OFFER_ID || '22222',
    business_hours: { start_hour: 8, end_hour: 22, timezone: 'US/Eastern' },
    max_calls_per_hour: 200,
    fallback_tier: 'tier_3',
  },
  {
    tier_id: 'tier_3',
    offer_id: process.env.TIER_3_OFFER_ID || '33333',
    business_hours: { start_hour: 0, end_hour: 24, timezone: 'US/Eastern' },
    max_calls_per_hour: 500,
    fallback_tier: null,
  },
];

/**
 * Parse and validate a tier catalog from JSON text.
 *
 * @throws ConfigurationError on malformed JSON, schema violations or
 *         semantic problems (inverted hours, fallback cycles)
 */
export function parseTierCatalog(json: string): TierConfig[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new ConfigurationError([`not valid JSON: ${errorMessage(error)}`]);
  }

  if (!Value.Check(TierConfigListSchema, parsed)) {
    const issues = [...Value.Errors(TierConfigListSchema, parsed)].map(
      (e) => `${e.path || '/'}: ${e.message}`
    );
    throw new ConfigurationError(issues);
  }

  return parsed;
}

/**
 * Build the registry the service starts with.
 * Reads TIERS_CONFIG_PATH when set, otherwise uses TIER_CATALOG.
 */
export function loadTierRegistry(path: string = TIERS_CONFIG_PATH): TierRegistry {
  if (!path) {
    return new TierRegistry(TIER_CATALOG);
  }

  let json: string;
  try {
    json = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigurationError([`cannot read ${path}: ${errorMessage(error)}`]);
  }

  return new TierRegistry(parseTierCatalog(json));
}
