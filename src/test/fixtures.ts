import pino from 'pino';
import { TierConfig, TierId } from '../types/tiers';

export const silentLogger = pino({ level: 'silent' });

/** Eastern-time instant on 2026-10-19 (EDT, UTC-4) */
export function easternTime(hour: number, minute = 0): Date {
  return new Date(Date.UTC(2026, 9, 19, hour + 4, minute));
}

export function tierConfig(tierId: TierId, overrides: Partial<TierConfig> = {}): TierConfig {
  return {
    tier_id: tierId,
    offer_id: `offer-${tierId}`,
    business_hours: { start_hour: 9, end_hour: 21, timezone: 'US/Eastern' },
    max_calls_per_hour: 100,
    fallback_tier: null,
    ...overrides,
  };
}

/** tier_1 (9-21) → tier_2 (0-24) → tier_3 (0-24), caps 100/200/500 */
export function standardTiers(): TierConfig[] {
  return [
    tierConfig('tier_1', { fallback_tier: 'tier_2' }),
    tierConfig('tier_2', {
      business_hours: { start_hour: 0, end_hour: 24, timezone: 'US/Eastern' },
      max_calls_per_hour: 200,
      fallback_tier: 'tier_3',
    }),
    tierConfig('tier_3', {
      business_hours: { start_hour: 0, end_hour: 24, timezone: 'US/Eastern' },
      max_calls_per_hour: 500,
    }),
  ];
}
