import { describe, it, expect } from 'vitest';
import { TierRegistry, validateTierConfigs } from './tier-registry';
import { ConfigurationError } from './errors';
import { standardTiers, tierConfig } from '../test/fixtures';

describe('validateTierConfigs', () => {
  it('accepts a valid chain', () => {
    expect(validateTierConfigs(standardTiers())).toEqual([]);
  });

  it('rejects an inverted business-hours window', () => {
    const issues = validateTierConfigs([
      tierConfig('tier_1', { business_hours: { start_hour: 21, end_hour: 9, timezone: 'US/Eastern' } }),
    ]);
    expect(issues).toEqual(['tier_1: business hours 21-9 are inverted or empty']);
  });

  it('rejects an empty business-hours window', () => {
    const issues = validateTierConfigs([
      tierConfig('tier_1', { business_hours: { start_hour: 9, end_hour: 9, timezone: 'US/Eastern' } }),
    ]);
    expect(issues).toEqual(['tier_1: business hours 9-9 are inverted or empty']);
  });

  it('rejects a non-positive hourly cap', () => {
    const issues = validateTierConfigs([tierConfig('tier_1', { max_calls_per_hour: 0 })]);
    expect(issues).toEqual(['tier_1: max_calls_per_hour must be a positive integer']);
  });

  it('rejects a fallback to an unconfigured tier', () => {
    const issues = validateTierConfigs([tierConfig('tier_1', { fallback_tier: 'tier_3' })]);
    expect(issues).toEqual(['tier_1: fallback_tier tier_3 is not configured']);
  });

  it('rejects a tier that falls back to itself', () => {
    const issues = validateTierConfigs([tierConfig('tier_1', { fallback_tier: 'tier_1' })]);
    expect(issues).toEqual(['tier_1: fallback chain loops (tier_1 -> tier_1)']);
  });

  it('rejects a fallback cycle through several tiers', () => {
    const issues = validateTierConfigs([
      tierConfig('tier_1', { fallback_tier: 'tier_2' }),
      tierConfig('tier_2', { fallback_tier: 'tier_1' }),
    ]);
    expect(issues).toEqual([
      'tier_1: fallback chain loops (tier_1 -> tier_2 -> tier_1)',
      'tier_2: fallback chain loops (tier_2 -> tier_1 -> tier_2)',
    ]);
  });

  it('rejects duplicate tier ids', () => {
    const issues = validateTierConfigs([tierConfig('tier_1'), tierConfig('tier_1')]);
    expect(issues).toEqual(['tier_1: configured more than once']);
  });
});

describe('TierRegistry', () => {
  it('throws ConfigurationError listing every issue', () => {
    const build = () =>
      new TierRegistry([
        tierConfig('tier_1', {
          offer_id: ' ',
          business_hours: { start_hour: 22, end_hour: 6, timezone: 'US/Eastern' },
        }),
      ]);

    expect(build).toThrow(ConfigurationError);
    expect(build).toThrow(
      'Invalid tier configuration: tier_1: offer_id is empty; tier_1: business hours 22-6 are inverted or empty'
    );
  });

  it('orders tiers by priority regardless of input order', () => {
    const registry = new TierRegistry([tierConfig('tier_3'), tierConfig('tier_1')]);
    expect(registry.priority()).toEqual(['tier_1', 'tier_3']);
    expect(registry.list().map((t) => t.tier_id)).toEqual(['tier_1', 'tier_3']);
  });

  it('walks the fallback chain from a tier', () => {
    const registry = new TierRegistry(standardTiers());
    expect(registry.fallbackChain('tier_1')).toEqual(['tier_1', 'tier_2', 'tier_3']);
    expect(registry.fallbackChain('tier_2')).toEqual(['tier_2', 'tier_3']);
    expect(registry.fallbackChain('tier_3')).toEqual(['tier_3']);
  });

  it('does not share state with the configs it was built from', () => {
    const configs = standardTiers();
    const registry = new TierRegistry(configs);

    configs[0].max_calls_per_hour = 1;

    expect(registry.get('tier_1').max_calls_per_hour).toBe(100);
  });

  it('throws for an unknown tier', () => {
    const registry = new TierRegistry([tierConfig('tier_1')]);
    expect(() => registry.get('tier_2')).toThrow('Unknown tier: tier_2');
  });
});
