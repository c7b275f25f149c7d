import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter, hourBucket } from './ratelimit';
import { TierRegistry } from './tier-registry';
import { tierConfig } from '../test/fixtures';

const at = (iso: string) => new Date(iso);

describe('hourBucket', () => {
  it('qualifies the hour with the UTC date', () => {
    expect(hourBucket(at('2026-10-19T23:15:00Z'))).toBe('2026-10-19T23');
    expect(hourBucket(at('2026-10-20T23:15:00Z'))).toBe('2026-10-20T23');
  });
});

describe('RateLimiter', () => {
  let limiter: RateLimiter;

  beforeEach(() => {
    limiter = new RateLimiter(
      new TierRegistry([tierConfig('tier_1', { max_calls_per_hour: 2 }), tierConfig('tier_2')])
    );
  });

  it('probing never changes the count', () => {
    const now = at('2026-10-19T14:00:00Z');

    for (let i = 0; i < 10; i++) {
      expect(limiter.checkOk('tier_1', now)).toBe(true);
    }
    expect(limiter.count('tier_1', now)).toBe(0);

    limiter.recordAndCheck('tier_1', now);
    expect(limiter.count('tier_1', now)).toBe(1);
  });

  it('allows calls up to the cap and reports the excess', () => {
    const now = at('2026-10-19T14:00:00Z');

    expect(limiter.recordAndCheck('tier_1', now)).toEqual({
      allowed: true,
      limit: 2,
      count: 1,
      remaining: 1,
      reset_in_seconds: 3600,
    });
    expect(limiter.recordAndCheck('tier_1', now).allowed).toBe(true);
    expect(limiter.checkOk('tier_1', now)).toBe(false);

    const third = limiter.recordAndCheck('tier_1', now);
    expect(third).toEqual({
      allowed: false,
      limit: 2,
      count: 3,
      remaining: 0,
      reset_in_seconds: 3600,
    });
  });

  it('reports the seconds left in the hour', () => {
    const result = limiter.recordAndCheck('tier_1', at('2026-10-19T14:59:30Z'));
    expect(result.reset_in_seconds).toBe(30);
  });

  it('counts tiers independently', () => {
    const now = at('2026-10-19T14:00:00Z');
    limiter.recordAndCheck('tier_1', now);
    limiter.recordAndCheck('tier_1', now);

    expect(limiter.checkOk('tier_1', now)).toBe(false);
    expect(limiter.checkOk('tier_2', now)).toBe(true);
  });

  it('starts a fresh count each clock hour', () => {
    limiter.recordAndCheck('tier_1', at('2026-10-19T14:10:00Z'));
    limiter.recordAndCheck('tier_1', at('2026-10-19T14:59:59Z'));

    expect(limiter.checkOk('tier_1', at('2026-10-19T14:59:59Z'))).toBe(false);
    expect(limiter.checkOk('tier_1', at('2026-10-19T15:00:00Z'))).toBe(true);
  });

  it('does not carry an hour over to the same hour the next day', () => {
    limiter.recordAndCheck('tier_1', at('2026-10-19T23:10:00Z'));
    limiter.recordAndCheck('tier_1', at('2026-10-19T23:20:00Z'));

    expect(limiter.count('tier_1', at('2026-10-20T23:10:00Z'))).toBe(0);
  });

  it('loses no updates under concurrent commits', async () => {
    const now = at('2026-10-19T14:00:00Z');
    const n = 1000;

    await Promise.all(
      Array.from({ length: n }, async () => {
        await Promise.resolve();
        return limiter.recordAndCheck('tier_2', now);
      })
    );

    expect(limiter.count('tier_2', now)).toBe(n);
  });

  it('snapshots the current hour for every tier', () => {
    const now = at('2026-10-19T14:30:00Z');
    limiter.recordAndCheck('tier_1', now);

    expect(limiter.snapshot(now)).toEqual([
      { tier: 'tier_1', bucket: '2026-10-19T14', count: 1, limit: 2 },
      { tier: 'tier_2', bucket: '2026-10-19T14', count: 0, limit: 100 },
    ]);
  });
});
