/**
 * Hourly Tier Rate Limiter (in-process fixed window)
 *
 * Counts accepted calls per tier per clock hour.
 *
 * How it works:
 * - Each tier has one counter per hour bucket
 * - Bucket key = UTC date + hour (e.g., "2026-10-19T14"), so 23:00 today and
 *   23:00 tomorrow are different buckets
 * - checkOk() probes: "would one more call fit under the cap?" (no mutation)
 * - recordAndCheck() commits: increments, then compares the new count to the cap
 * - Buckets older than the current hour are dropped on commit
 *
 * Probe and commit are separate so the fallback resolver can inspect tiers
 * it ends up not using without inflating their counts.
 *
 * Every method runs synchronously to completion on the event loop, so the
 * read-modify-write in recordAndCheck cannot interleave with another call.
 */

import { TierRegistry } from './tier-registry';
import { RateLimitResult } from '../types/routing';
import { TierId } from '../types/tiers';

const HOUR_MS = 60 * 60 * 1000;

/**
 * Hour bucket key for an instant
 */
export function hourBucket(now: Date): string {
  return now.toISOString().slice(0, 13);
}

function secondsUntilNextHour(now: Date): number {
  return Math.ceil((HOUR_MS - (now.getTime() % HOUR_MS)) / 1000);
}

export interface RateCounterEntry {
  tier: TierId;
  bucket: string;
  count: number;
  limit: number;
}

export class RateLimiter {
  /** tier → (bucket → count) */
  private counters = new Map<TierId, Map<string, number>>();

  constructor(private readonly registry: TierRegistry) {}

  /**
   * Calls committed for `tier` in the hour containing `now`.
   */
  count(tier: TierId, now: Date): number {
    return this.counters.get(tier)?.get(hourBucket(now)) ?? 0;
  }

  /**
   * Probe: true when one more call would stay within the hourly cap.
   * Never changes any counter.
   */
  checkOk(tier: TierId, now: Date): boolean {
    return this.count(tier, now) < this.registry.get(tier).max_calls_per_hour;
  }

  /**
   * Commit: count one call for `tier` and report whether the new count is
   * within the cap. The call is counted even when it is not allowed.
   */
  recordAndCheck(tier: TierId, now: Date): RateLimitResult {
    const limit = this.registry.get(tier).max_calls_per_hour;
    const bucket = hourBucket(now);

    let buckets = this.counters.get(tier);
    if (!buckets) {
      buckets = new Map();
      this.counters.set(tier, buckets);
    }

    // Expire past hours
    for (const key of buckets.keys()) {
      if (key < bucket) {
        buckets.delete(key);
      }
    }

    const count = (buckets.get(bucket) ?? 0) + 1;
    buckets.set(bucket, count);

    return {
      allowed: count <= limit,
      limit,
      count,
      remaining: Math.max(0, limit - count),
      reset_in_seconds: secondsUntilNextHour(now),
    };
  }

  /**
   * Counters for the hour containing `now`, one entry per configured tier.
   */
  snapshot(now: Date): RateCounterEntry[] {
    const bucket = hourBucket(now);
    return this.registry.list().map((config) => ({
      tier: config.tier_id,
      bucket,
      count: this.count(config.tier_id, now),
      limit: config.max_calls_per_hour,
    }));
  }
}
