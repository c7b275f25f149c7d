/**
 * ZIP Index
 *
 * Immutable ZIP → tier snapshot, plus the store that swaps snapshots on reload.
 *
 * A snapshot is never modified after it is built. Reloading builds a complete
 * new snapshot and replaces the store's reference in one assignment, so a
 * reader either sees the old index or the new one, never a partial build.
 *
 * Conflict policy: when one ZIP is listed under several tiers, the tier
 * earliest in registry priority wins, whatever order the rows arrive in.
 */

import { Logger } from 'pino';
import { errorMessage } from './errors';
import { TierId, TIER_IDS, isTierId } from '../types/tiers';
import { ZipIndexStatus, ZipLoadResult, ZipRecord } from '../types/zips';

/**
 * Normalize a ZIP code to 5 zero-padded digits. Input is expected trimmed.
 *
 * Accepts "2134", "02134", 2134, "2134.0" (spreadsheet float residue) and
 * ZIP+4 ("02134-1234"). Returns null for anything else.
 */
export function normalizeZip(raw: string | number): string | null {
  let value = String(raw);

  if (/^\d+\.0+$/.test(value)) {
    value = value.slice(0, value.indexOf('.'));
  }

  const plusFour = /^(\d{5})-\d{4}$/.exec(value);
  if (plusFour) {
    return plusFour[1];
  }

  if (!/^\d{1,5}$/.test(value)) {
    return null;
  }

  return value.padStart(5, '0');
}

/**
 * Normalize a tier label ("tier_1", "Tier 1", "TIER-1", "tier1", "1").
 */
export function normalizeTierLabel(raw: string): TierId | null {
  const match = /^(?:tier)?[\s_-]*(\d+)$/.exec(raw.trim().toLowerCase());
  if (!match) {
    return null;
  }
  const candidate = `tier_${parseInt(match[1], 10)}`;
  return isTierId(candidate) ? candidate : null;
}

export interface ZipIndexBuild {
  index: ZipIndex;
  loaded: number;
  skipped: number;
  conflicts: number;
}

export class ZipIndex {
  private readonly zips: ReadonlyMap<string, TierId>;

  private constructor(zips: Map<string, TierId>) {
    this.zips = zips;
  }

  static empty(): ZipIndex {
    return new ZipIndex(new Map());
  }

  /**
   * Build a snapshot from raw rows. Malformed rows are counted and skipped.
   *
   * @param priority - tier order used to settle conflicts (earlier wins)
   */
  static build(
    records: Iterable<ZipRecord>,
    priority: readonly TierId[] = TIER_IDS
  ): ZipIndexBuild {
    const zips = new Map<string, TierId>();
    const conflicted = new Set<string>();
    let skipped = 0;

    for (const record of records) {
      const zip = normalizeZip(record.zip);
      const tier = normalizeTierLabel(record.tier);

      if (zip === null || tier === null || !priority.includes(tier)) {
        skipped++;
        continue;
      }

      const existing = zips.get(zip);
      if (existing === undefined) {
        zips.set(zip, tier);
        continue;
      }
      if (existing === tier) {
        continue;
      }

      conflicted.add(zip);
      if (priority.indexOf(tier) < priority.indexOf(existing)) {
        zips.set(zip, tier);
      }
    }

    return {
      index: new ZipIndex(zips),
      loaded: zips.size,
      skipped,
      conflicts: conflicted.size,
    };
  }

  /**
   * Tier owning a normalized 5-digit ZIP, or null when no tier owns it.
   */
  lookup(zip: string): TierId | null {
    return this.zips.get(zip) ?? null;
  }

  get size(): number {
    return this.zips.size;
  }

  countByTier(): Record<string, number> {
    const counts: Record<string, number> = {};
    for (const tier of this.zips.values()) {
      counts[tier] = (counts[tier] ?? 0) + 1;
    }
    return counts;
  }
}

export type ZipSource = () => Promise<Iterable<ZipRecord>>;

/**
 * Holds the current ZipIndex snapshot and replaces it on (re)load.
 */
export class ZipIndexStore {
  private current: ZipIndex = ZipIndex.empty();
  private loadedAt: number | null = null;
  private lastAttemptAt: number | null = null;
  private lastError: string | null = null;

  constructor(
    private readonly priority: readonly TierId[],
    private readonly log: Logger
  ) {}

  /** Current snapshot; callers may hold on to it across a reload */
  snapshot(): ZipIndex {
    return this.current;
  }

  lookup(zip: string): TierId | null {
    return this.current.lookup(zip);
  }

  /**
   * Replace the snapshot with one built from `records`.
   */
  load(records: Iterable<ZipRecord>, now: number = Date.now()): ZipLoadResult {
    this.lastAttemptAt = now;

    let build: ZipIndexBuild;
    try {
      build = ZipIndex.build(records, this.priority);
    } catch (error) {
      // A throwing iterable is a data-source failure, not a caller bug
      return this.fail(errorMessage(error));
    }

    this.current = build.index;
    this.loadedAt = now;
    this.lastError = null;

    this.log.info(
      { loaded: build.loaded, skipped: build.skipped, conflicts: build.conflicts },
      'ZIP index loaded'
    );

    return {
      ok: true,
      loaded: build.loaded,
      skipped: build.skipped,
      conflicts: build.conflicts,
      loaded_at: now,
    };
  }

  /**
   * Fetch records from `source` and load them. Never throws: on failure the
   * previous snapshot stays authoritative and the store reports degraded.
   */
  async reload(source: ZipSource, now: () => number = Date.now): Promise<ZipLoadResult> {
    let records: Iterable<ZipRecord>;
    try {
      records = await source();
    } catch (error) {
      this.lastAttemptAt = now();
      return this.fail(errorMessage(error));
    }
    return this.load(records, now());
  }

  status(): ZipIndexStatus {
    return {
      zip_count: this.current.size,
      loaded_at: this.loadedAt,
      last_attempt_at: this.lastAttemptAt,
      last_error: this.lastError,
      degraded: this.lastError !== null || this.loadedAt === null,
      by_tier: this.current.countByTier(),
    };
  }

  private fail(message: string): ZipLoadResult {
    this.lastError = message;
    this.log.error(
      { err: message, retained: this.current.size },
      'ZIP data unavailable, keeping previous index'
    );
    return { ok: false, error: message, retained: this.current.size };
  }
}
