/**
 * ZIP Reference Data Types
 */

/** One row of reference data as supplied by the data source */
export interface ZipRecord {
  zip: string | number;
  tier: string;
}

export type ZipLoadResult =
  | {
      ok: true;
      /** ZIPs in the new snapshot */
      loaded: number;
      /** Rows dropped for a malformed ZIP or tier label */
      skipped: number;
      /** ZIPs listed under more than one tier (resolved by tier priority) */
      conflicts: number;
      loaded_at: number;
    }
  | {
      ok: false;
      error: string;
      /** ZIPs in the snapshot that stays authoritative */
      retained: number;
    };

export interface ZipIndexStatus {
  zip_count: number;
  /** Last successful load (Unix ms, null = never loaded) */
  loaded_at: number | null;
  last_attempt_at: number | null;
  last_error: string | null;
  degraded: boolean;
  /** ZIP count per tier */
  by_tier: Record<string, number>;
}
