/**
 * Outcome Recorder
 *
 * Bounded call history (ring buffer, oldest evicted first) plus running
 * aggregates over every call ever recorded.
 *
 * record() appends to the history and folds the entry into the aggregates in
 * one synchronous step, so a reader never observes one without the other.
 * Readers get copies; nothing they hold changes afterwards.
 */

import { v4 as uuidv4 } from 'uuid';
import { Logger } from 'pino';
import { AnalyticsAggregate, CallRecord, CallStatus } from '../types/calls';
import { TierId } from '../types/tiers';

export const DEFAULT_HISTORY_CAPACITY = 10_000;

const UNROUTED_KEY = 'unrouted';
/** by_zip bucket for inputs that are not a 5-digit ZIP */
const INVALID_ZIP_KEY = 'invalid';
const ZIP_KEY = /^\d{5}$/;

function increment(counts: Map<string, number>, key: string): void {
  counts.set(key, (counts.get(key) ?? 0) + 1);
}

function emptyStatusCounts(): Record<CallStatus, number> {
  return { success: 0, api_error: 0, no_tier: 0, exception: 0 };
}

/**
 * Fixed-capacity FIFO; pushing onto a full buffer overwrites the oldest item.
 */
export class RingBuffer<T> {
  private readonly items: Array<T | undefined>;
  private head = 0; // next write position
  private length = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Ring buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.items = new Array<T | undefined>(capacity);
  }

  get size(): number {
    return this.length;
  }

  /** Returns the evicted item, if any */
  push(item: T): T | undefined {
    const evicted = this.length === this.capacity ? this.items[this.head] : undefined;
    this.items[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.length < this.capacity) {
      this.length++;
    }
    return evicted;
  }

  /** Up to `n` items, newest first */
  newest(n: number): T[] {
    const count = Math.min(Math.max(0, Math.floor(n)), this.length);
    const result: T[] = [];
    for (let i = 1; i <= count; i++) {
      const item = this.items[(this.head - i + this.capacity) % this.capacity];
      if (item !== undefined) {
        result.push(item);
      }
    }
    return result;
  }
}

/** Fields filled in when a pending call is finalized */
export interface CallOutcome {
  status: CallStatus;
  zip_code?: string;
  original_tier?: TierId | null;
  chosen_tier?: TierId | null;
  offer_id?: string | null;
  fallback_used?: boolean;
  business_hours_ok?: boolean;
  rate_limit_ok?: boolean;
  external_call_id?: string | null;
  error?: string | null;
}

/**
 * A call that has started but not been recorded yet. complete() records it
 * exactly once; later calls are ignored.
 */
export class PendingCall {
  readonly call_id: string;
  private completed = false;

  constructor(
    private readonly recorder: OutcomeRecorder,
    readonly caller_id: string,
    readonly zip_code: string,
    readonly started_at: number,
    private readonly clock: () => number
  ) {
    this.call_id = uuidv4();
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  complete(outcome: CallOutcome): CallRecord | null {
    if (this.completed) {
      this.recorder.log.warn(
        { call_id: this.call_id, status: outcome.status },
        'Call already recorded, ignoring second outcome'
      );
      return null;
    }
    this.completed = true;

    const record: CallRecord = {
      call_id: this.call_id,
      timestamp: this.started_at,
      caller_id: this.caller_id,
      zip_code: outcome.zip_code ?? this.zip_code,
      original_tier: outcome.original_tier ?? null,
      chosen_tier: outcome.chosen_tier ?? null,
      offer_id: outcome.offer_id ?? null,
      fallback_used: outcome.fallback_used ?? false,
      business_hours_ok: outcome.business_hours_ok ?? false,
      rate_limit_ok: outcome.rate_limit_ok ?? false,
      status: outcome.status,
      response_time_ms: Math.max(0, this.clock() - this.started_at),
      external_call_id: outcome.external_call_id ?? null,
      error: outcome.error ?? null,
    };

    this.recorder.record(record);
    return record;
  }
}

export interface OutcomeRecorderOptions {
  capacity?: number;
  /** Millisecond clock used for call start/finish times */
  clock?: () => number;
}

export class OutcomeRecorder {
  private readonly history: RingBuffer<CallRecord>;
  private readonly clock: () => number;
  private readonly byStatus = emptyStatusCounts();
  // Keys come from caller input, so counters live in Maps rather than objects
  private readonly byTier = new Map<string, number>();
  private readonly byHour = new Map<string, number>();
  private readonly byZip = new Map<string, number>();
  private totalCalls = 0;
  private successfulCalls = 0;
  private fallbackCalls = 0;
  private totalResponseTimeMs = 0;
  private firstCallAt: number | null = null;
  private lastCallAt: number | null = null;

  constructor(
    readonly log: Logger,
    options: OutcomeRecorderOptions = {}
  ) {
    this.history = new RingBuffer(options.capacity ?? DEFAULT_HISTORY_CAPACITY);
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Start tracking a call. The returned PendingCall must be completed on
   * every path, including failures.
   */
  begin(params: { caller_id: string; zip_code: string; now?: number }): PendingCall {
    return new PendingCall(
      this,
      params.caller_id,
      params.zip_code,
      params.now ?? this.clock(),
      this.clock
    );
  }

  /**
   * Append a record and fold it into the aggregates.
   *
   * @throws RangeError for a non-finite timestamp or a negative or non-finite
   *         response time; nothing is recorded in that case
   */
  record(entry: CallRecord): void {
    if (!Number.isFinite(entry.timestamp)) {
      throw new RangeError(`Call ${entry.call_id} has an invalid timestamp: ${entry.timestamp}`);
    }
    if (!Number.isFinite(entry.response_time_ms) || entry.response_time_ms < 0) {
      throw new RangeError(
        `Call ${entry.call_id} has an invalid response time: ${entry.response_time_ms}`
      );
    }

    const record: CallRecord = Object.freeze({ ...entry });
    const tierKey = record.chosen_tier ?? UNROUTED_KEY;
    const hourKey = new Date(record.timestamp).toISOString().slice(11, 13);
    const zipKey = ZIP_KEY.test(record.zip_code) ? record.zip_code : INVALID_ZIP_KEY;

    this.history.push(record);

    this.totalCalls++;
    this.byStatus[record.status]++;
    if (record.status === 'success') {
      this.successfulCalls++;
    }
    if (record.fallback_used) {
      this.fallbackCalls++;
    }
    increment(this.byTier, tierKey);
    increment(this.byHour, hourKey);
    increment(this.byZip, zipKey);
    this.totalResponseTimeMs += record.response_time_ms;
    this.firstCallAt =
      this.firstCallAt === null ? record.timestamp : Math.min(this.firstCallAt, record.timestamp);
    this.lastCallAt =
      this.lastCallAt === null ? record.timestamp : Math.max(this.lastCallAt, record.timestamp);

    this.log.debug(
      { call_id: record.call_id, status: record.status, tier: record.chosen_tier },
      'Call recorded'
    );
  }

  /**
   * Point-in-time copy of the aggregates.
   */
  snapshotAnalytics(): AnalyticsAggregate {
    return {
      total_calls: this.totalCalls,
      successful_calls: this.successfulCalls,
      failed_calls: this.totalCalls - this.successfulCalls,
      fallback_calls: this.fallbackCalls,
      by_status: { ...this.byStatus },
      by_tier: Object.fromEntries(this.byTier),
      by_hour: Object.fromEntries(this.byHour),
      by_zip: Object.fromEntries(this.byZip),
      avg_response_time_ms: this.totalCalls === 0 ? 0 : this.totalResponseTimeMs / this.totalCalls,
      history_size: this.history.size,
      history_capacity: this.history.capacity,
      first_call_at: this.firstCallAt,
      last_call_at: this.lastCallAt,
    };
  }

  /**
   * Up to `n` most recent records, newest first.
   */
  recentHistory(n: number): CallRecord[] {
    return this.history.newest(n);
  }
}
