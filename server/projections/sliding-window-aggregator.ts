/**
 * SlidingWindowAggregator: per-second bucketed traffic log
 *
 * Records every counted message and answers "messages/sec and bytes/sec over
 * the last N seconds" for several N at once, with memory bounded by the
 * retention window rather than by the event rate.
 *
 * Complexity (B = live buckets, at most maxRetentionSeconds + 1 for ordered input):
 * - record: O(1) amortized. Same-second events coalesce into the tail bucket;
 *           expired buckets are dropped by advancing a head offset and the
 *           backing array is compacted once the dead prefix dominates it.
 * - rates:  O(B * intervals). Called once per report cycle, never per event.
 *
 * Ordering: the ingest path is expected to deliver non-decreasing timestamps.
 * An earlier second arriving late is appended as its own bucket instead of
 * being merged, so the tail is never rewritten with a foreign second. With
 * several unordered producers coalescing degrades to one bucket per arrival
 * run; totals stay correct but the memory bound loosens.
 *
 * Every method is synchronous, so on the Node.js event loop each call runs
 * to completion before any other ingest or report callback can observe the
 * log.
 */

import type { Bucket, RatePair } from '@shared/traffic-types';
import {
  computeRate,
  getRetentionFloor,
  getWindowCutoff,
  toSecondIndex,
} from '../lib/windowing-helpers';

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_RETENTION_SECONDS = 900;

/** Dead prefix length that triggers compaction of the backing array. */
const COMPACT_THRESHOLD = 1024;

// ============================================================================
// Implementation
// ============================================================================

export class SlidingWindowAggregator {
  readonly maxRetentionSeconds: number;

  /** Live buckets are `log[head..]`; entries before `head` are evicted. */
  private log: Bucket[] = [];
  private head = 0;

  constructor(maxRetentionSeconds: number = DEFAULT_RETENTION_SECONDS) {
    if (!Number.isInteger(maxRetentionSeconds) || maxRetentionSeconds <= 0) {
      throw new RangeError(
        `maxRetentionSeconds must be a positive integer, got ${maxRetentionSeconds}`
      );
    }
    this.maxRetentionSeconds = maxRetentionSeconds;
  }

  /** Number of live buckets. */
  get bucketCount(): number {
    return this.log.length - this.head;
  }

  /**
   * Add one message of `size` bytes observed at `timestamp` (epoch seconds).
   * Evicts buckets that fell out of the retention window relative to it.
   */
  record(timestamp: number, size: number): void {
    const second = toSecondIndex(timestamp);
    const tail = this.bucketCount > 0 ? this.log[this.log.length - 1] : undefined;

    if (tail !== undefined && tail.secondIndex === second) {
      tail.messageCount += 1;
      tail.byteCount += size;
    } else {
      this.log.push({ secondIndex: second, messageCount: 1, byteCount: size });
    }

    this.evictBefore(getRetentionFloor(this.maxRetentionSeconds, timestamp));
  }

  /**
   * Average rates over each trailing interval ending at `now`.
   *
   * Expired buckets are pruned first, relative to the retention window, so
   * the log stays bounded even when nothing is being recorded. Intervals
   * longer than the retention window undercount: the evicted seconds are
   * still part of the divisor.
   */
  rates(now: number, intervals: readonly number[]): RatePair[] {
    this.evictBefore(getRetentionFloor(this.maxRetentionSeconds, now));

    return intervals.map((intervalSeconds) => {
      const cutoff = getWindowCutoff(intervalSeconds, now);
      let messages = 0;
      let bytes = 0;
      for (let i = this.head; i < this.log.length; i++) {
        const bucket = this.log[i];
        if (bucket.secondIndex > cutoff) {
          messages += bucket.messageCount;
          bytes += bucket.byteCount;
        }
      }
      return {
        intervalSeconds,
        messagesPerSec: computeRate(messages, intervalSeconds),
        bytesPerSec: computeRate(bytes, intervalSeconds),
      };
    });
  }

  /** Copies of the live buckets, oldest first. */
  buckets(): Bucket[] {
    return this.log.slice(this.head).map((bucket) => ({ ...bucket }));
  }

  reset(): void {
    this.log = [];
    this.head = 0;
  }

  // --------------------------------------------------------------------------
  // Eviction
  // --------------------------------------------------------------------------

  private evictBefore(floor: number): void {
    while (this.head < this.log.length && this.log[this.head].secondIndex < floor) {
      this.head++;
    }

    if (this.head === this.log.length) {
      this.log = [];
      this.head = 0;
    } else if (this.head >= COMPACT_THRESHOLD && this.head * 2 >= this.log.length) {
      this.log = this.log.slice(this.head);
      this.head = 0;
    }
  }
}
