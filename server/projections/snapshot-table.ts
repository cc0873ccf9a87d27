/**
 * SnapshotTable: cumulative per-key traffic counters
 *
 * One TopicCounters entry per display key, created on first sight and kept
 * for the lifetime of the run. Key cardinality is unbounded; it tracks the
 * observed topic space, which for a device bus is the device count.
 *
 * Grand totals are maintained on every record so the report header is O(1).
 */

import type { TopicCounters, TrafficTotals } from '@shared/traffic-types';

export type SnapshotEntry = [key: string, counters: TopicCounters];

export class SnapshotTable {
  private counters = new Map<string, TopicCounters>();
  private totalCount = 0;
  private totalBytes = 0;

  /** Number of distinct display keys recorded so far. */
  get size(): number {
    return this.counters.size;
  }

  record(key: string, size: number, timestamp: number): void {
    let entry = this.counters.get(key);
    if (!entry) {
      entry = { count: 0, totalBytes: 0, lastSeen: 0 };
      this.counters.set(key, entry);
    }
    entry.count += 1;
    entry.totalBytes += size;
    if (timestamp > entry.lastSeen) entry.lastSeen = timestamp;

    this.totalCount += 1;
    this.totalBytes += size;
  }

  /**
   * Point-in-time copy of every entry, busiest first.
   * Ties on count are ordered by key so repeated reads are stable.
   */
  snapshot(): SnapshotEntry[] {
    const entries: SnapshotEntry[] = [];
    for (const [key, counters] of this.counters) {
      entries.push([key, { ...counters }]);
    }
    entries.sort((a, b) => b[1].count - a[1].count || compareKeys(a[0], b[0]));
    return entries;
  }

  totals(): TrafficTotals {
    return { count: this.totalCount, totalBytes: this.totalBytes };
  }

  reset(): void {
    this.counters.clear();
    this.totalCount = 0;
    this.totalBytes = 0;
  }
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
