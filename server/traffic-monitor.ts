/**
 * TrafficMonitor: ingest and report entry points of the aggregation core
 *
 * Owns one SnapshotTable (cumulative per-key counters) and one
 * SlidingWindowAggregator (per-second rate history). Constructed once at
 * startup and handed to the transport (ingest path), the report driver and
 * the HTTP route (report path); there is no module-level state.
 *
 *   transport -> onEvent -> filter -> extractDisplayKey -> { table, window }
 *   driver    -> buildReport -> { table.snapshot, table.totals, window.rates }
 */

import type { ReportData, ReportRow } from '@shared/traffic-types';
import {
  createTopicFilter,
  extractDisplayKey,
  DEFAULT_TOPIC_SEPARATOR,
  type TopicFilter,
} from '@shared/topic-filters';
import { SnapshotTable } from './projections/snapshot-table';
import {
  SlidingWindowAggregator,
  DEFAULT_RETENTION_SECONDS,
} from './projections/sliding-window-aggregator';

export interface TrafficMonitorOptions {
  baseTopic: string;
  detailDepth: number;
  separator?: string;
  /** Sub-namespaces of the base topic that are not counted. */
  ignored?: readonly string[];
  retentionSeconds?: number;
  /** Replaces the base-topic/ignored predicate entirely when given. */
  filter?: TopicFilter;
  /** Epoch seconds the run started at; defaults to construction time. */
  startedAt?: number;
}

export class TrafficMonitor {
  readonly startedAt: number;
  readonly table = new SnapshotTable();
  readonly window: SlidingWindowAggregator;

  private readonly filter: TopicFilter;
  private readonly detailDepth: number;
  private readonly separator: string;

  constructor(options: TrafficMonitorOptions) {
    this.separator = options.separator ?? DEFAULT_TOPIC_SEPARATOR;
    this.detailDepth = options.detailDepth;
    this.filter =
      options.filter ??
      createTopicFilter({
        baseTopic: options.baseTopic,
        ignored: options.ignored,
        separator: this.separator,
      });
    this.window = new SlidingWindowAggregator(
      options.retentionSeconds ?? DEFAULT_RETENTION_SECONDS
    );
    this.startedAt = options.startedAt ?? Date.now() / 1000;
  }

  /**
   * Count one bus message. Never throws: any topic is a valid input and a
   * size that is not a finite non-negative number is counted as 0 bytes.
   *
   * @returns false when the topic was filtered out
   */
  onEvent(topic: string, payloadSizeBytes: number, timestamp: number): boolean {
    if (!this.filter(topic)) return false;

    const size =
      Number.isFinite(payloadSizeBytes) && payloadSizeBytes > 0 ? payloadSizeBytes : 0;
    const key = extractDisplayKey(topic, this.detailDepth, this.separator);

    this.table.record(key, size, timestamp);
    this.window.record(timestamp, size);
    return true;
  }

  /**
   * Assemble everything the renderer needs for one frame.
   * `maxDisplayRows` below 1 still yields one row when any key exists.
   */
  buildReport(now: number, intervals: readonly number[], maxDisplayRows: number): ReportData {
    const entries = this.table.snapshot();
    const totals = this.table.totals();
    const rates = this.window.rates(now, intervals);

    const rowLimit = Math.max(1, Math.floor(maxDisplayRows));
    const rows: ReportRow[] = entries.slice(0, rowLimit).map(([key, counters]) => ({
      key,
      count: counters.count,
      totalBytes: counters.totalBytes,
      lastSeen: counters.lastSeen,
      secondsSinceLastSeen: Math.max(0, now - counters.lastSeen),
    }));

    const elapsedSeconds = Math.max(0, now - this.startedAt);
    return {
      generatedAt: now,
      startedAt: this.startedAt,
      elapsedSeconds,
      rows,
      totalKeys: entries.length,
      totals,
      lifetimeRate: {
        messagesPerSec: elapsedSeconds > 0 ? totals.count / elapsedSeconds : 0,
        bytesPerSec: elapsedSeconds > 0 ? totals.totalBytes / elapsedSeconds : 0,
      },
      rates,
    };
  }

  reset(): void {
    this.table.reset();
    this.window.reset();
  }
}
