/**
 * Traffic Monitor Types
 *
 * Shapes shared by the aggregation core, the terminal renderer and the
 * HTTP report route. Timestamps are epoch seconds (fractional) throughout.
 */

// ============================================================================
// Aggregates
// ============================================================================

/** Cumulative counters for one display key. */
export interface TopicCounters {
  count: number;
  totalBytes: number;
  /** Latest event timestamp seen for this key (epoch seconds). */
  lastSeen: number;
}

/** All events whose timestamp truncates to the same integer second. */
export interface Bucket {
  secondIndex: number;
  messageCount: number;
  byteCount: number;
}

export interface TrafficTotals {
  count: number;
  totalBytes: number;
}

/** Average throughput over a trailing window. */
export interface RatePair {
  intervalSeconds: number;
  messagesPerSec: number;
  bytesPerSec: number;
}

// ============================================================================
// Report
// ============================================================================

export interface ReportRow {
  key: string;
  count: number;
  totalBytes: number;
  lastSeen: number;
  secondsSinceLastSeen: number;
}

export interface ReportData {
  /** Epoch seconds at which the report was built. */
  generatedAt: number;
  /** Epoch seconds at which the monitor started. */
  startedAt: number;
  elapsedSeconds: number;
  /** Top rows by message count, capped at maxDisplayRows. */
  rows: ReportRow[];
  /** Number of distinct display keys seen so far (rows may be truncated). */
  totalKeys: number;
  totals: TrafficTotals;
  /** Totals averaged over the whole run. */
  lifetimeRate: {
    messagesPerSec: number;
    bytesPerSec: number;
  };
  rates: RatePair[];
}
