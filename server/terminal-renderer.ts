/**
 * Terminal Renderer
 *
 * Turns a ReportData into dashboard lines and redraws them on a TTY-like
 * stream. Layout:
 *
 *   <title> - <wall clock>
 *   Elapsed | Total Msg | Total Data | Rate
 *   Last <window>: ...            (one line per rate window)
 *   ---------------------------
 *   Device/Topic | Messages | Data Volume | Last Seen
 *   ---------------------------
 *   <rows>
 *   ... and N more                (only when rows were cut)
 */

import type { Writable } from 'node:stream';
import { format } from 'date-fns';
import type { ReportData } from '@shared/traffic-types';
import {
  formatBytes,
  formatElapsed,
  formatInterval,
  formatRate,
} from '@shared/utils/number-utils';

export const DEFAULT_COLUMNS = 80;
export const DEFAULT_ROWS = 24;
const KEY_WIDTH = 40;
/**
 * Title, summary, two rules and the table header, plus the footer and the
 * line the cursor rests on after the frame's trailing newline.
 */
const FIXED_LINES = 7;

const CLEAR_SCREEN = '\x1b[2J\x1b[H';

export interface RenderOptions {
  title: string;
  columns?: number;
}

/** Table rows that fit a terminal of `terminalRows` lines. Never below 1. */
export function computeMaxDisplayRows(terminalRows: number, rateLineCount: number): number {
  return Math.max(1, terminalRows - FIXED_LINES - rateLineCount);
}

export function renderReport(report: ReportData, options: RenderOptions): string[] {
  const columns = options.columns ?? DEFAULT_COLUMNS;
  const rule = '-'.repeat(columns);
  const wallClock = format(new Date(report.generatedAt * 1000), 'yyyy-MM-dd HH:mm:ss');

  const lines: string[] = [
    `${options.title} - ${wallClock}`,
    `Elapsed: ${formatElapsed(report.elapsedSeconds)}` +
      ` | Total Msg: ${report.totals.count} (${report.lifetimeRate.messagesPerSec.toFixed(2)}/s)` +
      ` | Total Data: ${formatBytes(report.totals.totalBytes)}` +
      ` | Rate: ${formatRate(report.lifetimeRate.bytesPerSec)}`,
  ];

  for (const rate of report.rates) {
    lines.push(
      `Last ${formatInterval(rate.intervalSeconds)}: ${rate.messagesPerSec.toFixed(2)} msg/s` +
        ` | ${formatRate(rate.bytesPerSec)}`
    );
  }

  lines.push(rule);
  lines.push(
    `${'Device/Topic'.padEnd(KEY_WIDTH)} | ${'Messages'.padEnd(10)} | ${'Data Volume'.padEnd(12)} | Last Seen`
  );
  lines.push(rule);

  for (const row of report.rows) {
    lines.push(
      `${row.key.slice(0, KEY_WIDTH).padEnd(KEY_WIDTH)}` +
        ` | ${String(row.count).padEnd(10)}` +
        ` | ${formatBytes(row.totalBytes).padEnd(12)}` +
        ` | ${formatElapsed(row.secondsSinceLastSeen)} ago`
    );
  }

  if (report.rows.length === 0) {
    lines.push('Waiting for messages...');
  } else if (report.totalKeys > report.rows.length) {
    lines.push(`... and ${report.totalKeys - report.rows.length} more`);
  }

  return lines;
}

/** Minimal view of a terminal output stream. */
export interface TerminalStream extends Pick<Writable, 'write'> {
  columns?: number;
  rows?: number;
}

export class TerminalRenderer {
  constructor(
    private readonly stream: TerminalStream,
    private readonly title: string
  ) {}

  /** Rows available to the device table at the current terminal height. */
  maxDisplayRows(rateLineCount: number): number {
    return computeMaxDisplayRows(this.stream.rows ?? DEFAULT_ROWS, rateLineCount);
  }

  render(report: ReportData): void {
    const lines = renderReport(report, {
      title: this.title,
      columns: this.stream.columns ?? DEFAULT_COLUMNS,
    });
    this.stream.write(`${CLEAR_SCREEN}${lines.join('\n')}\n`);
  }
}
