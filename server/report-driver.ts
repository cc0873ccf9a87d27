/**
 * ReportDriver: periodic snapshot + render loop
 *
 * Builds a report immediately, then once every reporting interval, and hands
 * each one to the renderer. The wait between cycles takes the run's
 * AbortSignal, so shutdown interrupts the sleep instead of waiting it out.
 *
 * buildReport is synchronous; the only time the report path holds the core
 * is the snapshot/rates computation itself.
 */

import { setTimeout as delay } from 'node:timers/promises';
import type { ReportData } from '@shared/traffic-types';
import { createLogger } from './lib/logger';

const log = createLogger('ReportDriver');

export interface ReportSource {
  buildReport(now: number, intervals: readonly number[], maxDisplayRows: number): ReportData;
}

export type ReportRenderer = (report: ReportData) => void | Promise<void>;

/** Resolves after `ms`, or rejects as soon as `signal` aborts. */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface ReportDriverOptions {
  source: ReportSource;
  render: ReportRenderer;
  reportIntervalSeconds: number;
  rateIntervals: readonly number[];
  /** Rows that fit on screen; read every cycle so terminal resizes apply. */
  maxDisplayRows: () => number;
  /** Epoch seconds. */
  clock?: () => number;
  sleep?: Sleep;
}

const defaultSleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

export class ReportDriver {
  private readonly options: ReportDriverOptions;
  private readonly clock: () => number;
  private readonly sleep: Sleep;
  private lastReport: ReportData | null = null;
  private cycles = 0;

  constructor(options: ReportDriverOptions) {
    this.options = options;
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.sleep = options.sleep ?? defaultSleep;
  }

  /** Most recent report, or null before the first cycle. */
  latest(): ReportData | null {
    return this.lastReport;
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /**
   * Build and render one report. A failing renderer is logged and the
   * report is still kept as the latest.
   */
  async runOnce(): Promise<ReportData> {
    const report = this.options.source.buildReport(
      this.clock(),
      this.options.rateIntervals,
      this.options.maxDisplayRows()
    );
    this.lastReport = report;
    this.cycles++;

    try {
      await this.options.render(report);
    } catch (error) {
      log.error('Render failed', error);
    }
    return report;
  }

  /** Run cycles until `signal` aborts. Resolves once the loop has stopped. */
  async run(signal: AbortSignal): Promise<void> {
    log.debug(`Reporting every ${this.options.reportIntervalSeconds}s`);

    while (!signal.aborted) {
      await this.runOnce();
      try {
        await this.sleep(this.options.reportIntervalSeconds * 1000, signal);
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }

    log.debug(`Stopped after ${this.cycles} cycles`);
  }
}
