/**
 * ReportDriver Tests
 *
 * The sleep and clock are injected so the loop runs without timers, except
 * for one test that exercises the default abortable sleep.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import type { ReportData } from '@shared/traffic-types';
import { ReportDriver, type ReportSource, type Sleep } from '../report-driver';

function emptyReport(now: number): ReportData {
  return {
    generatedAt: now,
    startedAt: now,
    elapsedSeconds: 0,
    rows: [],
    totalKeys: 0,
    totals: { count: 0, totalBytes: 0 },
    lifetimeRate: { messagesPerSec: 0, bytesPerSec: 0 },
    rates: [],
  };
}

describe('ReportDriver', () => {
  let source: ReportSource;
  let buildReport: Mock<ReportSource['buildReport']>;

  beforeEach(() => {
    buildReport = vi.fn<ReportSource['buildReport']>((now) => emptyReport(now));
    source = { buildReport };
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should have no report before the first cycle', () => {
    const driver = new ReportDriver({
      source,
      render: vi.fn(),
      reportIntervalSeconds: 5,
      rateIntervals: [60],
      maxDisplayRows: () => 10,
    });
    expect(driver.latest()).toBeNull();
    expect(driver.cycleCount).toBe(0);
  });

  it('should pass the clock, rate windows and current row budget to the source', async () => {
    let rows = 7;
    const driver = new ReportDriver({
      source,
      render: vi.fn(),
      reportIntervalSeconds: 5,
      rateIntervals: [60, 300],
      maxDisplayRows: () => rows,
      clock: () => 1234,
    });

    await driver.runOnce();
    rows = 3;
    await driver.runOnce();

    expect(buildReport).toHaveBeenNthCalledWith(1, 1234, [60, 300], 7);
    expect(buildReport).toHaveBeenNthCalledWith(2, 1234, [60, 300], 3);
    expect(driver.latest()).toEqual(emptyReport(1234));
  });

  it('should render immediately and then once per interval until aborted', async () => {
    const controller = new AbortController();
    const render = vi.fn();
    const sleep = vi.fn<Sleep>(async () => {
      if (render.mock.calls.length === 3) controller.abort();
    });
    const driver = new ReportDriver({
      source,
      render,
      reportIntervalSeconds: 5,
      rateIntervals: [60],
      maxDisplayRows: () => 10,
      sleep,
    });

    await driver.run(controller.signal);

    expect(render).toHaveBeenCalledTimes(3);
    expect(driver.cycleCount).toBe(3);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(5000, controller.signal);
  });

  it('should stop when the sleep is interrupted by the abort', async () => {
    const controller = new AbortController();
    const sleep: Sleep = async () => {
      controller.abort();
      throw new Error('The operation was aborted');
    };
    const driver = new ReportDriver({
      source,
      render: vi.fn(),
      reportIntervalSeconds: 5,
      rateIntervals: [60],
      maxDisplayRows: () => 10,
      sleep,
    });

    await expect(driver.run(controller.signal)).resolves.toBeUndefined();
    expect(driver.cycleCount).toBe(1);
  });

  it('should propagate a sleep failure that is not an abort', async () => {
    const controller = new AbortController();
    const driver = new ReportDriver({
      source,
      render: vi.fn(),
      reportIntervalSeconds: 5,
      rateIntervals: [60],
      maxDisplayRows: () => 10,
      sleep: async () => {
        throw new Error('timer failure');
      },
    });

    await expect(driver.run(controller.signal)).rejects.toThrow('timer failure');
  });

  it('should not run at all when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const render = vi.fn();
    const driver = new ReportDriver({
      source,
      render,
      reportIntervalSeconds: 5,
      rateIntervals: [60],
      maxDisplayRows: () => 10,
    });

    await driver.run(controller.signal);
    expect(render).not.toHaveBeenCalled();
  });

  it('should keep the report and carry on when rendering fails', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const failure = new Error('stdout closed');
    const driver = new ReportDriver({
      source,
      render: () => {
        throw failure;
      },
      reportIntervalSeconds: 5,
      rateIntervals: [60],
      maxDisplayRows: () => 10,
      clock: () => 50,
    });

    const report = await driver.runOnce();

    expect(report).toEqual(emptyReport(50));
    expect(driver.latest()).toBe(report);
    expect(errorSpy).toHaveBeenCalledWith('[ReportDriver:error] Render failed', failure);
  });

  it('should interrupt the default sleep on abort', async () => {
    const controller = new AbortController();
    const driver = new ReportDriver({
      source,
      render: () => controller.abort(),
      reportIntervalSeconds: 3600,
      rateIntervals: [60],
      maxDisplayRows: () => 10,
    });

    await driver.run(controller.signal);
    expect(driver.cycleCount).toBe(1);
  });
});
