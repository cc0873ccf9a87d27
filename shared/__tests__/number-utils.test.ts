import { describe, it, expect } from 'vitest';
import { formatBytes, formatElapsed, formatInterval, formatRate } from '../utils/number-utils';

describe('formatBytes', () => {
  it('should format small values in bytes', () => {
    expect(formatBytes(0)).toBe('   0.00 B');
    expect(formatBytes(512)).toBe(' 512.00 B');
  });

  it('should step units by 1024', () => {
    expect(formatBytes(1536)).toBe('   1.50 KB');
    expect(formatBytes(1024 * 1024)).toBe('   1.00 MB');
  });

  it('should report anything past the MB range in GB', () => {
    expect(formatBytes(3 * 1024 * 1024 * 1024)).toBe('   3.00 GB');
  });
});

describe('formatRate', () => {
  it('should show bytes and bits per second', () => {
    expect(formatRate(100)).toBe(' 100.00 B/s ( 800.00 bps)');
  });

  it('should scale bytes by 1024 and bits by 1000', () => {
    expect(formatRate(2048)).toBe('   2.00 KB/s (  16.38 kbps)');
  });

  it('should reach MB/s and Mbps', () => {
    expect(formatRate(2 * 1024 * 1024)).toBe('   2.00 MB/s (  16.78 Mbps)');
  });

  it('should format a zero rate', () => {
    expect(formatRate(0)).toBe('   0.00 B/s (   0.00 bps)');
  });
});

describe('formatInterval', () => {
  it('should use the largest whole unit', () => {
    expect(formatInterval(60)).toBe('1m');
    expect(formatInterval(300)).toBe('5m');
    expect(formatInterval(900)).toBe('15m');
    expect(formatInterval(3600)).toBe('1h');
  });

  it('should fall back to seconds', () => {
    expect(formatInterval(45)).toBe('45s');
    expect(formatInterval(90)).toBe('90s');
  });
});

describe('formatElapsed', () => {
  it('should show seconds with one decimal', () => {
    expect(formatElapsed(0)).toBe('0.0s');
    expect(formatElapsed(124.5)).toBe('124.5s');
    expect(formatElapsed(3725)).toBe('3725.0s');
  });
});
