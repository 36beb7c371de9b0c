import { describe, it, expect } from 'vitest';
import {
  formatClockMinute,
  formatClockSecond,
  formatDuration,
  formatTimeOfDay,
  monoSinceMs,
} from '../index.js';

describe('formatDuration', () => {
  it('formats zero', () => {
    expect(formatDuration(0)).toBe('00:00:00.000');
  });

  it('pads every field', () => {
    expect(formatDuration(3_723_004)).toBe('01:02:03.004');
  });

  it('keeps milliseconds below one second', () => {
    expect(formatDuration(999)).toBe('00:00:00.999');
  });

  it('rolls minutes into hours', () => {
    expect(formatDuration(60 * 60 * 1000)).toBe('01:00:00.000');
  });

  it('lets hours grow past two digits', () => {
    expect(formatDuration(100 * 3600 * 1000 + 5000)).toBe('100:00:05.000');
  });

  it('floors fractional milliseconds', () => {
    expect(formatDuration(1500.9)).toBe('00:00:01.500');
  });

  it('clamps negative durations to zero', () => {
    expect(formatDuration(-250)).toBe('00:00:00.000');
  });
});

describe('wall-clock formatting', () => {
  // Local-time constructor, so the expectations hold in any time zone.
  const date = new Date(2026, 2, 2, 9, 5, 7);

  it('formats to the minute', () => {
    expect(formatClockMinute(date)).toBe('2026-03-02 09:05');
  });

  it('formats to the second', () => {
    expect(formatClockSecond(date)).toBe('2026-03-02 09:05:07');
  });

  it('formats the time of day alone', () => {
    expect(formatTimeOfDay(date)).toBe('09:05:07');
  });

  it('pads single-digit months and days', () => {
    expect(formatClockMinute(new Date(2026, 0, 9, 23, 59, 0))).toBe('2026-01-09 23:59');
  });
});

describe('monoSinceMs', () => {
  it('measures forward time', () => {
    expect(monoSinceMs(100, { mono: 350, wall: new Date() })).toBe(250);
  });

  it('never goes negative', () => {
    expect(monoSinceMs(500, { mono: 499, wall: new Date() })).toBe(0);
  });
});
