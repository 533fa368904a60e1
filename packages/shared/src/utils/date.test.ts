import { describe, it, expect } from 'vitest';
import { hasElapsed, subtractMs, addMs, subtractDays, formatCompactTimestamp } from './date.js';

const HOUR_MS = 60 * 60 * 1000;

describe('hasElapsed', () => {
  const since = new Date('2024-03-10T08:00:00.000Z');

  it('returns false before the duration has passed', () => {
    const now = new Date('2024-03-11T07:59:59.999Z');
    expect(hasElapsed(since, 24 * HOUR_MS, now)).toBe(false);
  });

  it('returns true exactly at the boundary', () => {
    const now = new Date('2024-03-11T08:00:00.000Z');
    expect(hasElapsed(since, 24 * HOUR_MS, now)).toBe(true);
  });

  it('returns true after the boundary', () => {
    const now = new Date('2024-03-12T09:00:00.000Z');
    expect(hasElapsed(since, 24 * HOUR_MS, now)).toBe(true);
  });
});

describe('date arithmetic', () => {
  const base = new Date('2024-03-10T08:00:00.000Z');

  it('subtractMs moves backwards', () => {
    expect(subtractMs(base, HOUR_MS).toISOString()).toBe('2024-03-10T07:00:00.000Z');
  });

  it('addMs moves forwards', () => {
    expect(addMs(base, HOUR_MS).toISOString()).toBe('2024-03-10T09:00:00.000Z');
  });

  it('subtractDays moves back whole days', () => {
    expect(subtractDays(base, 30).toISOString()).toBe('2024-02-09T08:00:00.000Z');
  });
});

describe('formatCompactTimestamp', () => {
  it('formats in UTC with zero padding', () => {
    expect(formatCompactTimestamp(new Date('2024-01-05T03:04:09.000Z'))).toBe('20240105_030409');
  });

  it('formats two-digit components unchanged', () => {
    expect(formatCompactTimestamp(new Date('2024-12-25T23:59:58.000Z'))).toBe('20241225_235958');
  });
});
