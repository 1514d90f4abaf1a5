import { describe, it, expect } from 'vitest';
import { assertTimeZone, isStaleReset, quotaBoundary, quotaDay } from '../quota-day.js';

describe('quotaDay', () => {
  it('formats the calendar date in the reference zone', () => {
    const at = new Date('2025-03-10T20:00:00.000Z');
    expect(quotaDay(at, 'UTC')).toBe('2025-03-10');
    // 01:30 the next morning in India
    expect(quotaDay(at, 'Asia/Kolkata')).toBe('2025-03-11');
  });
});

describe('quotaBoundary', () => {
  it('is UTC midnight for the UTC zone', () => {
    expect(quotaBoundary(new Date('2025-03-10T08:00:00.000Z'), 'UTC').toISOString()).toBe(
      '2025-03-10T00:00:00.000Z',
    );
  });

  it('is local midnight for an offset zone', () => {
    expect(quotaBoundary(new Date('2025-03-10T20:00:00.000Z'), 'Asia/Kolkata').toISOString()).toBe(
      '2025-03-10T18:30:00.000Z',
    );
  });

  it('follows daylight saving changes', () => {
    // New York switches to EDT on 2025-03-09
    expect(quotaBoundary(new Date('2025-03-09T12:00:00.000Z'), 'America/New_York').toISOString()).toBe(
      '2025-03-09T05:00:00.000Z',
    );
    expect(quotaBoundary(new Date('2025-03-10T12:00:00.000Z'), 'America/New_York').toISOString()).toBe(
      '2025-03-10T04:00:00.000Z',
    );
  });

  it('starts after the gap when local midnight is skipped', () => {
    // Santiago jumps from 00:00 (-04) to 01:00 (-03) on 2025-09-07
    const now = new Date('2025-09-07T12:00:00.000Z');
    const boundary = quotaBoundary(now, 'America/Santiago');
    expect(boundary.toISOString()).toBe('2025-09-07T04:00:00.000Z');
    expect(quotaDay(boundary, 'America/Santiago')).toBe('2025-09-07');
    expect(quotaDay(new Date(boundary.getTime() - 1), 'America/Santiago')).toBe('2025-09-06');
  });

  it('agrees with isStaleReset across a skipped midnight', () => {
    const now = new Date('2025-09-07T12:00:00.000Z');
    // 23:30 local on 2025-09-06
    const lastResetAt = new Date('2025-09-07T03:30:00.000Z');
    const boundary = quotaBoundary(now, 'America/Santiago');
    expect(lastResetAt.getTime() < boundary.getTime()).toBe(true);
    expect(isStaleReset(lastResetAt, now, 'America/Santiago')).toBe(true);
  });
});

describe('isStaleReset', () => {
  it('compares calendar days in the reference zone', () => {
    const before = new Date('2025-03-10T18:29:59.000Z');
    const after = new Date('2025-03-10T18:30:00.000Z');
    expect(isStaleReset(before, after, 'Asia/Kolkata')).toBe(true);
    expect(isStaleReset(before, after, 'UTC')).toBe(false);
  });

  it('is false for the same instant', () => {
    const at = new Date('2025-03-10T00:00:00.000Z');
    expect(isStaleReset(at, at, 'UTC')).toBe(false);
  });
});

describe('assertTimeZone', () => {
  it('accepts IANA names', () => {
    expect(() => assertTimeZone('Asia/Kolkata')).not.toThrow();
  });

  it('throws RangeError for unknown zones', () => {
    expect(() => assertTimeZone('Mars/Olympus_Mons')).toThrow(RangeError);
  });
});
