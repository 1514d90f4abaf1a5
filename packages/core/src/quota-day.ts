/**
 * Reference-timezone quota boundaries.
 *
 * A quota day is the calendar date of an instant in the reference zone. The
 * boundary is that date's midnight in the same zone, so comparing a stored
 * UTC instant against it is the same as comparing calendar dates.
 */

import { formatInTimeZone, fromZonedTime } from 'date-fns-tz';

const DAY_FORMAT = 'yyyy-MM-dd';

/**
 * Throws RangeError for names the runtime's ICU data does not know.
 */
export function assertTimeZone(timeZone: string): void {
  new Intl.DateTimeFormat('en-US', { timeZone });
}

export function quotaDay(at: Date, timeZone: string): string {
  return formatInTimeZone(at, timeZone, DAY_FORMAT);
}

/**
 * Start of the quota day containing `now`: the first instant whose quota day
 * is today's. Where a DST change skips local midnight, that is the end of
 * the gap, not the wall-clock 00:00 `fromZonedTime` resolves into the
 * previous day.
 */
export function quotaBoundary(now: Date, timeZone: string): Date {
  const today = quotaDay(now, timeZone);
  const midnight = fromZonedTime(`${today}T00:00:00`, timeZone);
  if (quotaDay(midnight, timeZone) === today) return midnight;

  // Bisect (midnight, now]: `lo` is always yesterday, `hi` always today.
  let lo = midnight.getTime();
  let hi = now.getTime();
  while (hi - lo > 1) {
    const mid = Math.floor((lo + hi) / 2);
    if (quotaDay(new Date(mid), timeZone) === today) hi = mid;
    else lo = mid;
  }
  return new Date(hi);
}

/**
 * Whether a counter last reset at `lastResetAt` belongs to an earlier quota
 * day than `now`.
 */
export function isStaleReset(lastResetAt: Date, now: Date, timeZone: string): boolean {
  return quotaDay(lastResetAt, timeZone) < quotaDay(now, timeZone);
}
