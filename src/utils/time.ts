import { DateTime } from 'luxon';

import { config } from '@config/env.config.js';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/** Calendar dates are handled as 'yyyy-MM-dd' strings and computed in UTC to stay clear of DST shifts. */
export function fromISODate(iso: string): DateTime {
  return DateTime.fromISO(iso, { zone: 'utc' }).startOf('day');
}

export function toISODate(dt: DateTime): string {
  return dt.toFormat('yyyy-LL-dd');
}

export function isISODate(value: string): boolean {
  return ISO_DATE.test(value) && fromISODate(value).isValid;
}

export function todayISO(tz: string = config.TIMEZONE, now: Date = new Date()): string {
  return toISODate(DateTime.fromJSDate(now).setZone(tz));
}

export function addDays(iso: string, days: number): string {
  return toISODate(fromISODate(iso).plus({ days }));
}

/** Whole days from `from` to `to`; negative when `to` is earlier. */
export function diffDays(from: string, to: string): number {
  return Math.round(fromISODate(to).diff(fromISODate(from), 'days').days);
}

/** Inclusive list of dates; empty when `end` precedes `start`. */
export function eachDate(start: string, end: string): string[] {
  const out: string[] = [];
  for (let cursor = start; cursor <= end; cursor = addDays(cursor, 1)) {
    out.push(cursor);
  }
  return out;
}

export function isWeekend(iso: string): boolean {
  return fromISODate(iso).weekday >= 6;
}

/** Inclusive overlap of two date ranges. */
export function overlaps(aStart: string, aEnd: string, bStart: string, bEnd: string): boolean {
  return aStart <= bEnd && bStart <= aEnd;
}
