import { DateTime } from 'luxon';

import { addDays, fromISODate, isISODate, toISODate } from '@utils/time.js';

import { MONTHS, WEEKDAYS, parseCount } from './date.lexicon.js';
import type { NormalizedDate } from './nlu.types.js';

type Piece =
  | { kind: 'day'; date: string }
  | { kind: 'week'; start: string; end: string }
  | { kind: 'weekday'; weekday: number }
  | { kind: 'monthDay'; month: number; day: number; year?: number }
  | { kind: 'numeric'; first: number; second: number; year?: number }
  | { kind: 'dayOnly'; day: number }
  | { kind: 'unparseable' };

type Resolved = { kind: 'ok'; date: string } | Extract<NormalizedDate, { kind: 'ambiguous' | 'unparseable' }>;

const RANGE_SPLIT = /\s+(?:to|until|till|through|thru|and)\s+|\s*[–—]\s*|\s+-\s+|(?<=[a-z])-(?=[a-z])/;

function clean(text: string): string {
  return text
    .toLowerCase()
    .replace(/[!?,;]+$/g, '')
    .replace(/\.$/, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/^(?:on|the)\s+/, '');
}

function calendarDate(year: number, month: number, day: number): string | null {
  const dt = DateTime.fromObject({ year, month, day }, { zone: 'utc' });
  return dt.isValid ? toISODate(dt) : null;
}

function plusYears(iso: string, years: number): string {
  return toISODate(fromISODate(iso).plus({ years }));
}

function expandYear(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const year = Number(raw);
  return raw.length === 2 ? 2000 + year : year;
}

function parsePiece(raw: string, reference: string): Piece {
  const text = clean(raw);

  if (text === 'today') return { kind: 'day', date: reference };
  if (text === 'tomorrow' || text === 'tmrw') return { kind: 'day', date: addDays(reference, 1) };
  if (/^(?:the )?day after tomorrow$/.test(text)) return { kind: 'day', date: addDays(reference, 2) };
  if (text === 'yesterday') return { kind: 'day', date: addDays(reference, -1) };

  if (text === 'next week') {
    const monday = toISODate(fromISODate(reference).startOf('week').plus({ weeks: 1 }));
    return { kind: 'week', start: monday, end: addDays(monday, 4) };
  }

  const inMatch = /^in (\w+) (days?|weeks?)$/.exec(text);
  if (inMatch) {
    const count = parseCount(inMatch[1]);
    if (count === null) return { kind: 'unparseable' };
    const unit = inMatch[2].startsWith('week') ? 7 : 1;
    return { kind: 'day', date: addDays(reference, count * unit) };
  }

  const weekdayMatch = /^(?:(?:this|next|coming) )?([a-z]+)$/.exec(text);
  if (weekdayMatch && WEEKDAYS[weekdayMatch[1]] !== undefined) {
    return { kind: 'weekday', weekday: WEEKDAYS[weekdayMatch[1]] };
  }

  if (isISODate(text)) return { kind: 'day', date: text };

  const dayFirst = /^(\d{1,2})(?:st|nd|rd|th)? (?:of )?([a-z]+)\.?(?:,? (\d{4}))?$/.exec(text);
  if (dayFirst && MONTHS[dayFirst[2]] !== undefined) {
    return {
      kind: 'monthDay',
      month: MONTHS[dayFirst[2]],
      day: Number(dayFirst[1]),
      year: expandYear(dayFirst[3]),
    };
  }

  const monthFirst = /^([a-z]+)\.? (\d{1,2})(?:st|nd|rd|th)?(?:,? (\d{4}))?$/.exec(text);
  if (monthFirst && MONTHS[monthFirst[1]] !== undefined) {
    return {
      kind: 'monthDay',
      month: MONTHS[monthFirst[1]],
      day: Number(monthFirst[2]),
      year: expandYear(monthFirst[3]),
    };
  }

  const numeric = /^(\d{1,2})[/.](\d{1,2})(?:[/.](\d{4}|\d{2}))?$/.exec(text);
  if (numeric) {
    return {
      kind: 'numeric',
      first: Number(numeric[1]),
      second: Number(numeric[2]),
      year: expandYear(numeric[3]),
    };
  }

  const dayOnly = /^(\d{1,2})(?:st|nd|rd|th)?$/.exec(text);
  if (dayOnly) return { kind: 'dayOnly', day: Number(dayOnly[1]) };

  return { kind: 'unparseable' };
}

/** Day/month and month/day readings of a numeric date, dropping the invalid ones. */
function numericReadings(piece: Extract<Piece, { kind: 'numeric' }>, year: number): string[] {
  const dayMonth = calendarDate(year, piece.second, piece.first);
  const monthDay = calendarDate(year, piece.first, piece.second);
  const readings = [dayMonth, monthDay].filter((d): d is string => d !== null);
  return [...new Set(readings)];
}

/** Resolves a standalone date, or the start of a range, against the reference date. */
function resolveAnchor(piece: Piece, raw: string, reference: string): Resolved {
  const refDate = fromISODate(reference);

  const notPast = (date: string, inferredYear: boolean): Resolved => {
    if (date >= reference) return { kind: 'ok', date };
    const candidates = inferredYear ? [date, plusYears(date, 1)] : [date];
    return { kind: 'ambiguous', raw, candidates, reason: 'past' };
  };

  switch (piece.kind) {
    case 'day':
      return notPast(piece.date, false);
    case 'weekday': {
      const delta = (piece.weekday - refDate.weekday + 7) % 7 || 7;
      return { kind: 'ok', date: addDays(reference, delta) };
    }
    case 'monthDay': {
      const date = calendarDate(piece.year ?? refDate.year, piece.month, piece.day);
      if (!date) return { kind: 'unparseable', raw };
      return notPast(date, piece.year === undefined);
    }
    case 'numeric': {
      const readings = numericReadings(piece, piece.year ?? refDate.year);
      if (readings.length === 0) return { kind: 'unparseable', raw };
      if (readings.length > 1) {
        return { kind: 'ambiguous', raw, candidates: readings, reason: 'day_month_order' };
      }
      return notPast(readings[0], piece.year === undefined);
    }
    case 'dayOnly': {
      const date = calendarDate(refDate.year, refDate.month, piece.day);
      if (!date) return { kind: 'unparseable', raw };
      if (date >= reference) return { kind: 'ok', date };
      const nextMonth = refDate.plus({ months: 1 });
      const later = calendarDate(nextMonth.year, nextMonth.month, piece.day);
      const candidates = later ? [date, later] : [date];
      return { kind: 'ambiguous', raw, candidates, reason: 'past' };
    }
    case 'week':
    case 'unparseable':
      return { kind: 'unparseable', raw };
  }
}

/** Resolves the end of a range relative to its already resolved start. */
function resolveEnd(piece: Piece, raw: string, start: string): Resolved {
  const startDate = fromISODate(start);

  // Year-less end: same year as the start, wrapping into the next year only across a month boundary.
  const sameYearOrWrap = (month: number, day: number): Resolved => {
    const date = calendarDate(startDate.year, month, day);
    if (!date) return { kind: 'unparseable', raw };
    if (date >= start) return { kind: 'ok', date };
    if (month < startDate.month) {
      const wrapped = calendarDate(startDate.year + 1, month, day);
      return wrapped ? { kind: 'ok', date: wrapped } : { kind: 'unparseable', raw };
    }
    return { kind: 'ambiguous', raw, candidates: [date, plusYears(date, 1)], reason: 'range_order' };
  };

  switch (piece.kind) {
    case 'day':
      return { kind: 'ok', date: piece.date };
    case 'weekday': {
      const delta = (piece.weekday - startDate.weekday + 7) % 7;
      return { kind: 'ok', date: addDays(start, delta) };
    }
    case 'monthDay': {
      if (piece.year !== undefined) {
        const date = calendarDate(piece.year, piece.month, piece.day);
        return date ? { kind: 'ok', date } : { kind: 'unparseable', raw };
      }
      return sameYearOrWrap(piece.month, piece.day);
    }
    case 'numeric': {
      const readings = numericReadings(piece, piece.year ?? startDate.year);
      if (readings.length === 0) return { kind: 'unparseable', raw };
      if (readings.length > 1) {
        return { kind: 'ambiguous', raw, candidates: readings, reason: 'day_month_order' };
      }
      if (piece.year !== undefined) return { kind: 'ok', date: readings[0] };
      const only = fromISODate(readings[0]);
      return sameYearOrWrap(only.month, only.day);
    }
    case 'dayOnly': {
      const date = calendarDate(startDate.year, startDate.month, piece.day);
      if (!date) return { kind: 'unparseable', raw };
      if (date >= start) return { kind: 'ok', date };
      const nextMonth = startDate.plus({ months: 1 });
      const later = calendarDate(nextMonth.year, nextMonth.month, piece.day);
      return {
        kind: 'ambiguous',
        raw,
        candidates: later ? [date, later] : [date],
        reason: 'range_order',
      };
    }
    case 'week':
    case 'unparseable':
      return { kind: 'unparseable', raw };
  }
}

/**
 * Normalizes a single date expression (no range splitting).
 * Weekday names resolve to their first occurrence strictly after `reference`.
 */
export function normalizeDate(expression: string, reference: string): NormalizedDate {
  const piece = parsePiece(expression, reference);
  if (piece.kind === 'week') {
    return { kind: 'range', start: piece.start, end: piece.end };
  }
  const resolved = resolveAnchor(piece, expression, reference);
  return resolved.kind === 'ok' ? { kind: 'date', date: resolved.date } : resolved;
}

export function normalizeRange(
  startExpression: string,
  endExpression: string,
  reference: string,
): NormalizedDate {
  const raw = `${startExpression} to ${endExpression}`;
  const startPiece = parsePiece(startExpression, reference);
  const endPiece = parsePiece(endExpression, reference);
  if (startPiece.kind === 'unparseable' || endPiece.kind === 'unparseable') {
    return { kind: 'unparseable', raw };
  }

  const start = resolveAnchor(startPiece, raw, reference);
  if (start.kind !== 'ok') return start;

  const end = resolveEnd(endPiece, raw, start.date);
  if (end.kind !== 'ok') return end;

  return { kind: 'range', start: start.date, end: end.date };
}

/** Splits "from X to Y" style ranges before normalizing; single expressions pass through. */
export function normalizeDateExpression(expression: string, reference: string): NormalizedDate {
  const text = clean(expression).replace(/^(?:from|between) /, '');
  const parts = text.split(RANGE_SPLIT);
  if (parts.length === 2 && parts[0] && parts[1]) {
    return normalizeRange(parts[0], parts[1], reference);
  }
  return normalizeDate(text, reference);
}

/** Both endpoints count: a one-day leave ends on its start date. */
export function endForDuration(start: string, days: number): string {
  return addDays(start, Math.max(1, Math.floor(days)) - 1);
}
