import { describe, expect, it } from 'vitest';

import {
  endForDuration,
  normalizeDate,
  normalizeDateExpression,
  normalizeRange,
} from '@services/ai/date.normalizer.js';

// 2024-01-01 is a Monday.
const MONDAY = '2024-01-01';

describe('normalizeDate', () => {
  it('resolves relative days against the reference date', () => {
    expect(normalizeDate('today', MONDAY)).toEqual({ kind: 'date', date: '2024-01-01' });
    expect(normalizeDate('tomorrow', MONDAY)).toEqual({ kind: 'date', date: '2024-01-02' });
    expect(normalizeDate('day after tomorrow', MONDAY)).toEqual({ kind: 'date', date: '2024-01-03' });
    expect(normalizeDate('in 3 days', MONDAY)).toEqual({ kind: 'date', date: '2024-01-04' });
    expect(normalizeDate('in two weeks', MONDAY)).toEqual({ kind: 'date', date: '2024-01-15' });
  });

  it('picks the first matching weekday strictly after the reference', () => {
    expect(normalizeDate('next Friday', MONDAY)).toEqual({ kind: 'date', date: '2024-01-05' });
    expect(normalizeDate('Monday', MONDAY)).toEqual({ kind: 'date', date: '2024-01-08' });
    expect(normalizeDate('on tue', MONDAY)).toEqual({ kind: 'date', date: '2024-01-02' });
  });

  it('expands next week to Monday through Friday', () => {
    expect(normalizeDate('next week', '2024-01-03')).toEqual({
      kind: 'range',
      start: '2024-01-08',
      end: '2024-01-12',
    });
  });

  it('reads month names in either order', () => {
    expect(normalizeDate('15 Jan', MONDAY)).toEqual({ kind: 'date', date: '2024-01-15' });
    expect(normalizeDate('March 3rd, 2025', MONDAY)).toEqual({ kind: 'date', date: '2025-03-03' });
    expect(normalizeDate('2024-02-29', MONDAY)).toEqual({ kind: 'date', date: '2024-02-29' });
  });

  it('offers both years when a year-less date has already passed', () => {
    expect(normalizeDate('3 March', '2024-06-10')).toEqual({
      kind: 'ambiguous',
      raw: '3 March',
      candidates: ['2024-03-03', '2025-03-03'],
      reason: 'past',
    });
  });

  it('flags numeric dates that read both ways', () => {
    expect(normalizeDate('5/3', MONDAY)).toEqual({
      kind: 'ambiguous',
      raw: '5/3',
      candidates: ['2024-03-05', '2024-05-03'],
      reason: 'day_month_order',
    });
    expect(normalizeDate('13/3', MONDAY)).toEqual({ kind: 'date', date: '2024-03-13' });
  });

  it('reports text it cannot place on the calendar', () => {
    expect(normalizeDate('someday', MONDAY)).toEqual({ kind: 'unparseable', raw: 'someday' });
    expect(normalizeDate('31 Feb', MONDAY)).toEqual({ kind: 'unparseable', raw: '31 Feb' });
  });
});

describe('normalizeRange', () => {
  it('takes a bare day number as the end in the start month', () => {
    expect(normalizeRange('Jan 15', '20', MONDAY)).toEqual({
      kind: 'range',
      start: '2024-01-15',
      end: '2024-01-20',
    });
  });

  it('wraps a year-less end into the next year across December', () => {
    expect(normalizeRange('Dec 30', 'Jan 2', '2024-12-20')).toEqual({
      kind: 'range',
      start: '2024-12-30',
      end: '2025-01-02',
    });
  });

  it('asks when an end in the same month lands before the start', () => {
    expect(normalizeRange('Jan 20', 'Jan 15', MONDAY)).toEqual({
      kind: 'ambiguous',
      raw: 'Jan 20 to Jan 15',
      candidates: ['2024-01-15', '2025-01-15'],
      reason: 'range_order',
    });
  });

  it('resolves a weekday end on or after the start', () => {
    expect(normalizeRange('tomorrow', 'friday', MONDAY)).toEqual({
      kind: 'range',
      start: '2024-01-02',
      end: '2024-01-05',
    });
  });
});

describe('normalizeDateExpression', () => {
  it('splits "from X to Y" phrases', () => {
    expect(normalizeDateExpression('from 8 Jan to 10 Jan', MONDAY)).toEqual({
      kind: 'range',
      start: '2024-01-08',
      end: '2024-01-10',
    });
  });

  it('passes single expressions through', () => {
    expect(normalizeDateExpression('Tomorrow.', MONDAY)).toEqual({ kind: 'date', date: '2024-01-02' });
  });
});

describe('endForDuration', () => {
  it('counts the start date as the first day', () => {
    expect(endForDuration('2024-01-05', 1)).toBe('2024-01-05');
    expect(endForDuration('2024-01-05', 3)).toBe('2024-01-07');
  });
});
