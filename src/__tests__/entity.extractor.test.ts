import { describe, expect, it } from 'vitest';

import { EntityExtractor } from '@services/ai/entity.extractor.js';

const extractor = new EntityExtractor();

describe('EntityExtractor', () => {
  it('extracts leave type, date and duration from a full request', () => {
    expect(extractor.extract('I want sick leave next Friday for 1 day')).toEqual([
      {
        kind: 'leave_type',
        text: 'sick',
        start: 7,
        end: 11,
        candidates: ['sick'],
        confidence: 1,
      },
      {
        kind: 'date_expression',
        text: 'next Friday',
        start: 18,
        end: 29,
        parts: ['next Friday'],
      },
      { kind: 'duration', text: 'for 1 day', start: 30, end: 39, days: 1 },
    ]);
  });

  it('joins a range with a bare end day', () => {
    const spans = extractor.extract('casual leave from Jan 15 to 20');
    expect(spans.filter((s) => s.kind === 'date_expression')).toEqual([
      {
        kind: 'date_expression',
        text: 'from Jan 15 to 20',
        start: 13,
        end: 30,
        parts: ['Jan 15', '20'],
      },
    ]);
  });

  it('joins two full dates linked by "to"', () => {
    const spans = extractor.extract('leave 8 Jan to 10 Jan');
    expect(spans.filter((s) => s.kind === 'date_expression')).toEqual([
      {
        kind: 'date_expression',
        text: '8 Jan to 10 Jan',
        start: 6,
        end: 21,
        parts: ['8 Jan', '10 Jan'],
      },
    ]);
  });

  it('keeps every leave type a shared synonym maps to', () => {
    const spans = extractor.extract('Need 2 days PL');
    expect(spans).toEqual([
      { kind: 'duration', text: '2 days', start: 5, end: 11, days: 2 },
      {
        kind: 'leave_type',
        text: 'PL',
        start: 12,
        end: 14,
        candidates: ['casual', 'parental'],
        confidence: 0.8,
      },
    ]);
    expect(extractor.leaveTypesFor('pl')).toEqual(['casual', 'parental']);
    expect(extractor.leaveTypesFor('holiday')).toEqual([]);
  });

  it('counts weeks as seven days', () => {
    const spans = extractor.extract('parental leave for two weeks');
    expect(spans.filter((s) => s.kind === 'duration')).toEqual([
      { kind: 'duration', text: 'for two weeks', start: 15, end: 28, days: 14 },
    ]);
  });

  it('reads employee ids with or without the E prefix and skips years', () => {
    const spans = extractor.extract('E10002 needs leave on 2025-03-04');
    expect(spans.filter((s) => s.kind === 'employee_reference')).toEqual([
      {
        kind: 'employee_reference',
        text: 'E10002',
        start: 0,
        end: 6,
        reference: '10002',
        form: 'id',
        confidence: 1,
      },
    ]);
  });

  it('reads a self-introduced name', () => {
    const spans = extractor.extract("Hi, I'm Kavya Nair and I need leave tomorrow");
    expect(spans.filter((s) => s.kind === 'employee_reference')).toEqual([
      {
        kind: 'employee_reference',
        text: 'Kavya Nair',
        start: 8,
        end: 18,
        reference: 'Kavya Nair',
        form: 'name',
        confidence: 0.7,
      },
    ]);
  });

  it('does not take a month name without a day for a date', () => {
    const spans = extractor.extract('I may take a day off');
    expect(spans.filter((s) => s.kind === 'date_expression')).toEqual([]);
  });
});
