import type { LeaveType } from '@core/interfaces/index.js';

export type AmbiguityReason = 'past' | 'day_month_order' | 'range_order';

export type NormalizedDate =
  | { kind: 'date'; date: string }
  | { kind: 'range'; start: string; end: string }
  | { kind: 'unparseable'; raw: string }
  | { kind: 'ambiguous'; raw: string; candidates: string[]; reason: AmbiguityReason };

interface SpanBase {
  /** Substring of the utterance as written. */
  text: string;
  /** Offset of the first character in the utterance. */
  start: number;
  /** Offset just past the last character. */
  end: number;
}

export interface LeaveTypeSpan extends SpanBase {
  kind: 'leave_type';
  /** More than one candidate means the word is a synonym of several leave types. */
  candidates: LeaveType[];
  confidence: number;
}

export interface DateExpressionSpan extends SpanBase {
  kind: 'date_expression';
  /** One part for a single date, two linked parts for a range. */
  parts: string[];
}

export interface DurationSpan extends SpanBase {
  kind: 'duration';
  days: number;
}

export interface EmployeeReferenceSpan extends SpanBase {
  kind: 'employee_reference';
  reference: string;
  form: 'id' | 'name';
  confidence: number;
}

export type EntitySpan = LeaveTypeSpan | DateExpressionSpan | DurationSpan | EmployeeReferenceSpan;

export type EntityKind = EntitySpan['kind'];
