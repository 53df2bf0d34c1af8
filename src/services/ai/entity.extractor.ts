import { loadVocabulary, type Vocabulary } from '@config/data.loader.js';

import type { LeaveType } from '@core/interfaces/index.js';

import {
  COUNT_PATTERN,
  DATE_PIECE_PATTERN,
  MONTHS,
  RANGE_LINK_PATTERN,
  WEEKDAYS,
  parseCount,
} from './date.lexicon.js';
import type {
  DateExpressionSpan,
  DurationSpan,
  EmployeeReferenceSpan,
  EntitySpan,
  LeaveTypeSpan,
} from './nlu.types.js';

const RANGE_GAP = new RegExp(`^(?:${RANGE_LINK_PATTERN})$`, 'i');
const RANGE_PREFIX = /(?:from|between)\s+$/i;
const BARE_DAY_END =
  /^(\s+(?:to|until|till|through|thru)\s+|\s*[–—-]\s*)(\d{1,2}(?:st|nd|rd|th)?)\b(?!\s*(?:days?|weeks?)\b|[/.]\d)/i;

const DURATION = new RegExp(
  `\\b(?:for\\s+)?(${COUNT_PATTERN})[\\s-]+(?:(?:full|whole|working)\\s+)?(days?|weeks?)\\b`,
  'gi',
);
const SINGLE_DAY = /\b(?:same day|that day only|just that day|only that day|just the day|just one day|only one day)\b/gi;

const EMPLOYEE_ID = /\b[Ee]?(\d{4,6})\b/g;
const EMPLOYEE_NAME =
  /\b(?:[Ii] am|[Ii]'m|[Mm]y name is|[Tt]his is|[Ee]mployee(?: name)?(?: is)?|[Oo]n behalf of)\s+([A-Z][a-zA-Z'-]+(?:\s+[A-Z][a-zA-Z'-]+)?)/g;

const NAME_STOPWORDS = new Set([
  'and',
  'for',
  'from',
  'i',
  'leave',
  'need',
  'next',
  'on',
  'this',
  'today',
  'tomorrow',
  'want',
]);

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function overlapsAny(start: number, end: number, spans: EntitySpan[]): boolean {
  return spans.some((s) => start < s.end && s.start < end);
}

/** Years are not employee ids, e.g. "2025" in "leave in 2025". */
function looksLikeYear(digits: string): boolean {
  if (digits.length !== 4) return false;
  const n = Number(digits);
  return n >= 2020 && n <= 2035;
}

export class EntityExtractor {
  private readonly synonymTypes = new Map<string, LeaveType[]>();
  private readonly typeNames = new Set<string>();
  private readonly synonymPattern: RegExp | null;

  constructor(vocabulary: Vocabulary = loadVocabulary()) {
    for (const entry of vocabulary.leaveTypes) {
      const type = entry.type.toLowerCase();
      this.typeNames.add(type);
      for (const word of new Set([type, ...entry.synonyms.map((s) => s.toLowerCase())])) {
        const types = this.synonymTypes.get(word) ?? [];
        if (!types.includes(type)) types.push(type);
        this.synonymTypes.set(word, types);
      }
    }
    const words = [...this.synonymTypes.keys()].sort((a, b) => b.length - a.length);
    this.synonymPattern = words.length
      ? new RegExp(`\\b(${words.map(escapeRegExp).join('|')})\\b`, 'gi')
      : null;
  }

  /** All leave types a word maps to; empty when the word is not in the vocabulary. */
  leaveTypesFor(word: string): LeaveType[] {
    return this.synonymTypes.get(word.trim().toLowerCase()) ?? [];
  }

  extract(utterance: string): EntitySpan[] {
    const spans: EntitySpan[] = [];
    spans.push(...this.extractDates(utterance));
    spans.push(...this.extractDurations(utterance, spans));
    spans.push(...this.extractLeaveTypes(utterance, spans));
    spans.push(...this.extractEmployees(utterance, spans));
    return spans.sort((a, b) => a.start - b.start);
  }

  private extractDates(text: string): DateExpressionSpan[] {
    const pieceRe = new RegExp(`\\b(?:${DATE_PIECE_PATTERN})\\b`, 'gi');
    const pieces: Array<{ text: string; start: number; end: number }> = [];
    for (const match of text.matchAll(pieceRe)) {
      const start = match.index ?? 0;
      pieces.push({ text: match[0], start, end: start + match[0].length });
    }

    const out: DateExpressionSpan[] = [];
    for (let i = 0; i < pieces.length; i += 1) {
      const piece = pieces[i];
      const prefix = RANGE_PREFIX.exec(text.slice(0, piece.start));
      const spanStart = prefix ? piece.start - prefix[0].length : piece.start;
      const next = pieces[i + 1];

      if (next && RANGE_GAP.test(text.slice(piece.end, next.start))) {
        out.push({
          kind: 'date_expression',
          text: text.slice(spanStart, next.end),
          start: spanStart,
          end: next.end,
          parts: [piece.text, next.text],
        });
        i += 1;
        continue;
      }

      const bareEnd = BARE_DAY_END.exec(text.slice(piece.end));
      if (bareEnd && /[a-z]/i.test(piece.text) && /\d/.test(piece.text)) {
        const end = piece.end + bareEnd[0].length;
        out.push({
          kind: 'date_expression',
          text: text.slice(spanStart, end),
          start: spanStart,
          end,
          parts: [piece.text, bareEnd[2]],
        });
        continue;
      }

      out.push({
        kind: 'date_expression',
        text: piece.text,
        start: piece.start,
        end: piece.end,
        parts: [piece.text],
      });
    }
    return out;
  }

  private extractDurations(text: string, taken: EntitySpan[]): DurationSpan[] {
    const out: DurationSpan[] = [];
    for (const match of text.matchAll(DURATION)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (overlapsAny(start, end, taken)) continue;
      const count = parseCount(match[1]);
      if (count === null || count <= 0) continue;
      const days = match[2].toLowerCase().startsWith('week') ? count * 7 : count;
      out.push({ kind: 'duration', text: match[0], start, end, days });
    }
    for (const match of text.matchAll(SINGLE_DAY)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (overlapsAny(start, end, [...taken, ...out])) continue;
      out.push({ kind: 'duration', text: match[0], start, end, days: 1 });
    }
    return out;
  }

  private extractLeaveTypes(text: string, taken: EntitySpan[]): LeaveTypeSpan[] {
    if (!this.synonymPattern) return [];
    const out: LeaveTypeSpan[] = [];
    for (const match of text.matchAll(this.synonymPattern)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (overlapsAny(start, end, taken)) continue;
      const word = match[0].toLowerCase();
      const candidates = this.synonymTypes.get(word) ?? [];
      if (!candidates.length) continue;
      out.push({
        kind: 'leave_type',
        text: match[0],
        start,
        end,
        candidates: [...candidates],
        confidence: this.typeNames.has(word) ? 1 : 0.8,
      });
    }
    return out;
  }

  private extractEmployees(text: string, taken: EntitySpan[]): EmployeeReferenceSpan[] {
    const out: EmployeeReferenceSpan[] = [];

    for (const match of text.matchAll(EMPLOYEE_ID)) {
      const start = match.index ?? 0;
      const end = start + match[0].length;
      if (overlapsAny(start, end, taken) || looksLikeYear(match[1])) continue;
      out.push({
        kind: 'employee_reference',
        text: match[0],
        start,
        end,
        reference: match[1],
        form: 'id',
        confidence: 1,
      });
    }

    for (const match of text.matchAll(EMPLOYEE_NAME)) {
      const words = match[1].split(/\s+/);
      const isStopword = (w: string) => {
        const lower = w.toLowerCase();
        return (
          NAME_STOPWORDS.has(lower) ||
          WEEKDAYS[lower] !== undefined ||
          MONTHS[lower] !== undefined ||
          this.synonymTypes.has(lower)
        );
      };
      if (isStopword(words[0])) continue;
      const name = words.length > 1 && isStopword(words[1]) ? words[0] : match[1];
      const start = (match.index ?? 0) + match[0].length - match[1].length;
      const end = start + name.length;
      if (overlapsAny(start, end, [...taken, ...out])) continue;
      out.push({
        kind: 'employee_reference',
        text: name,
        start,
        end,
        reference: name,
        form: 'name',
        confidence: 0.7,
      });
    }
    return out;
  }
}
