/** Luxon weekday numbers: Monday = 1 ... Sunday = 7. */
export const WEEKDAYS: Readonly<Record<string, number>> = {
  monday: 1,
  mon: 1,
  tuesday: 2,
  tue: 2,
  tues: 2,
  wednesday: 3,
  wed: 3,
  thursday: 4,
  thu: 4,
  thur: 4,
  thurs: 4,
  friday: 5,
  fri: 5,
  saturday: 6,
  sat: 6,
  sunday: 7,
  sun: 7,
};

export const MONTHS: Readonly<Record<string, number>> = {
  january: 1,
  jan: 1,
  february: 2,
  feb: 2,
  march: 3,
  mar: 3,
  april: 4,
  apr: 4,
  may: 5,
  june: 6,
  jun: 6,
  july: 7,
  jul: 7,
  august: 8,
  aug: 8,
  september: 9,
  sep: 9,
  sept: 9,
  october: 10,
  oct: 10,
  november: 11,
  nov: 11,
  december: 12,
  dec: 12,
};

const NUMBER_WORDS: Readonly<Record<string, number>> = {
  a: 1,
  an: 1,
  one: 1,
  single: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  fourteen: 14,
  fifteen: 15,
  twenty: 20,
  thirty: 30,
};

export function parseCount(word: string): number | null {
  const normalized = word.trim().toLowerCase();
  if (/^\d+$/.test(normalized)) return Number(normalized);
  return NUMBER_WORDS[normalized] ?? null;
}

const alternation = (words: Iterable<string>) =>
  [...words].sort((a, b) => b.length - a.length).join('|');

export const WEEKDAY_PATTERN = alternation(Object.keys(WEEKDAYS));
export const MONTH_PATTERN = alternation(Object.keys(MONTHS));
export const COUNT_PATTERN = `\\d+|${alternation(Object.keys(NUMBER_WORDS))}`;
const ORDINAL = '(?:st|nd|rd|th)?';

/**
 * One date expression, used unanchored by the extractor.
 * Month names only match next to a day number so "may" in "I may take" is not a date.
 */
export const DATE_PIECE_PATTERN = [
  '(?:the\\s+)?day\\s+after\\s+tomorrow',
  'today',
  'tomorrow',
  'tmrw',
  'yesterday',
  'next\\s+week',
  `in\\s+(?:${COUNT_PATTERN})\\s+(?:days?|weeks?)`,
  `(?:(?:this|next|coming)\\s+)?(?:${WEEKDAY_PATTERN})`,
  '\\d{4}-\\d{2}-\\d{2}',
  `\\d{1,2}${ORDINAL}\\s+(?:of\\s+)?(?:${MONTH_PATTERN})\\.?(?:,?\\s+\\d{4})?`,
  `(?:${MONTH_PATTERN})\\.?\\s+\\d{1,2}${ORDINAL}(?:,?\\s+\\d{4})?`,
  '\\d{1,2}[/.]\\d{1,2}(?:[/.](?:\\d{4}|\\d{2}))?',
]
  .map((p) => `(?:${p})`)
  .join('|');

/** Words that link the two ends of a range. */
export const RANGE_LINK_PATTERN = '\\s+(?:to|until|till|through|thru|and)\\s+|\\s*[–—]\\s*|\\s*-\\s*';
