import * as chrono from 'chrono-node';
import type { DateStatus } from '../models/event';

export interface DateTextResult {
  status: DateStatus;
  dateStart: string | null;
  dateEnd: string | null;
  phrases: string[];
}

const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

const MONTH_SOURCE =
  '(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)\\.?';
const DAY_SOURCE = '(\\d{1,2})(?:st|nd|rd|th)?';
const YEAR_SOURCE = '(?:,?\\s+(\\d{4}))?';

const RANGE_PATTERN = new RegExp(`\\b${MONTH_SOURCE}\\s+${DAY_SOURCE}\\s*[-–—]\\s*${DAY_SOURCE}${YEAR_SOURCE}\\b`, 'gi');
const PHRASE_PATTERN = new RegExp(`\\b${MONTH_SOURCE}\\s+${DAY_SOURCE}${YEAR_SOURCE}\\b`, 'gi');

const ISO_DATE_PREFIX = /^\d{4}-\d{2}-\d{2}/;
const PLAIN_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

interface CalendarDay {
  year: number;
  month: number;
  day: number;
}

interface RangePhrase {
  text: string;
  key: string;
  start: CalendarDay;
  endDay: number;
}

interface SinglePhrase {
  text: string;
  key: string;
  day: CalendarDay;
}

/**
 * Classifies the calendar dates mentioned in a block of scraped text.
 *
 * - `range`: one explicit "Month D-D[, YYYY]" phrase and nothing else
 * - `single`: exactly one distinct "Month D[, YYYY]" phrase
 * - `multiple`: several distinct phrases that do not form a clean range
 * - `unclear`: no phrase, or a phrase that does not resolve to a real day
 *
 * Parsed dates are always midnight UTC; a missing year means the current UTC year.
 */
export function parseDateText(text: string | null | undefined, now: Date = new Date()): DateTextResult {
  const { ranges, singles } = collectDatePhrases(text ?? '', now.getUTCFullYear());
  const phrases = [...ranges.map(range => range.text), ...singles.map(single => single.text)];

  if (ranges.length === 1 && singles.length === 0) {
    const [range] = ranges;
    const start = resolveCalendarDay(range.start);
    const end = resolveCalendarDay({ ...range.start, day: range.endDay });
    if (!start || !end || end.getTime() < start.getTime()) {
      return { status: 'unclear', dateStart: null, dateEnd: null, phrases };
    }
    return { status: 'range', dateStart: start.toISOString(), dateEnd: end.toISOString(), phrases };
  }

  if (ranges.length === 0 && singles.length === 1) {
    const resolved = resolveCalendarDay(singles[0].day);
    if (!resolved) {
      return { status: 'unclear', dateStart: null, dateEnd: null, phrases };
    }
    return { status: 'single', dateStart: resolved.toISOString(), dateEnd: null, phrases };
  }

  if (ranges.length + singles.length === 0) {
    return { status: 'unclear', dateStart: null, dateEnd: null, phrases };
  }

  return { status: 'multiple', dateStart: null, dateEnd: null, phrases };
}

export function countDatePhrases(text: string | null | undefined, now: Date = new Date()): number {
  const { ranges, singles } = collectDatePhrases(text ?? '', now.getUTCFullYear());
  return ranges.length + singles.length;
}

/**
 * ISO-first timestamp parsing for values that are already machine formatted.
 * A timestamp without a zone designator is read as UTC; anything else falls
 * back to its first ten characters as a plain date. Returns null instead of throwing.
 */
export function parseIsoDate(value: unknown): string | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value !== 'string') {
    return null;
  }

  const text = value.trim();
  if (!text) {
    return null;
  }

  if (ISO_DATE_PREFIX.test(text)) {
    const withSeparator = text.replace(' ', 'T');
    const candidate = withSeparator.length === 10
      ? `${withSeparator}T00:00:00Z`
      : ZONE_SUFFIX.test(withSeparator) ? withSeparator : `${withSeparator}Z`;
    const parsed = new Date(candidate);
    if (!Number.isNaN(parsed.getTime())) {
      return parsed.toISOString();
    }
  }

  const match = text.slice(0, 10).match(PLAIN_DATE);
  if (!match) {
    return null;
  }
  const plain = toUtcMidnight({
    year: Number.parseInt(match[1], 10),
    month: Number.parseInt(match[2], 10),
    day: Number.parseInt(match[3], 10),
  });
  return plain ? plain.toISOString() : null;
}

export function isValidTimestamp(value: unknown): boolean {
  return parseIsoDate(value) !== null;
}

function collectDatePhrases(text: string, defaultYear: number): { ranges: RangePhrase[]; singles: SinglePhrase[] } {
  const ranges = new Map<string, RangePhrase>();
  for (const match of text.matchAll(RANGE_PATTERN)) {
    const month = monthIndex(match[1]);
    const year = match[4] ? Number.parseInt(match[4], 10) : defaultYear;
    const startDay = Number.parseInt(match[2], 10);
    const endDay = Number.parseInt(match[3], 10);
    const key = `${year}-${month}-${startDay}-${endDay}`;
    if (!ranges.has(key)) {
      ranges.set(key, { text: match[0], key, start: { year, month, day: startDay }, endDay });
    }
  }

  const remainder = text.replace(RANGE_PATTERN, ' ');
  const singles = new Map<string, SinglePhrase>();
  for (const match of remainder.matchAll(PHRASE_PATTERN)) {
    const month = monthIndex(match[1]);
    const year = match[3] ? Number.parseInt(match[3], 10) : defaultYear;
    const day = Number.parseInt(match[2], 10);
    const key = `${year}-${month}-${day}`;
    if (!singles.has(key)) {
      singles.set(key, { text: match[0], key, day: { year, month, day } });
    }
  }

  return { ranges: Array.from(ranges.values()), singles: Array.from(singles.values()) };
}

function monthIndex(token: string): number {
  const prefix = token.slice(0, 3).toLowerCase();
  const index = MONTH_NAMES.findIndex(name => name.slice(0, 3).toLowerCase() === prefix);
  return index + 1;
}

/**
 * Runs the phrase through chrono's strict parser and rebuilds the day at UTC
 * midnight, so a wall-clock time or the parser's implied hour never leaks in.
 */
function resolveCalendarDay(day: CalendarDay): Date | null {
  if (day.month < 1 || day.month > 12) {
    return null;
  }
  const phrase = `${MONTH_NAMES[day.month - 1]} ${day.day}, ${day.year}`;
  const [result] = chrono.strict.parse(phrase, new Date(Date.UTC(day.year, 0, 1)));
  if (!result) {
    return null;
  }

  const year = result.start.get('year');
  const month = result.start.get('month');
  const dayOfMonth = result.start.get('day');
  if (year !== day.year || month !== day.month || dayOfMonth !== day.day) {
    return null;
  }

  return toUtcMidnight(day);
}

function toUtcMidnight(day: CalendarDay): Date | null {
  const date = new Date(Date.UTC(day.year, day.month - 1, day.day));
  if (
    Number.isNaN(date.getTime()) ||
    date.getUTCFullYear() !== day.year ||
    date.getUTCMonth() !== day.month - 1 ||
    date.getUTCDate() !== day.day
  ) {
    return null;
  }
  return date;
}
