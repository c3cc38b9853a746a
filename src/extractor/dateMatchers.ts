import type { Dayjs } from 'dayjs';
import { NumericDateOrder } from '../types/index.js';
import { dayjs, to24Hour, zonedCalendarDate, zonedDateTime } from '../utils/time.js';

export interface MatchContext {
  zone: string;
  now: Date;
  numericDateOrder: NumericDateOrder;
}

export interface DateMatcher {
  readonly name: string;
  tryParse(text: string, context: MatchContext): Dayjs | null;
}

const MONTH =
  '(Jan(?:uary)?|Feb(?:ruary)?|Mar(?:ch)?|Apr(?:il)?|May|June?|July?|Aug(?:ust)?|Sep(?:t(?:ember)?)?|Oct(?:ober)?|Nov(?:ember)?|Dec(?:ember)?)\\b\\.?';
const TIME = '(\\d{1,2}):(\\d{2})(?:\\s*([AP]M)\\b)?';

const MONTH_INDEX: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function monthNumber(name: string): number {
  return MONTH_INDEX[name.slice(0, 3).toLowerCase()] ?? 0;
}

function regexMatcher(
  name: string,
  pattern: RegExp,
  build: (match: RegExpMatchArray, context: MatchContext) => Dayjs | null
): DateMatcher {
  return {
    name,
    tryParse(text, context) {
      const match = text.match(pattern);
      return match ? build(match, context) : null;
    },
  };
}

function wallClock(
  context: MatchContext,
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  meridiem?: string
): Dayjs | null {
  const h = to24Hour(hour, meridiem);
  if (h === null) return null;
  return zonedDateTime(context.zone, year, month, day, h, minute);
}

export const isoDateTime = regexMatcher(
  'iso',
  /(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?\s*(Z|[+-]\d{2}:?\d{2})?/i,
  (m, { zone }) => {
    const parts = [m[1], m[2], m[3], m[4], m[5], m[6] ?? '0'].map(Number);
    const [year, month, day, hour, minute, second] = parts;
    const offset = m[7];
    if (!offset) return zonedDateTime(zone, year, month, day, hour, minute, second);

    const asUtc = zonedDateTime('UTC', year, month, day, hour, minute, second);
    if (!asUtc) return null;
    let offsetMinutes = 0;
    if (offset.toUpperCase() !== 'Z') {
      const sign = offset.startsWith('-') ? -1 : 1;
      const digits = offset.slice(1).replace(':', '');
      offsetMinutes = sign * (Number(digits.slice(0, 2)) * 60 + Number(digits.slice(2)));
    }
    return dayjs(asUtc.valueOf() - offsetMinutes * 60_000).tz(zone);
  }
);

export const japaneseDateTime = regexMatcher(
  'japanese',
  /(\d{4})\s*年\s*(\d{1,2})\s*月\s*(\d{1,2})\s*日(?:\s*[(（][^)）]*[)）])?[\s,、]*(午前|午後)?\s*(\d{1,2})[:：](\d{2})/,
  (m, context) =>
    wallClock(context, Number(m[1]), Number(m[2]), Number(m[3]), Number(m[5]), Number(m[6]), m[4])
);

// "1 May 2024, 11:59 PM", "Wednesday, 1 May 2024 23:59"
export const englishDayMonth = regexMatcher(
  'english-day-month',
  new RegExp(`\\b(\\d{1,2})(?:st|nd|rd|th)?\\s+${MONTH},?\\s+(\\d{4})\\b.*?${TIME}`, 'i'),
  (m, context) =>
    wallClock(context, Number(m[3]), monthNumber(m[2]), Number(m[1]), Number(m[4]), Number(m[5]), m[6])
);

// "May 1, 2024 at 11:59 PM"
export const englishMonthDay = regexMatcher(
  'english-month-day',
  new RegExp(`${MONTH}\\s+(\\d{1,2})(?:st|nd|rd|th)?,?\\s+(\\d{4})\\b.*?${TIME}`, 'i'),
  (m, context) =>
    wallClock(context, Number(m[3]), monthNumber(m[1]), Number(m[2]), Number(m[4]), Number(m[5]), m[6])
);

export const numericYearFirst = regexMatcher(
  'numeric-year-first',
  new RegExp(`\\b(\\d{4})[/.-](\\d{1,2})[/.-](\\d{1,2})\\b.*?${TIME}`, 'i'),
  (m, context) =>
    wallClock(context, Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4]), Number(m[5]), m[6])
);

export const numericYearLast = regexMatcher(
  'numeric-year-last',
  new RegExp(`\\b(\\d{1,2})[/.-](\\d{1,2})[/.-](\\d{4})\\b.*?${TIME}`, 'i'),
  (m, context) => {
    const first = Number(m[1]);
    const second = Number(m[2]);
    const [day, month] = context.numericDateOrder === 'DMY' ? [first, second] : [second, first];
    return wallClock(context, Number(m[3]), month, day, Number(m[4]), Number(m[5]), m[6]);
  }
);

const RELATIVE_OFFSETS: Record<string, number> = {
  today: 0,
  tomorrow: 1,
  yesterday: -1,
  今日: 0,
  本日: 0,
  明日: 1,
  昨日: -1,
};

export const relativeDay: DateMatcher = {
  name: 'relative',
  tryParse(text, context) {
    const word = text.match(/\b(today|tomorrow|yesterday)\b|(今日|本日|明日|昨日)/i);
    if (!word || word.index === undefined) return null;

    const rest = text.slice(word.index + word[0].length);
    const time = rest.match(/(午前|午後)?\s*(\d{1,2})[:：](\d{2})(?:\s*([AP]M)\b)?/i);
    if (!time) return null;

    const offset = RELATIVE_OFFSETS[word[0].toLowerCase()] ?? 0;
    const { year, month, day } = zonedCalendarDate(context.now, context.zone, offset);
    return wallClock(context, year, month, day, Number(time[2]), Number(time[3]), time[1] ?? time[4]);
  },
};

/** Tried in order; the first matcher that returns a timestamp wins. */
export const DEFAULT_MATCHERS: readonly DateMatcher[] = [
  isoDateTime,
  japaneseDateTime,
  englishDayMonth,
  englishMonthDay,
  numericYearFirst,
  numericYearLast,
  relativeDay,
];

export function normalizeDueText(
  text: string,
  context: MatchContext,
  matchers: readonly DateMatcher[] = DEFAULT_MATCHERS
): Dayjs | null {
  const clean = text.replace(/\s+/g, ' ').trim();
  if (!clean) return null;

  for (const matcher of matchers) {
    const parsed = matcher.tryParse(clean, context);
    if (parsed) return parsed;
  }
  return null;
}
