/**
 * Natural-language date phrases → concrete date ranges (English + Indonesian).
 *
 * Calendar phrases snap to ISO week / month / year boundaries; rolling
 * windows count back from today. "today" is injectable so results are
 * reproducible.
 */
import {
  endOfISOWeek,
  endOfMonth,
  format,
  isValid,
  startOfISOWeek,
  startOfMonth,
  subDays,
  subMonths,
  subWeeks,
} from 'date-fns';
import type { DateRange } from './types.js';

const TODAY = new Set(['today', 'hari ini']);
const YESTERDAY = new Set(['yesterday', 'kemarin']);
const THIS_WEEK = new Set(['this week', 'minggu ini']);
const LAST_WEEK = new Set(['last week', 'minggu lalu', 'minggu kemarin']);
const THIS_MONTH = new Set(['this month', 'bulan ini']);
const LAST_MONTH = new Set(['last month', 'bulan lalu', 'bulan kemarin']);
const THIS_YEAR = new Set(['this year', 'tahun ini']);
const LAST_YEAR = new Set(['last year', 'tahun lalu', 'tahun kemarin']);

const QUARTER = /(?:\bq|\bkuartal\s*|\bquarter\s*|\btriwulan\s*)([1-4])\b/;
const ROLLING_DAYS = /^(\d+)\s*(?:days?|hari)\b/;
const YEAR = /\b(20\d{2})\b/;

const ENGLISH_DAY_COUNTS: ReadonlyMap<string, number> = new Map([
  ['seven', 7],
  ['fourteen', 14],
  ['thirty', 30],
  ['sixty', 60],
  ['ninety', 90],
]);

const INDONESIAN_DAY_COUNTS: ReadonlyMap<string, number> = new Map([
  ['tujuh', 7],
  ['sepuluh', 10],
  ['empat belas', 14],
  ['lima belas', 15],
  ['dua puluh', 20],
  ['tiga puluh', 30],
  ['enam puluh', 60],
  ['sembilan puluh', 90],
]);

/** Month names → zero-based month index. */
const MONTHS: ReadonlyMap<string, number> = new Map([
  ['january', 0], ['february', 1], ['march', 2], ['april', 3], ['may', 4], ['june', 5],
  ['july', 6], ['august', 7], ['september', 8], ['october', 9], ['november', 10], ['december', 11],
  ['januari', 0], ['februari', 1], ['maret', 2], ['mei', 4], ['juni', 5], ['juli', 6],
  ['agustus', 7], ['oktober', 9], ['desember', 11],
]);

const MONTH_NAME = new RegExp(`\\b(${[...MONTHS.keys()].join('|')})\\b`);

/**
 * Date expressions recognized inside a free-text query, most specific first.
 * The first one found is handed to parseNaturalDate.
 */
const QUERY_DATE_EXPRESSIONS: readonly RegExp[] = [
  // Calendar-based
  /\blast week\b/,
  /\bminggu lalu\b/,
  /\bminggu kemarin\b/,
  /\bthis week\b/,
  /\bminggu ini\b/,
  /\bthis month\b/,
  /\bbulan ini\b/,
  /\blast month\b/,
  /\bbulan lalu\b/,
  /\bbulan kemarin\b/,
  /\bthis year\b/,
  /\btahun ini\b/,
  /\blast year\b/,
  /\btahun lalu\b/,
  /\btahun kemarin\b/,
  // Quarters
  /\bq[1-4]\b/,
  /\bkuartal\s*[1-4]\b/,
  /\bquarter\s*[1-4]\b/,
  /\btriwulan\s*[1-4]\b/,
  // Rolling windows
  /\b\d+\s*(?:days?|hari)\b/,
  /\b(?:seven|fourteen|thirty|sixty|ninety)\s*days\b/,
  /\b(?:tujuh|sepuluh|empat belas|lima belas|dua puluh|tiga puluh|enam puluh|sembilan puluh)\s*hari\b/,
  // Named months ("may" only with a year: it is also a verb)
  /\b(?:january|february|march|april|june|july|august|september|october|november|december|januari|februari|maret|mei|juni|juli|agustus|oktober|desember)(?:\s+20\d{2})?\b/,
  /\bmay\s+20\d{2}\b/,
  // Specific days
  /\byesterday\b/,
  /\bkemarin\b/,
  /\btoday\b/,
  /\bhari ini\b/,
];

/** Format as YYYY-MM-DD (local calendar date). */
export function toIsoDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

function range(start: Date, end: Date): DateRange {
  return { startDate: toIsoDate(start), endDate: toIsoDate(end) };
}

/** Null when the window reaches past the representable date range. */
function rollingWindow(days: number, today: Date): DateRange | null {
  if (!Number.isSafeInteger(days)) return null;
  const start = subDays(today, days);
  return isValid(start) ? range(start, today) : null;
}

function quarterRange(quarter: number, year: number): DateRange {
  const firstMonth = (quarter - 1) * 3;
  return range(new Date(year, firstMonth, 1), endOfMonth(new Date(year, firstMonth + 2, 1)));
}

/**
 * Parse a date phrase into an inclusive range, or null if it is not one.
 *
 * Rules, first match wins: single days, ISO weeks, months, years, quarters of
 * the current year, rolling "N days" windows, then named months.
 */
export function parseNaturalDate(phrase: string, today: Date = new Date()): DateRange | null {
  const p = phrase.trim().toLowerCase();

  if (TODAY.has(p)) return range(today, today);
  if (YESTERDAY.has(p)) {
    const yesterday = subDays(today, 1);
    return range(yesterday, yesterday);
  }

  if (THIS_WEEK.has(p)) return range(startOfISOWeek(today), today);
  if (LAST_WEEK.has(p)) {
    const previous = subWeeks(today, 1);
    return range(startOfISOWeek(previous), endOfISOWeek(previous));
  }

  if (THIS_MONTH.has(p)) return range(startOfMonth(today), today);
  if (LAST_MONTH.has(p)) {
    const previous = subMonths(startOfMonth(today), 1);
    return range(previous, endOfMonth(previous));
  }

  const year = today.getFullYear();
  if (THIS_YEAR.has(p)) return range(new Date(year, 0, 1), today);
  if (LAST_YEAR.has(p)) return range(new Date(year - 1, 0, 1), new Date(year - 1, 11, 31));

  const quarter = QUARTER.exec(p);
  if (quarter) return quarterRange(Number(quarter[1]), year);

  const rolling = ROLLING_DAYS.exec(p);
  if (rolling) return rollingWindow(Number(rolling[1]), today);

  for (const [word, days] of INDONESIAN_DAY_COUNTS) {
    if (p.includes(`${word} hari`)) return rollingWindow(days, today);
  }
  for (const [word, days] of ENGLISH_DAY_COUNTS) {
    if (p.includes(`${word} days`)) return rollingWindow(days, today);
  }

  const month = MONTH_NAME.exec(p);
  if (month) {
    const monthIndex = MONTHS.get(month[1]);
    if (monthIndex !== undefined) {
      const explicitYear = YEAR.exec(p);
      const first = new Date(explicitYear ? Number(explicitYear[1]) : year, monthIndex, 1);
      return range(first, endOfMonth(first));
    }
  }

  return null;
}

/** The first date expression in a query, lower-cased, or null. */
export function extractDateExpression(query: string): string | null {
  const q = query.toLowerCase();
  for (const pattern of QUERY_DATE_EXPRESSIONS) {
    const match = pattern.exec(q);
    if (match) return match[0];
  }
  return null;
}

/** Resolve the query's date expression, if it has one that parses. */
export function resolveQueryDateRange(query: string, today: Date = new Date()): DateRange | null {
  const expression = extractDateExpression(query);
  return expression ? parseNaturalDate(expression, today) : null;
}
