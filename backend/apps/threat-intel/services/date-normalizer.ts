import { log } from "backend/utils/log";

/**
 * Date normalization for everything that crosses a storage or scraping boundary.
 *
 * Postgres hands back Date objects, SQLite hands back strings and feeds use
 * whatever their CMS prints. Every value is reduced to a Date whose UTC fields
 * hold the wall-clock time; offsets are dropped, not applied.
 */

type Parts = [year: number, month: number, day: number, hour?: number, minute?: number, second?: number, millis?: number];

const MONTHS: Record<string, number> = {
  jan: 1, feb: 2, mar: 3, apr: 4, may: 5, jun: 6,
  jul: 7, aug: 8, sep: 9, oct: 10, nov: 11, dec: 12,
};

function buildDate(...[year, month, day, hour = 0, minute = 0, second = 0, millis = 0]: Parts): Date | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hour > 23 || minute > 59 || second > 59) return null;

  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second, millis));
  // Date.UTC rolls 31/02 over into March; reject instead
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
}

function fractionToMillis(fraction: string | undefined): number {
  if (!fraction) return 0;
  return Number(fraction.slice(0, 3).padEnd(3, "0"));
}

function num(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

function fromEpoch(value: number): Date | null {
  if (!Number.isFinite(value)) return null;
  // Anything below 1e11 is seconds (that is year 5138 in milliseconds)
  const millis = Math.abs(value) < 1e11 ? value * 1000 : value;
  const date = new Date(millis);
  return Number.isNaN(date.getTime()) ? null : date;
}

type DateParser = (input: string) => Date | null;

// Tried in order; the first parser that returns a date wins.
const PARSERS: DateParser[] = [
  // Epoch seconds / milliseconds
  (input) => (/^\d{10}$|^\d{13}$/.test(input) ? fromEpoch(Number(input)) : null),

  // ISO-8601, optional Z or offset
  (input) => {
    const m = /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2})(?::(\d{2})(?:[.,](\d+))?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i.exec(input);
    if (!m) return null;
    return buildDate(Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4]), Number(m[5]), num(m[6]), fractionToMillis(m[7]));
  },

  // SQL timestamp, as printed by Postgres text output and SQLite datetime()
  (input) => {
    const m = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:\s*(?:Z|UTC|[+-]\d{2}(?::?\d{2})?))?$/i.exec(input);
    if (!m) return null;
    return buildDate(Number(m[1]), Number(m[2]), Number(m[3]), Number(m[4]), Number(m[5]), Number(m[6]), fractionToMillis(m[7]));
  },

  // Date only
  (input) => {
    const m = /^(\d{4})[-/](\d{2})[-/](\d{2})$/.exec(input);
    return m ? buildDate(Number(m[1]), Number(m[2]), Number(m[3])) : null;
  },

  // 15/01/2024, falling back to 01/15/2024 when day-first is impossible
  (input) => {
    const m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/.exec(input);
    if (!m) return null;
    const [a, b, year] = [Number(m[1]), Number(m[2]), Number(m[3])];
    const time = [num(m[4]), num(m[5]), num(m[6])] as const;
    return buildDate(year, b, a, ...time) ?? buildDate(year, a, b, ...time);
  },

  // 15.01.2024 (Russian sources)
  (input) => {
    const m = /^(\d{1,2})\.(\d{1,2})\.(\d{4})(?:,?\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/.exec(input);
    if (!m) return null;
    return buildDate(Number(m[3]), Number(m[2]), Number(m[1]), num(m[4]), num(m[5]), num(m[6]));
  },

  // 2024年1月15日 (Chinese sources)
  (input) => {
    const m = /^(\d{4})年(\d{1,2})月(\d{1,2})日(?:\s*(\d{1,2}):(\d{2})(?::(\d{2}))?)?$/.exec(input);
    if (!m) return null;
    return buildDate(Number(m[1]), Number(m[2]), Number(m[3]), num(m[4]), num(m[5]), num(m[6]));
  },

  // RFC 2822, the RSS pubDate format
  (input) => {
    const m = /^(?:[A-Za-z]{3},?\s+)?(\d{1,2})\s+([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{4})(?:\s+(\d{1,2}):(\d{2})(?::(\d{2}))?)?(?:\s+(?:[+-]\d{4}|[A-Z]{1,5}))?$/.exec(input);
    if (!m) return null;
    const month = MONTHS[m[2].toLowerCase()];
    if (!month) return null;
    return buildDate(Number(m[3]), month, Number(m[1]), num(m[4]), num(m[5]), num(m[6]));
  },

  // January 15, 2024
  (input) => {
    const m = /^([A-Za-z]{3})[A-Za-z]*\.?\s+(\d{1,2}),?\s+(\d{4})$/.exec(input);
    if (!m) return null;
    const month = MONTHS[m[1].toLowerCase()];
    return month ? buildDate(Number(m[3]), month, Number(m[2])) : null;
  },
];

/**
 * Parses a date from any representation seen in storage or scraped pages.
 * Never throws; returns null when nothing matches.
 */
export function parseDateSafe(value: unknown): Date | null {
  if (value === null || value === undefined) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : new Date(value.getTime());
  }

  if (typeof value === "number") {
    return fromEpoch(value);
  }

  if (typeof value !== "string") {
    log(`Unexpected date type: ${typeof value}`, "date-normalizer", "debug");
    return null;
  }

  const input = value.trim();
  if (!input) return null;

  for (const parser of PARSERS) {
    const parsed = parser(input);
    if (parsed) return parsed;
  }

  log(`Could not parse date string: ${input}`, "date-normalizer", "debug");
  return null;
}

export function formatDateForStorage(value: unknown): string | null {
  const parsed = parseDateSafe(value);
  return parsed ? parsed.toISOString() : null;
}

export function formatDateForDisplay(value: unknown): string {
  const parsed = parseDateSafe(value);
  if (!parsed) return "Unknown date";
  return parsed.toISOString().slice(0, 19).replace("T", " ");
}

// Articles always carry a date; unparseable ones are stamped with now
export function normalizeDateForArticle(value: unknown, now: Date = new Date()): Date {
  return parseDateSafe(value) ?? new Date(now.getTime());
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function getDaysOld(value: unknown, now: Date = new Date()): number | null {
  const parsed = parseDateSafe(value);
  if (!parsed) return null;
  return Math.floor((now.getTime() - parsed.getTime()) / DAY_MS);
}

export function isRecentDate(value: unknown, daysThreshold = 7, now: Date = new Date()): boolean {
  const daysOld = getDaysOld(value, now);
  return daysOld !== null && daysOld <= daysThreshold;
}

export function daysAgo(days: number, now: Date = new Date()): Date {
  return new Date(now.getTime() - days * DAY_MS);
}

/**
 * Legacy vulnerability priority: CVSS weighted 0.7, recency over a 30-day
 * window weighted 0.3. Used for reporting, not for result ranking.
 */
export function priorityScore(cvssScore: number, publishedDate: unknown, now: Date = new Date()): number {
  const daysOld = getDaysOld(publishedDate, now) ?? 30;
  const recency = Math.max(0, 30 - daysOld) / 30;
  return 0.7 * (cvssScore / 10) + 0.3 * recency;
}
