import type { CanonicalDate } from "./types.js";

export type DateFormatId =
  | "epoch-ms"
  | "iso"
  | "us-long"
  | "us-short"
  | "weekday-at"
  | "month-day-year"
  | "day-month-year";

/** Priority order used when a source does not narrow the formats. */
export const DEFAULT_DATE_FORMATS: readonly DateFormatId[] = [
  "epoch-ms",
  "iso",
  "us-long",
  "us-short",
  "weekday-at",
  "month-day-year",
  "day-month-year"
];

export type NormalizeResult =
  | { ok: true; date: CanonicalDate }
  | { ok: false; error: "invalid_date"; raw: string };

type DateParts = { year: number; month: number; day: number };

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December"
] as const;

const MONTH_LOOKUP: ReadonlyMap<string, number> = new Map<string, number>([
  ...MONTH_NAMES.flatMap((name, i): Array<[string, number]> => [
    [name.toLowerCase(), i + 1],
    [name.slice(0, 3).toLowerCase(), i + 1]
  ]),
  ["sept", 9]
]);

const WEEKDAYS = new Set([
  "mon", "monday",
  "tue", "tues", "tuesday",
  "wed", "wednesday",
  "thu", "thur", "thurs", "thursday",
  "fri", "friday",
  "sat", "saturday",
  "sun", "sunday"
]);

const CANONICAL_RE = /^(\d{4})-(\d{2})-(\d{2})$/;

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}

function validParts(year: number, month: number, day: number): DateParts | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return null;
  if (year < 1 || year > 9999) return null;
  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  return { year, month, day };
}

function monthNumber(name: string): number | undefined {
  return MONTH_LOOKUP.get(name.toLowerCase());
}

function validClock(hour: string | undefined, minute: string | undefined): boolean {
  if (hour === undefined || minute === undefined) return true;
  const h = Number(hour);
  const m = Number(minute);
  return h >= 1 && h <= 12 && m >= 0 && m <= 59;
}

function fromMonthName(year: string, monthName: string, day: string): DateParts | null {
  const month = monthNumber(monthName);
  if (month === undefined) return null;
  return validParts(Number(year), month, Number(day));
}

const EXACT_PARSERS: Record<DateFormatId, (s: string) => DateParts | null> = {
  "epoch-ms": (s) => {
    if (!/^\d{10,14}$/.test(s)) return null;
    // Local wall-clock day of the instant.
    const d = new Date(Number(s));
    if (Number.isNaN(d.getTime())) return null;
    return validParts(d.getFullYear(), d.getMonth() + 1, d.getDate());
  },
  iso: (s) => {
    const m = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/.exec(s);
    if (!m) return null;
    return validParts(Number(m[1]), Number(m[2]), Number(m[3]));
  },
  "us-long": (s) => {
    const m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/.exec(s);
    if (!m) return null;
    return validParts(Number(m[3]), Number(m[1]), Number(m[2]));
  },
  "us-short": (s) => {
    const m = /^(\d{1,2})\/(\d{1,2})\/(\d{2})$/.exec(s);
    if (!m) return null;
    const yy = Number(m[3]);
    const year = yy >= 69 ? 1900 + yy : 2000 + yy;
    return validParts(year, Number(m[1]), Number(m[2]));
  },
  "weekday-at": (s) => {
    const m =
      /^([A-Za-z]+),\s+([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})(?:\s+at\s+(\d{1,2}):(\d{2})\s*[AaPp][Mm])?$/.exec(s);
    if (!m) return null;
    const [, weekday = "", monthName = "", day = "", year = "", hour, minute] = m;
    if (!WEEKDAYS.has(weekday.toLowerCase())) return null;
    if (!validClock(hour, minute)) return null;
    return fromMonthName(year, monthName, day);
  },
  "month-day-year": (s) => {
    const m = /^([A-Za-z]+)\.?\s+(\d{1,2}),\s*(\d{4})$/.exec(s);
    if (!m) return null;
    return fromMonthName(m[3] ?? "", m[1] ?? "", m[2] ?? "");
  },
  "day-month-year": (s) => {
    const m = /^(\d{1,2})\s+([A-Za-z]+)\.?\s+(\d{4})$/.exec(s);
    if (!m) return null;
    return fromMonthName(m[3] ?? "", m[2] ?? "", m[1] ?? "");
  }
};

// Substring searches for dates embedded in free text, most specific first.
const EMBEDDED_PATTERNS: readonly RegExp[] = [
  /[A-Za-z]+,\s+[A-Za-z]+\.?\s+\d{1,2},?\s+\d{4}(?:\s+at\s+\d{1,2}:\d{2}\s*[AaPp][Mm])?/g,
  /[A-Za-z]+\.?\s+\d{1,2},\s*\d{4}/g,
  /\b\d{1,2}\s+[A-Za-z]+\.?\s+\d{4}\b/g,
  /\b\d{1,2}\/\d{1,2}\/(?:\d{4}|\d{2})\b/g,
  /\b\d{4}-\d{2}-\d{2}\b/g
];

function parseExact(s: string, formats: readonly DateFormatId[]): DateParts | null {
  for (const id of formats) {
    const parts = EXACT_PARSERS[id](s);
    if (parts) return parts;
  }
  return null;
}

function formatParts(parts: DateParts): CanonicalDate {
  return `${String(parts.year).padStart(4, "0")}-${pad2(parts.month)}-${pad2(parts.day)}`;
}

/**
 * Parse a heterogeneous date string into a canonical `YYYY-MM-DD` key.
 *
 * Exact formats are tried in `formats` order on the trimmed input; when none
 * matches, date-like substrings are extracted from the text and retried.
 * Epoch-millisecond values resolve to the local day of the running process.
 */
export function normalizeDate(
  raw: string | number | null | undefined,
  formats: readonly DateFormatId[] = DEFAULT_DATE_FORMATS
): NormalizeResult {
  const text = raw === null || raw === undefined ? "" : String(raw).trim();
  if (!text) return { ok: false, error: "invalid_date", raw: text };

  const exact = parseExact(text, formats);
  if (exact) return { ok: true, date: formatParts(exact) };

  for (const pattern of EMBEDDED_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      const parts = parseExact(match[0].trim(), formats);
      if (parts) return { ok: true, date: formatParts(parts) };
    }
  }

  return { ok: false, error: "invalid_date", raw: text };
}

export function isCanonicalDate(value: string): boolean {
  const m = CANONICAL_RE.exec(value);
  if (!m) return false;
  return validParts(Number(m[1]), Number(m[2]), Number(m[3])) !== null;
}

/** Local calendar day of `date`. */
export function localDayKey(date: Date): CanonicalDate {
  return formatParts({ year: date.getFullYear(), month: date.getMonth() + 1, day: date.getDate() });
}

export function addDays(date: CanonicalDate, days: number): CanonicalDate {
  const m = CANONICAL_RE.exec(date);
  if (!m) throw new Error(`not a canonical date: ${date}`);
  const shifted = new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3]) + days));
  return formatParts({
    year: shifted.getUTCFullYear(),
    month: shifted.getUTCMonth() + 1,
    day: shifted.getUTCDate()
  });
}

export function splitCanonicalDate(date: CanonicalDate): DateParts {
  const m = CANONICAL_RE.exec(date);
  const parts = m ? validParts(Number(m[1]), Number(m[2]), Number(m[3])) : null;
  if (!parts) throw new Error(`not a canonical date: ${date}`);
  return parts;
}
