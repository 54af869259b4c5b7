import { DeadlineInputError } from "../lib/errors";
import { MONTH_NAMES, monthNumber, type FieldOrder } from "./patterns";

/** ISO calendar date, `YYYY-MM-DD`. No time, no zone. */
export type CalendarDate = string;

export type DateParts = { year: number; month: number; day: number };

/** A raw date match before validation. Discarded once resolved. */
export type DateCandidate = {
  day: string;
  month: string;
  year: string;
  sourceSpan: { start: number; end: number; text: string };
};

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86_400_000;

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

function isLeapYear(y: number) {
  return (y % 4 === 0 && y % 100 !== 0) || y % 400 === 0;
}

function daysInMonth(y: number, m: number) {
  if (m === 2) return isLeapYear(y) ? 29 : 28;
  return [4, 6, 9, 11].includes(m) ? 30 : 31;
}

function isValidParts({ year, month, day }: DateParts) {
  return (
    Number.isInteger(year) &&
    Number.isInteger(month) &&
    Number.isInteger(day) &&
    year >= 1 &&
    year <= 9999 &&
    month >= 1 &&
    month <= 12 &&
    day >= 1 &&
    day <= daysInMonth(year, month)
  );
}

function fromParts(p: DateParts): CalendarDate {
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}`;
}

export function toParts(date: CalendarDate): DateParts {
  const m = ISO_DATE.exec(date);
  if (!m) {
    throw new DeadlineInputError("date", `not a calendar date: "${date}"`);
  }
  return { year: Number(m[1]), month: Number(m[2]), day: Number(m[3]) };
}

export function isCalendarDate(value: unknown): value is CalendarDate {
  if (typeof value !== "string") return false;
  const m = ISO_DATE.exec(value);
  if (!m) return false;
  return isValidParts({
    year: Number(m[1]),
    month: Number(m[2]),
    day: Number(m[3]),
  });
}

export function assertCalendarDate(
  value: unknown,
  field = "date"
): asserts value is CalendarDate {
  if (!isCalendarDate(value)) {
    const shown = typeof value === "string" ? `"${value}"` : String(value);
    throw new DeadlineInputError(
      field,
      `expected a YYYY-MM-DD calendar date, got ${shown}`
    );
  }
}

/* ---------------- Normalisation ---------------- */

/** Fixed century rule: 00–49 → 2000s, 50–99 → 1900s. */
export function resolveTwoDigitYear(yy: number): number {
  return yy < 50 ? 2000 + yy : 1900 + yy;
}

function toMonth(month: number | string): number | null {
  if (typeof month === "number") return month;
  const trimmed = month.trim();
  if (/^\d{1,2}$/.test(trimmed)) return Number(trimmed);
  return monthNumber(trimmed);
}

function toYear(year: number | string): number | null {
  if (typeof year === "number") {
    return year >= 0 && year < 100 ? resolveTwoDigitYear(year) : year;
  }
  const trimmed = year.trim();
  if (/^\d{2}$/.test(trimmed)) return resolveTwoDigitYear(Number(trimmed));
  if (/^\d{4}$/.test(trimmed)) return Number(trimmed);
  return null;
}

/**
 * Turns a day/month/year triple into a calendar date. The month may be a
 * number or a name ("Dec", "sept", "December"). Impossible dates are
 * rejected, never rolled over.
 */
export function normalizeDate(
  day: number | string,
  month: number | string,
  year: number | string
): CalendarDate | null {
  const d = typeof day === "number" ? day : Number(day.trim());
  const m = toMonth(month);
  const y = toYear(year);
  if (m === null || y === null) return null;
  const parts = { year: y, month: m, day: d };
  return isValidParts(parts) ? fromParts(parts) : null;
}

export function candidateFromMatch(
  match: RegExpMatchArray,
  order: FieldOrder
): DateCandidate | null {
  const [text, a, b, c] = match;
  if (a === undefined || b === undefined || c === undefined) return null;
  const start = match.index ?? 0;
  const sourceSpan = { start, end: start + text.length, text };
  switch (order) {
    case "dmy":
      return { day: a, month: b, year: c, sourceSpan };
    case "mdy":
      return { day: b, month: a, year: c, sourceSpan };
    case "ymd":
      return { day: c, month: b, year: a, sourceSpan };
  }
}

export function resolveCandidate(c: DateCandidate): CalendarDate | null {
  return normalizeDate(c.day, c.month, c.year);
}

/* ---------------- Fixed-format strings ---------------- */

export const DATE_FORMATS = [
  "YYYY-MM-DD",
  "DD/MM/YYYY",
  "MM/DD/YYYY",
  "DD-MM-YYYY",
  "MM-DD-YYYY",
  "DD.MM.YYYY",
  "MM.DD.YYYY",
  "YYYY/MM/DD",
  "Month D, YYYY",
  "Mon D, YYYY",
  "D Month YYYY",
  "D Mon YYYY",
  "Month D YYYY",
  "Mon D YYYY",
] as const;

export type DateFormat = (typeof DATE_FORMATS)[number];

/**
 * Formats `formatDate` writes. Month-first numeric formats are read but never
 * written: with a day of 12 or less the day-first reading claims them.
 */
export const OUTPUT_FORMATS = [
  "YYYY-MM-DD",
  "DD/MM/YYYY",
  "DD-MM-YYYY",
  "DD.MM.YYYY",
  "YYYY/MM/DD",
  "Month D, YYYY",
  "Mon D, YYYY",
  "D Month YYYY",
  "D Mon YYYY",
  "Month D YYYY",
  "Mon D YYYY",
] as const satisfies readonly DateFormat[];

export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

type MonthStyle = "number" | "full" | "abbr";

type FormatRule = {
  pattern: RegExp;
  order: FieldOrder;
  monthStyle: MonthStyle;
};

const FULL_MONTHS = new Set(MONTH_NAMES.map((n) => n.toLowerCase()));

const numeric = (sep: string, order: FieldOrder): FormatRule => {
  const s = sep === "." ? "\\." : sep === "/" ? "\\/" : sep;
  const source =
    order === "ymd"
      ? `^(\\d{4})${s}(\\d{1,2})${s}(\\d{1,2})$`
      : `^(\\d{1,2})${s}(\\d{1,2})${s}(\\d{4})$`;
  return { pattern: new RegExp(source), order, monthStyle: "number" };
};

const MONTH_FIRST_COMMA = /^([a-z]+)\s+(\d{1,2}),\s*(\d{4})$/i;
const DAY_FIRST_NAME = /^(\d{1,2})\s+([a-z]+)\s+(\d{4})$/i;
const MONTH_FIRST = /^([a-z]+)\s+(\d{1,2})\s+(\d{4})$/i;

const FORMAT_RULES: Readonly<Record<DateFormat, FormatRule>> = Object.freeze({
  "YYYY-MM-DD": numeric("-", "ymd"),
  "DD/MM/YYYY": numeric("/", "dmy"),
  "MM/DD/YYYY": numeric("/", "mdy"),
  "DD-MM-YYYY": numeric("-", "dmy"),
  "MM-DD-YYYY": numeric("-", "mdy"),
  "DD.MM.YYYY": numeric(".", "dmy"),
  "MM.DD.YYYY": numeric(".", "mdy"),
  "YYYY/MM/DD": numeric("/", "ymd"),
  "Month D, YYYY": {
    pattern: MONTH_FIRST_COMMA,
    order: "mdy",
    monthStyle: "full",
  },
  "Mon D, YYYY": {
    pattern: MONTH_FIRST_COMMA,
    order: "mdy",
    monthStyle: "abbr",
  },
  "D Month YYYY": {
    pattern: DAY_FIRST_NAME,
    order: "dmy",
    monthStyle: "full",
  },
  "D Mon YYYY": {
    pattern: DAY_FIRST_NAME,
    order: "dmy",
    monthStyle: "abbr",
  },
  "Month D YYYY": {
    pattern: MONTH_FIRST,
    order: "mdy",
    monthStyle: "full",
  },
  "Mon D YYYY": {
    pattern: MONTH_FIRST,
    order: "mdy",
    monthStyle: "abbr",
  },
});

function monthAllowed(raw: string, style: MonthStyle) {
  if (style === "number") return /^\d{1,2}$/.test(raw);
  const key = raw.toLowerCase();
  if (style === "full") return FULL_MONTHS.has(key);
  return monthNumber(key) !== null;
}

function parseWith(text: string, rule: FormatRule): CalendarDate | null {
  const m = rule.pattern.exec(text);
  if (!m) return null;
  const candidate = candidateFromMatch(m, rule.order);
  if (!candidate || !monthAllowed(candidate.month, rule.monthStyle)) {
    return null;
  }
  return resolveCandidate(candidate);
}

/**
 * Tries every format in `DATE_FORMATS` order and returns the first parse.
 * The whole (trimmed) string has to match.
 */
export function parseDateString(text: string): CalendarDate | null {
  const trimmed = text.trim();
  for (const format of DATE_FORMATS) {
    const parsed = parseWith(trimmed, FORMAT_RULES[format]);
    if (parsed) return parsed;
  }
  return null;
}

export function formatDate(date: CalendarDate, format: OutputFormat): string {
  const { year, month, day } = toParts(date);
  const Y = pad(year, 4);
  const M = pad(month);
  const D = pad(day);
  const full = MONTH_NAMES[month - 1];
  const abbr = full.slice(0, 3);
  switch (format) {
    case "YYYY-MM-DD":
      return `${Y}-${M}-${D}`;
    case "DD/MM/YYYY":
      return `${D}/${M}/${Y}`;
    case "DD-MM-YYYY":
      return `${D}-${M}-${Y}`;
    case "DD.MM.YYYY":
      return `${D}.${M}.${Y}`;
    case "YYYY/MM/DD":
      return `${Y}/${M}/${D}`;
    case "Month D, YYYY":
      return `${full} ${day}, ${Y}`;
    case "Mon D, YYYY":
      return `${abbr} ${day}, ${Y}`;
    case "D Month YYYY":
      return `${day} ${full} ${Y}`;
    case "D Mon YYYY":
      return `${day} ${abbr} ${Y}`;
    case "Month D YYYY":
      return `${full} ${day} ${Y}`;
    case "Mon D YYYY":
      return `${abbr} ${day} ${Y}`;
  }
}

/* ---------------- Arithmetic ---------------- */

function toEpochDay(date: CalendarDate): number {
  const { year, month, day } = toParts(date);
  const d = new Date(0);
  d.setUTCFullYear(year, month - 1, day);
  return Math.round(d.getTime() / DAY_MS);
}

function fromEpochDay(n: number): CalendarDate {
  const d = new Date(n * DAY_MS);
  return fromParts({
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
  });
}

/** Current UTC date. */
export function todayISO(now: Date = new Date()): CalendarDate {
  return now.toISOString().slice(0, 10);
}

export function addDays(date: CalendarDate, days: number): CalendarDate {
  return fromEpochDay(toEpochDay(date) + days);
}

/** `b - a` in whole days. */
export function diffDays(a: CalendarDate, b: CalendarDate): number {
  return toEpochDay(b) - toEpochDay(a);
}

export function compareDates(a: CalendarDate, b: CalendarDate): number {
  return Math.sign(diffDays(b, a));
}

/** 0 = Sunday … 6 = Saturday. */
export function dayOfWeek(date: CalendarDate): number {
  // epoch day 0 (1970-01-01) was a Thursday
  return (((toEpochDay(date) + 4) % 7) + 7) % 7;
}
