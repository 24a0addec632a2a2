import { DateParseError } from "@/lib/errors";
import type { CalendarDate } from "@/types";

export interface DateParts {
  year: number;
  /** 1-12 */
  month: number;
  day: number;
}

const MONTHS: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  may: 5,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};

/** A shorthand date earlier than today by more than this many days belongs to next year. */
const ROLLOVER_GRACE_DAYS = 1;

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/** "8.20", "12/5" */
const SHORTHAND = /^(\d{1,2})[./](\d{1,2})$/;

/** "Wed, Jul 23, 2025", "Friday February 6 2026", "Sun, Jul 20", "July 4th, 2025" */
const TEXTUAL = /^(?:[A-Za-z]+\.?,?\s+)?([A-Za-z]+)\.?\s+(\d{1,2})(?:st|nd|rd|th)?(?:,?\s+(\d{4}))?$/;

export function monthFromName(name: string): number | null {
  return MONTHS[name.toLowerCase()] ?? null;
}

export function isValidDate({ year, month, day }: DateParts): boolean {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatDate({ year, month, day }: DateParts): CalendarDate {
  return `${year}-${pad(month)}-${pad(day)}`;
}

export function parseCalendarDate(value: CalendarDate): DateParts {
  const m = value.match(/^(\d{4})-(\d{2})-(\d{2})$/);
  if (!m) throw new DateParseError(`Not a calendar date: "${value}"`);
  const parts = {
    year: Number.parseInt(m[1], 10),
    month: Number.parseInt(m[2], 10),
    day: Number.parseInt(m[3], 10),
  };
  if (!isValidDate(parts)) throw new DateParseError(`Not a calendar date: "${value}"`);
  return parts;
}

function dayNumber({ year, month, day }: DateParts): number {
  return Date.UTC(year, month - 1, day) / MS_PER_DAY;
}

/**
 * Pick the year for a month/day listed without one: this year, unless that
 * date is already more than ROLLOVER_GRACE_DAYS behind today.
 */
export function inferYear(month: number, day: number, today: CalendarDate): DateParts {
  const now = parseCalendarDate(today);
  const current = { year: now.year, month, day };
  if (isValidDate(current) && dayNumber(current) >= dayNumber(now) - ROLLOVER_GRACE_DAYS) {
    return current;
  }
  const next = { year: now.year + 1, month, day };
  if (isValidDate(next)) return next;
  throw new DateParseError(`No valid year for ${month}/${day}`);
}

function parseShorthand(month: number, day: number, today: CalendarDate): DateParts {
  if (month < 1 || month > 12) throw new DateParseError(`Month out of range: ${month}`);
  if (day < 1 || day > 31) throw new DateParseError(`Day out of range: ${day}`);
  return inferYear(month, day, today);
}

function parseTextual(monthToken: string, day: number, yearToken: string | undefined, today: CalendarDate): DateParts {
  const month = monthFromName(monthToken);
  if (month == null) throw new DateParseError(`Unrecognized month "${monthToken}"`);
  if (yearToken === undefined) {
    if (day < 1 || day > 31) throw new DateParseError(`Day out of range: ${day}`);
    return inferYear(month, day, today);
  }
  const year = Number.parseInt(yearToken, 10);
  if (year < 2000 || year > 2099) throw new DateParseError(`Year out of range: ${year}`);
  const parts = { year, month, day };
  if (!isValidDate(parts)) throw new DateParseError(`Day out of range: ${formatDate(parts)}`);
  return parts;
}

/**
 * Parse a listing date relative to `today`.
 *
 * Accepts month.day shorthand ("8.20") and spelled-out dates with an
 * optional weekday and optional year ("Wed, Jul 23, 2025").
 * Throws DateParseError for anything else.
 */
export function parseDate(text: string, today: CalendarDate): CalendarDate {
  const trimmed = text.replace(/\s+/g, " ").trim();

  const short = trimmed.match(SHORTHAND);
  if (short) {
    return formatDate(parseShorthand(Number.parseInt(short[1], 10), Number.parseInt(short[2], 10), today));
  }

  const textual = trimmed.match(TEXTUAL);
  if (textual) {
    return formatDate(parseTextual(textual[1], Number.parseInt(textual[2], 10), textual[3], today));
  }

  throw new DateParseError(`Unrecognized date "${trimmed}"`);
}
