import { DEFAULT_TIMEZONE } from "@/types";
import type { CalendarDate } from "@/types";

const formatters = new Map<string, Intl.DateTimeFormat>();

function getFormatter(timeZone: string): Intl.DateTimeFormat {
  const existing = formatters.get(timeZone);
  if (existing) return existing;
  const fmt = new Intl.DateTimeFormat("en-CA", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
  });
  formatters.set(timeZone, fmt);
  return fmt;
}

/**
 * Today's calendar date in a venue timezone.
 *
 * Shorthand dates are inferred relative to the venue's local day, not the
 * server's (a UTC host is already "tomorrow" during SF evenings).
 */
export function todayInTimeZone(now = new Date(), timeZone = DEFAULT_TIMEZONE): CalendarDate {
  const parts = getFormatter(timeZone).formatToParts(now);
  const get = (type: Intl.DateTimeFormatPartTypes) =>
    parts.find((p) => p.type === type)?.value ?? "";
  return `${get("year")}-${get("month")}-${get("day")}`;
}
