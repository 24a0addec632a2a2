import { TimeParseError } from "@/lib/errors";
import type { WallTime } from "@/types";

export interface WallClock {
  /** 0-23 */
  hours: number;
  minutes: number;
}

/** "8:00 PM", "8.30pm", "11:00 p.m." anywhere in the text. */
const CLOCK_PATTERN = /(\d{1,2})[:.](\d{2})\s*([ap])\.?\s?m\b\.?/i;

/** "8pm", "9 PM" when no minutes are given. */
const HOUR_PATTERN = /(?<![\d:.])(\d{1,2})\s*([ap])\.?\s?m\b\.?/i;

function to24Hour(hours: number, minutes: number, meridiem: string, source: string): WallClock {
  if (hours < 1 || hours > 12) throw new TimeParseError(`Hour out of range in "${source}"`);
  if (minutes > 59) throw new TimeParseError(`Minute out of range in "${source}"`);
  const pm = meridiem.toLowerCase() === "p";
  if (hours === 12) return { hours: pm ? 12 : 0, minutes };
  return { hours: pm ? hours + 12 : hours, minutes };
}

/**
 * Find the first 12-hour clock time in free text (e.g. "Show\n8:00 PM")
 * and convert it to 24-hour time. Returns null when there is none; some
 * listings only give a date.
 */
export function parseTime(text: string): WallClock | null {
  const clock = text.match(CLOCK_PATTERN);
  if (clock) {
    return to24Hour(Number.parseInt(clock[1], 10), Number.parseInt(clock[2], 10), clock[3], text.trim());
  }
  const hour = text.match(HOUR_PATTERN);
  if (hour) {
    return to24Hour(Number.parseInt(hour[1], 10), 0, hour[2], text.trim());
  }
  return null;
}

export function formatTime({ hours, minutes }: WallClock): WallTime {
  return `${String(hours).padStart(2, "0")}:${String(minutes).padStart(2, "0")}`;
}
