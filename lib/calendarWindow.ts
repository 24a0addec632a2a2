import type { CalendarDate } from "@/types";
import { formatDate, parseCalendarDate } from "@/lib/normalize/date";

export interface DateRange {
  /** Inclusive. */
  from: CalendarDate;
  /** Exclusive. */
  to: CalendarDate;
}

/** First day of today's month up to (not including) the first day two months later. */
export function currentAndNextMonthRange(today: CalendarDate): DateRange {
  const { year, month } = parseCalendarDate(today);
  const endMonth = month + 2;
  return {
    from: formatDate({ year, month, day: 1 }),
    to: formatDate({
      year: endMonth > 12 ? year + 1 : year,
      month: endMonth > 12 ? endMonth - 12 : endMonth,
      day: 1,
    }),
  };
}
