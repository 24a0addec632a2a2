import type { CalendarDate, Event, VenueConfig, WallTime } from "@/types";
import type { RawListing, SkippedListing } from "@/lib/scrapers/types";
import { TimeParseError, errorMessage } from "@/lib/errors";
import { parseDate } from "./date";
import { formatTime, parseTime } from "./time";
import { cleanArtistList, joinArtists } from "./artists";
import { extractCost } from "./cost";

export type AssemblyResult =
  | { ok: true; event: Event }
  | { ok: false; reason: string };

function normalizeTime(timeText: string | null): WallTime | null {
  if (!timeText) return null;
  try {
    const parsed = parseTime(timeText);
    return parsed ? formatTime(parsed) : null;
  } catch (e) {
    if (!(e instanceof TimeParseError)) throw e;
    // Time is optional: drop it rather than guess.
    console.warn(`[extract] ignoring time: ${e.message}`);
    return null;
  }
}

/**
 * Turn one listing's raw fields into an Event. Date and at least one
 * artist are required; time and cost are left null when absent.
 */
export function assembleEvent(raw: RawListing, venue: Pick<VenueConfig, "name">, today: CalendarDate): AssemblyResult {
  let date: CalendarDate;
  try {
    date = parseDate(raw.dateText, today);
  } catch (e) {
    return { ok: false, reason: errorMessage(e) };
  }

  const artists = cleanArtistList(raw.artistTexts);
  if (artists.length === 0) {
    return { ok: false, reason: `no artist names in "${raw.artistTexts.join(" / ")}"` };
  }

  return {
    ok: true,
    event: {
      venue: venue.name,
      date,
      time: normalizeTime(raw.timeText),
      artists,
      url: raw.url.trim(),
      cost: raw.costText ? extractCost(raw.costText) : null,
    },
  };
}

export function assembleEvents(
  raws: RawListing[],
  venue: Pick<VenueConfig, "name">,
  today: CalendarDate
): { events: Event[]; skipped: SkippedListing[] } {
  const events: Event[] = [];
  const skipped: SkippedListing[] = [];
  for (const raw of raws) {
    const result = assembleEvent(raw, venue, today);
    if (result.ok) {
      events.push(result.event);
    } else {
      console.warn(`[extract] ${venue.name} listing ${raw.index} skipped: ${result.reason}`);
      skipped.push({ index: raw.index, stage: "assemble", reason: result.reason });
    }
  }
  return { events, skipped };
}

/** The dedup key: venue, date, joined artists and url. */
export function eventKey(event: Event): string {
  return [event.venue, event.date, joinArtists(event.artists), event.url].join("|");
}
