import { NextRequest, NextResponse } from "next/server";
import { currentAndNextMonthRange } from "@/lib/calendarWindow";
import { loadConfig } from "@/lib/config";
import { errorMessage } from "@/lib/errors";
import { todayInTimeZone } from "@/lib/scrapers/timezone";
import type { EventFilter } from "@/lib/storage/eventStore";
import { getEventStore } from "@/lib/storage/db";
import { getVenueById } from "@/lib/venues";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";

/**
 * GET /api/events?view=upcoming|month&venue=<venue id>&pinned=true
 * "month" lists the current and next calendar month; default is upcoming.
 */
export async function GET(req: NextRequest) {
  const { searchParams } = new URL(req.url ?? "/", "http://localhost");
  const view = searchParams.get("view") ?? "upcoming";
  const venueId = searchParams.get("venue");
  const today = todayInTimeZone(new Date(), loadConfig().timeZone);

  const filter: EventFilter = { today, pinnedOnly: searchParams.get("pinned") === "true" };
  if (view === "month") {
    Object.assign(filter, currentAndNextMonthRange(today));
  } else if (view === "upcoming") {
    filter.futureOnly = true;
  } else {
    return NextResponse.json({ error: `Unknown view "${view}"` }, { status: 400 });
  }

  if (venueId) {
    const venue = getVenueById(venueId);
    if (!venue) {
      return NextResponse.json({ error: `Venue "${venueId}" not found` }, { status: 404 });
    }
    filter.venue = venue.name;
  }

  try {
    return NextResponse.json({ events: getEventStore().getEvents(filter) });
  } catch (e) {
    console.error("GET /api/events error:", e);
    return NextResponse.json({ events: [], error: errorMessage(e) }, { status: 500 });
  }
}
