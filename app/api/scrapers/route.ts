import { NextResponse } from "next/server";
import { getScrapers } from "@/lib/scrapers/registry";
import { VENUES_CONFIG, calendarUrl } from "@/lib/venues";

export const dynamic = "force-dynamic";

export async function GET() {
  const registered = new Set(getScrapers().map((s) => s.id));
  return NextResponse.json({
    venues: VENUES_CONFIG.map((v) => ({
      id: v.id,
      name: v.name,
      calendarUrl: calendarUrl(v),
      enabled: v.enabled !== false,
      starred: v.starred === true,
      hasScraper: registered.has(v.scraper),
    })),
  });
}
