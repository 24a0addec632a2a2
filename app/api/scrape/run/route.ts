import { NextRequest, NextResponse } from "next/server";
import { createResponseCache } from "@/lib/cache/responseCache";
import { loadConfig } from "@/lib/config";
import { createFetcher } from "@/lib/scrapers/fetchHtml";
import { ingest, scrapeAll } from "@/lib/scrapers/pipeline";
import type { VenueRunResult } from "@/lib/scrapers/pipeline";
import { getEventStore } from "@/lib/storage/db";
import { errorMessage } from "@/lib/errors";
import { getEnabledVenues } from "@/lib/venues";

export const dynamic = "force-dynamic";
export const runtime = "nodejs";
export const maxDuration = 60;

function summarize(result: VenueRunResult) {
  return {
    venueId: result.venue.id,
    venue: result.venue.name,
    found: result.events.length,
    newCount: result.newCount,
    skipped: result.skipped,
    error: result.error,
  };
}

/** POST: scrape every enabled venue and save new events. ?dryRun=true skips saving. */
export async function POST(req: NextRequest) {
  const dryRun = new URL(req.url ?? "/", "http://localhost").searchParams.get("dryRun") === "true";
  const config = loadConfig();
  const fetcher = createFetcher({
    cache: createResponseCache({ dir: config.cacheDir, expiryHours: config.cacheExpiryHours }),
    timeoutMs: config.fetchTimeoutMs,
    userAgent: config.userAgent,
  });
  const deps = { fetcher, timeZone: config.timeZone };
  const venues = getEnabledVenues();

  try {
    if (dryRun) {
      const results = await scrapeAll(venues, deps, { concurrency: config.scrapeConcurrency });
      return NextResponse.json({ ok: true, dryRun: true, totalNew: 0, results: results.map(summarize) });
    }
    const { results, totalNew } = await ingest(venues, deps, getEventStore(), {
      concurrency: config.scrapeConcurrency,
    });
    return NextResponse.json({
      ok: results.every((r) => r.error === null),
      totalNew,
      results: results.map(summarize),
    });
  } catch (e) {
    console.error("[scrape] run failed:", e);
    return NextResponse.json({ ok: false, totalNew: 0, results: [], error: errorMessage(e) }, { status: 500 });
  }
}
