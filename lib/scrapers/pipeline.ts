import type { CalendarDate, Event, VenueConfig } from "@/types";
import { ExtractionError, StorageError, errorMessage } from "@/lib/errors";
import { assembleEvents, eventKey } from "@/lib/normalize/assembleEvent";
import type { EventStore } from "@/lib/storage/eventStore";
import { calendarUrl } from "@/lib/venues";
import type { Fetcher } from "./fetchHtml";
import { getScraperById } from "./registry";
import { parseListings } from "./template";
import { todayInTimeZone } from "./timezone";
import type { Scraper, SkippedListing } from "./types";

const DEFAULT_CONCURRENCY = 4;

export interface ScrapeDeps {
  fetcher: Fetcher;
  /** Reference day for year inference; defaults to today in `timeZone`. */
  today?: CalendarDate;
  timeZone?: string;
}

export interface ScrapeResult {
  venue: VenueConfig;
  events: Event[];
  skipped: SkippedListing[];
}

export interface VenueRunResult extends ScrapeResult {
  /** The calendar page was retrieved (live or from cache). */
  fetched: boolean;
  /** Rows newly stored; null when nothing was saved. */
  newCount: number | null;
  error: string | null;
}

function requireScraper(venue: VenueConfig): Scraper {
  const scraper = getScraperById(venue.scraper);
  if (!scraper) throw new ExtractionError(`No scraper registered for "${venue.scraper}"`);
  return scraper;
}

/** Parse and assemble a calendar page; duplicate listings on one page collapse to one event. */
export function extractEvents(
  html: string,
  venue: VenueConfig,
  today: CalendarDate
): { events: Event[]; skipped: SkippedListing[] } {
  const batch = parseListings(html, requireScraper(venue), { baseUrl: venue.baseUrl });
  const assembled = assembleEvents(batch.listings, venue, today);

  const seen = new Set<string>();
  const events = assembled.events.filter((event) => {
    const key = eventKey(event);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
  const skipped = [...batch.skipped, ...assembled.skipped].sort((a, b) => a.index - b.index);
  return { events, skipped };
}

/** Fetch and extract one venue. FetchError propagates to the caller. */
export async function scrapeVenue(venue: VenueConfig, deps: ScrapeDeps): Promise<ScrapeResult> {
  requireScraper(venue);
  const html = await deps.fetcher.fetch(venue.name, calendarUrl(venue));
  const today = deps.today ?? todayInTimeZone(new Date(), deps.timeZone);
  const { events, skipped } = extractEvents(html, venue, today);
  console.info(`[scrape] ${venue.id}: ${events.length} events, ${skipped.length} skipped`);
  return { venue, events, skipped };
}

async function runVenue(venue: VenueConfig, deps: ScrapeDeps): Promise<VenueRunResult> {
  try {
    const result = await scrapeVenue(venue, deps);
    if (result.events.length === 0) {
      const error = new ExtractionError(`No events extracted from ${venue.name}`);
      console.warn(`[scrape] ${venue.id}: ${error.message}`);
      return { ...result, fetched: true, newCount: null, error: error.message };
    }
    return { ...result, fetched: true, newCount: null, error: null };
  } catch (e) {
    console.error(`[scrape] ${venue.id} failed:`, e);
    return { venue, events: [], skipped: [], fetched: false, newCount: null, error: errorMessage(e) };
  }
}

/**
 * Scrape several venues, a few at a time. A failing venue is reported in
 * its result and never stops the others.
 */
export async function scrapeAll(
  venues: VenueConfig[],
  deps: ScrapeDeps,
  opts: { concurrency?: number } = {}
): Promise<VenueRunResult[]> {
  const concurrency = Math.max(1, opts.concurrency ?? DEFAULT_CONCURRENCY);
  const results: VenueRunResult[] = [];
  for (let i = 0; i < venues.length; i += concurrency) {
    const chunk = venues.slice(i, i + concurrency);
    results.push(...(await Promise.all(chunk.map((venue) => runVenue(venue, deps)))));
  }
  return results;
}

export interface IngestSummary {
  results: VenueRunResult[];
  totalNew: number;
}

/**
 * Register venues, scrape them and save each venue's events as one batch.
 * A storage failure is recorded on that venue's result; other venues are
 * still saved.
 */
export async function ingest(
  venues: VenueConfig[],
  deps: ScrapeDeps,
  store: EventStore,
  opts: { concurrency?: number; now?: () => Date } = {}
): Promise<IngestSummary> {
  const now = opts.now ?? (() => new Date());
  for (const venue of venues) store.saveVenue(venue);

  const scraped = await scrapeAll(venues, deps, opts);
  const results = scraped.map((result): VenueRunResult => {
    if (!result.fetched) return result;
    try {
      const newCount = store.saveEvents(result.events);
      store.markScraped(result.venue.name, now());
      console.info(`[store] ${result.venue.id}: saved ${newCount} new events`);
      return { ...result, newCount };
    } catch (e) {
      if (!(e instanceof StorageError)) throw e;
      console.error(`[store] ${result.venue.id} failed:`, e);
      return { ...result, error: e.message };
    }
  });

  const totalNew = results.reduce((sum, r) => sum + (r.newCount ?? 0), 0);
  return { results, totalNew };
}
