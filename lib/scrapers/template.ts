import * as cheerio from "cheerio";
import type { Cheerio } from "cheerio";
import type { Element } from "domhandler";
import { ExtractionError, errorMessage } from "@/lib/errors";
import type { RawListing, SkippedListing, VenueExtractor, ListingContext } from "./types";

export interface ListingBatch {
  listings: RawListing[];
  skipped: SkippedListing[];
}

/** Collapsed, trimmed text of a node. */
export function textOf($node: Cheerio<Element>): string {
  return $node.text().replace(/\s+/g, " ").trim();
}

export function resolveUrl(href: string, baseUrl: string): string | null {
  try {
    return new URL(href.trim(), baseUrl).href;
  } catch {
    return null;
  }
}

function extractListing(
  $listing: Cheerio<Element>,
  index: number,
  extractor: VenueExtractor,
  ctx: ListingContext
): RawListing {
  const dateText = extractor.extractDate($listing, ctx)?.trim();
  if (!dateText) throw new ExtractionError("missing date");

  const artistTexts = extractor
    .extractArtists($listing, ctx)
    .map((t) => t.trim())
    .filter(Boolean);
  if (artistTexts.length === 0) throw new ExtractionError("missing artists");

  const href = extractor.extractUrl($listing, ctx);
  if (!href) throw new ExtractionError("missing url");
  const url = resolveUrl(href, ctx.baseUrl);
  if (!url) throw new ExtractionError(`invalid url "${href}"`);

  return {
    index,
    dateText,
    timeText: extractor.extractTime($listing, ctx)?.trim() || null,
    artistTexts,
    url,
    costText: extractor.extractCost?.($listing, ctx)?.trim() || null,
  };
}

/**
 * Walk every listing fragment on a calendar page and pull raw fields with
 * the venue's capabilities. A fragment that is missing a required field,
 * or whose capability throws, is recorded as skipped; the rest still parse.
 */
export function parseListings(html: string, extractor: VenueExtractor, opts: { baseUrl: string }): ListingBatch {
  const $ = cheerio.load(html);
  const ctx: ListingContext = { $, baseUrl: opts.baseUrl };
  const listings: RawListing[] = [];
  const skipped: SkippedListing[] = [];

  $.root().find(extractor.containerSelector).each((index, el) => {
    try {
      listings.push(extractListing($(el), index, extractor, ctx));
    } catch (e) {
      const reason = errorMessage(e);
      console.warn(`[extract] listing ${index} skipped: ${reason}`);
      skipped.push({ index, stage: "extract", reason });
    }
  });

  return { listings, skipped };
}
