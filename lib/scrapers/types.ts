import type { Cheerio, CheerioAPI } from "cheerio";
import type { Element } from "domhandler";

export interface ListingContext {
  $: CheerioAPI;
  /** Venue base URL, for resolving relative links. */
  baseUrl: string;
}

/** One extraction capability, applied to a single listing fragment. */
export type Capability<T> = ($listing: Cheerio<Element>, ctx: ListingContext) => T;

/**
 * Per-venue extraction rules. The shared driver (parseListings) selects
 * fragments with `containerSelector` and applies every capability to each.
 * Capabilities return raw text; normalization happens afterwards.
 */
export interface VenueExtractor {
  containerSelector: string;
  extractDate: Capability<string | null>;
  extractTime: Capability<string | null>;
  /** Raw billing parts in display order, e.g. [headliner line, support line]. */
  extractArtists: Capability<string[]>;
  extractUrl: Capability<string | null>;
  extractCost?: Capability<string | null>;
}

export interface Scraper extends VenueExtractor {
  /** Matches VenueConfig.scraper. */
  id: string;
}

/** Raw field values for one listing fragment, before normalization. */
export interface RawListing {
  /** Position of the fragment on the page. */
  index: number;
  dateText: string;
  timeText: string | null;
  artistTexts: string[];
  /** Absolute URL. */
  url: string;
  costText: string | null;
}

export interface SkippedListing {
  index: number;
  stage: "extract" | "assemble";
  reason: string;
}
