export const DEFAULT_TIMEZONE = "America/Los_Angeles";

/** Joins artist names in the dedup key and in interchange records. */
export const ARTIST_SEPARATOR = ", ";

/** Calendar date, YYYY-MM-DD. */
export type CalendarDate = string;

/** 24-hour wall-clock time, HH:MM. */
export type WallTime = string;

/**
 * Static venue configuration. `scraper` selects the extraction variant
 * registered under that id in lib/scrapers/sources.
 */
export interface VenueConfig {
  id: string;
  name: string;
  baseUrl: string;
  calendarPath: string;
  scraper: string;
  enabled?: boolean;
  starred?: boolean;
}

export interface Event {
  /** Venue name, unique across venues. */
  venue: string;
  date: CalendarDate;
  time: WallTime | null;
  /** Headliner first, then support acts. */
  artists: string[];
  url: string;
  cost: string | null;
}

export interface StoredEvent extends Event {
  id: number;
  pinned: boolean;
  createdAt: string;
  /** The venue's starred flag. */
  starred: boolean;
}

export interface StoredVenue {
  id: number;
  name: string;
  baseUrl: string;
  calendarPath: string;
  starred: boolean;
  lastScraped: string | null;
}
