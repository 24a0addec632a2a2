import { SCRAPERS } from "./sources";
import type { Scraper } from "./types";

export function getScrapers(): Scraper[] {
  return Object.values(SCRAPERS);
}

export function getScraperById(id: string): Scraper | undefined {
  return Object.hasOwn(SCRAPERS, id) ? SCRAPERS[id] : undefined;
}
