import type { Scraper } from "../types";
import { brickAndMortarScraper } from "./brickandmortar";
import { warfieldScraper } from "./warfield";
import { neckOfTheWoodsScraper } from "./neckofthewoods";
import { bottomOfTheHillScraper } from "./bottomofthehill";

/** Capability sets keyed by scraper id (`VenueConfig.scraper`). */
export const SCRAPERS: Readonly<Record<string, Scraper>> = {
  [brickAndMortarScraper.id]: brickAndMortarScraper,
  [warfieldScraper.id]: warfieldScraper,
  [neckOfTheWoodsScraper.id]: neckOfTheWoodsScraper,
  [bottomOfTheHillScraper.id]: bottomOfTheHillScraper,
};

export {
  brickAndMortarScraper,
  warfieldScraper,
  neckOfTheWoodsScraper,
  bottomOfTheHillScraper,
};
