import type { Scraper } from "../types";
import { textOf } from "../template";

/**
 * The Warfield. Event cards spell dates out ("Wed, Jul 23, 2025"), split
 * the time block over lines ("Show" / "8:00 PM") and bill the headliner
 * and support acts in separate nodes.
 */
export const warfieldScraper: Scraper = {
  id: "warfield",
  containerSelector: ".entry",

  extractDate($entry) {
    return textOf($entry.find(".date").first()) || null;
  },

  extractTime($entry) {
    // Keep line breaks; the label and the clock time sit on separate lines.
    return $entry.find(".time").first().text() || null;
  },

  extractArtists($entry) {
    const headliner = textOf($entry.find(".headliners").first());
    const supports = textOf($entry.find(".supports").first());
    return [headliner, supports].filter(Boolean);
  },

  extractUrl($entry) {
    return $entry.find(".title a[href]").first().attr("href") ?? null;
  },

  extractCost($entry) {
    return textOf($entry.find(".price").first()) || null;
  },
};
