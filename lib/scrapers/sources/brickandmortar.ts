import type { Scraper } from "../types";
import { textOf } from "../template";

/**
 * Brick & Mortar Music Hall (TicketWeb calendar widget).
 * Each popup carries a "8.20" month.day date, a "8:00 pm" time and a
 * single billing line in the .tw-name link.
 */
export const brickAndMortarScraper: Scraper = {
  id: "brickandmortar",
  containerSelector: ".tw-cal-event-popup",

  extractDate($event) {
    return textOf($event.find(".tw-event-date").first()) || null;
  },

  extractTime($event) {
    return textOf($event.find(".tw-event-time-complete").first()) || null;
  },

  extractArtists($event) {
    const billing = textOf($event.find(".tw-name a").first());
    return billing ? [billing] : [];
  },

  extractUrl($event) {
    return $event.find(".tw-name a[href]").first().attr("href") ?? null;
  },

  extractCost($event, { $ }) {
    const $price = $event
      .find("span, div")
      .filter((_, el) => $(el).children().length === 0 && $(el).text().includes("$"))
      .first();
    if ($price.length) return textOf($price);
    return /\bfree\b/i.test($event.text()) ? "Free" : null;
  },
};
