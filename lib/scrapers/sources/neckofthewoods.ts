import type { Scraper } from "../types";
import { textOf } from "../template";

const NAV_LINK_TEXT = ["more info", "buy tickets", "tickets", "calendar", "contact", "rsvp"];
const DETAIL_LINK_TEXT = ["more info", "buy tickets", "details"];

/**
 * Neck of the Woods. Rows give "Sun, Jul 20" style dates, a combined
 * "Doors: 7:00 pm / Show: 8:00 pm" line and the billing in the heading link.
 */
export const neckOfTheWoodsScraper: Scraper = {
  id: "neckofthewoods",
  containerSelector: ".event-item",

  extractDate($row) {
    return textOf($row.find(".event-date").first()) || null;
  },

  extractTime($row) {
    const timeText = textOf($row.find(".event-time").first());
    const show = timeText.match(/show:?\s*([^/|]+)/i);
    return show ? show[1] : timeText || null;
  },

  extractArtists($row, { $ }) {
    return $row
      .find("h3 a, h2 a")
      .map((_, el) => textOf($(el)))
      .get()
      .filter((text) => text && !NAV_LINK_TEXT.includes(text.toLowerCase()));
  },

  extractUrl($row, { $ }) {
    const links = $row.find("a[href]").toArray();
    const detail = links.find((el) => DETAIL_LINK_TEXT.includes(textOf($(el)).toLowerCase()));
    if (detail) return $(detail).attr("href") ?? null;
    const eventLink = links.find((el) => /event|show|concert/i.test($(el).attr("href") ?? ""));
    return eventLink ? $(eventLink).attr("href") ?? null : null;
  },

  extractCost($row) {
    return textOf($row.find(".event-price").first()) || null;
  },
};
