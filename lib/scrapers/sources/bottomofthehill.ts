import type { Scraper } from "../types";
import { textOf } from "../template";

/** Detail pages are named by date: /20260206.html */
const DETAIL_PATH = /\/?\d{8}\.html$/;

/**
 * Bottom of the Hill. Calendar cells hold one .band span per act
 * (headliner first), a "Friday February 6 2026" date and a time line like
 * "doors at 8:00PM / music at 8:30PM".
 */
export const bottomOfTheHillScraper: Scraper = {
  id: "bottomofthehill",
  containerSelector: "td:has(.band)",

  extractDate($cell) {
    const dateText = textOf($cell.find(".date").first());
    if (!dateText) return null;
    if (/\b\d{4}\b/.test(dateText)) return dateText;
    // Year-less headings take the year from the anchor name (e.g. name="20260205").
    const anchor = $cell.find("a[name]").first().attr("name") ?? "";
    return /^\d{8}$/.test(anchor) ? `${dateText} ${anchor.slice(0, 4)}` : dateText;
  },

  extractTime($cell) {
    const timeText = textOf($cell.find(".time").first());
    const music = timeText.match(/music at\s*(\d{1,2})(?::(\d{2}))?\s*([ap]m)/i);
    return music ? `${music[1]}:${music[2] ?? "00"} ${music[3]}` : timeText || null;
  },

  extractArtists($cell, { $ }) {
    return $cell
      .find(".band")
      .map((_, el) => textOf($(el)))
      .get()
      .filter(Boolean);
  },

  extractUrl($cell, { $ }) {
    const $detail = $cell
      .find('a[href*=".html"]')
      .filter((_, el) => {
        const href = $(el).attr("href") ?? "";
        const path = href.replace(/^https?:\/\/[^/]+/, "") || href;
        return DETAIL_PATH.test(path);
      })
      .first();
    return $detail.attr("href") ?? null;
  },

  extractCost($cell) {
    return textOf($cell.find(".cover").first()) || null;
  },
};
