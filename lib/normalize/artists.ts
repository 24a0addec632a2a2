import { ARTIST_SEPARATOR } from "@/types";

/** Removed from the whole billing line before splitting. */
const BILLING_NOISE: RegExp[] = [
  // Quoted tour names: "THE PREVAIL TOUR"
  /["“”][^"“”]*["“”]/g,
  // Em/en dash promo: "Artist — XOXO Tour"
  /\s*[—–]\s.*$/,
  // "Artist - Summer Tour 2025", "Artist - Friday Residency"
  /\s+-\s+.*\b(?:tour|residency)\b.*$/i,
  // Status and ticketing notes in parentheses
  /\s*\((?:sold out|low tickets?(?: warning)?|postponed|cancell?ed|rescheduled|moved to [^)]*|all ages|free show|\d{2}\+)\)/gi,
  // "Goldenvoice presents:"
  /^.*?\bpresents?\s*:\s*/i,
];

/** Lead-ins removed from support acts ("with X", "special guest Y"); headliners keep theirs. */
const LEADING_NOISE = /^(?:with|w\/|and|&|special guests?|featuring|feat\.|ft\.)\s*:?\s+/i;

const SEPARATORS = /\s*,\s*|\s*&\s*|\s+with\s+|\s+w\/\s*/i;

function normalizeName(name: string, support: boolean): string {
  let out = name.replace(/\s+/g, " ").trim();
  let prev = "";
  while (support && out !== prev) {
    prev = out;
    out = out.replace(LEADING_NOISE, "").trim();
  }
  return out.toUpperCase();
}

function splitBilling(text: string): string[] {
  let billing = text.replace(/\s+/g, " ").trim();
  for (const pattern of BILLING_NOISE) {
    billing = billing.replace(pattern, "");
  }
  billing = billing.trim();
  return billing ? billing.split(SEPARATORS) : [];
}

/**
 * Split a billing line ("The Band with Support Act", "A & B") into an
 * ordered list of uppercase artist names, dropping tour and ticketing
 * noise. The first name is the headliner and is kept as written; cleaning
 * the joined output again yields the same list.
 */
export function cleanArtists(text: string): string[] {
  return cleanArtistList([text]);
}

/**
 * Clean several billing parts (headliner line, then support lines) into one
 * ordered list. Only the first name of the first part counts as the headliner.
 */
export function cleanArtistList(parts: string[]): string[] {
  const names = parts.flatMap((part, i) =>
    splitBilling(part).map((name, j) => normalizeName(name, i > 0 || j > 0))
  );
  return dedupe(names.filter(Boolean));
}

export function joinArtists(artists: string[]): string {
  return artists.join(ARTIST_SEPARATOR);
}

function dedupe(names: string[]): string[] {
  return [...new Set(names)];
}
