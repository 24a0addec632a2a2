const PRICE = /\$\s?\d+(?:\.\d{2})?(?:\s*[-–]\s*\$\s?\d+(?:\.\d{2})?)?/;

const WORDS: [RegExp, string][] = [
  [/\bfree\b/i, "Free"],
  [/\bno cover\b/i, "No Cover"],
  [/\bdonation\b/i, "Donation"],
  [/\btbd\b/i, "TBD"],
];

/** "$25", "$15 - $20" → "$15-$20", "FREE SHOW" → "Free"; null when no price is stated. */
export function extractCost(text: string): string | null {
  const price = text.match(PRICE);
  if (price) return price[0].replace(/\s*[-–]\s*/, "-").replace(/\$\s/g, "$");
  for (const [pattern, label] of WORDS) {
    if (pattern.test(text)) return label;
  }
  return null;
}
