import { describe, expect, it } from "vitest";
import { extractCost } from "./cost";

describe("extractCost", () => {
  it("keeps the first stated price", () => {
    expect(extractCost("$25")).toBe("$25");
    expect(extractCost("$12.50 ADV")).toBe("$12.50");
    expect(extractCost("$18 in advance / $20 at the door")).toBe("$18");
  });

  it("tightens price ranges", () => {
    expect(extractCost("Tickets $15 - $20")).toBe("$15-$20");
    expect(extractCost("$45.00 – $85.00")).toBe("$45.00-$85.00");
  });

  it("labels free and donation shows", () => {
    expect(extractCost("FREE SHOW")).toBe("Free");
    expect(extractCost("no cover")).toBe("No Cover");
    expect(extractCost("Donation at the door")).toBe("Donation");
  });

  it("returns null when no price is given", () => {
    expect(extractCost("Sold out")).toBeNull();
    expect(extractCost("")).toBeNull();
  });
});
