import { describe, expect, it } from "vitest";
import { cleanArtistList, cleanArtists, joinArtists } from "./artists";

describe("cleanArtists", () => {
  it("splits on with, ampersands and commas", () => {
    expect(cleanArtists("The Band with Support Act")).toEqual(["THE BAND", "SUPPORT ACT"]);
    expect(cleanArtists("Artist A & Artist B")).toEqual(["ARTIST A", "ARTIST B"]);
    expect(cleanArtists("One, Two,Three")).toEqual(["ONE", "TWO", "THREE"]);
  });

  it("does not split band names containing 'and'", () => {
    expect(cleanArtists("Florence and the Machine")).toEqual(["FLORENCE AND THE MACHINE"]);
  });

  it("strips tour names and promo suffixes", () => {
    expect(cleanArtists('Lany "The Prevail Tour"')).toEqual(["LANY"]);
    expect(cleanArtists("Artist — XOXO Tour")).toEqual(["ARTIST"]);
    expect(cleanArtists("Headliner - Summer Tour 2025")).toEqual(["HEADLINER"]);
  });

  it("strips status notes and presenter prefixes", () => {
    expect(cleanArtists("DJ Lex (Low Ticket Warning)")).toEqual(["DJ LEX"]);
    expect(cleanArtists("Night Shift (SOLD OUT) & Day Crew")).toEqual(["NIGHT SHIFT", "DAY CREW"]);
    expect(cleanArtists("Goldenvoice presents: Band A, Band B")).toEqual(["BAND A", "BAND B"]);
  });

  it("strips lead-ins on support acts", () => {
    expect(cleanArtists("Band w/ special guest Opener")).toEqual(["BAND", "OPENER"]);
    expect(cleanArtists("Band, featuring Guest Singer")).toEqual(["BAND", "GUEST SINGER"]);
  });

  it("keeps headliner names that start with a lead-in word", () => {
    expect(cleanArtists("With Confidence")).toEqual(["WITH CONFIDENCE"]);
    expect(cleanArtists("And So I Watch You From Afar")).toEqual(["AND SO I WATCH YOU FROM AFAR"]);
    expect(cleanArtists("With Confidence & Special Guest Opener")).toEqual(["WITH CONFIDENCE", "OPENER"]);
  });

  it("drops duplicates and empty input", () => {
    expect(cleanArtists("Echo & echo")).toEqual(["ECHO"]);
    expect(cleanArtists("   ")).toEqual([]);
  });

  it("is stable when cleaning its own output", () => {
    const billings = [
      "The Band with Support Act",
      "Goldenvoice presents: Band A, Band B",
      "Florence and the Machine w/ Opener",
      'Lany "The Prevail Tour" with special guests: Two Feet',
      "With Confidence w/ And Also",
    ];
    for (const billing of billings) {
      const once = cleanArtists(billing);
      expect(cleanArtists(joinArtists(once))).toEqual(once);
    }
  });
});

describe("cleanArtistList", () => {
  it("merges headliner and support lines in order", () => {
    expect(cleanArtistList(["Headliner", "with Opener & Second"])).toEqual(["HEADLINER", "OPENER", "SECOND"]);
    expect(cleanArtistList(["A", "a"])).toEqual(["A"]);
  });

  it("strips lead-ins from support lines only", () => {
    expect(cleanArtistList(["And So I Watch You From Afar", "featuring Guest Singer"])).toEqual([
      "AND SO I WATCH YOU FROM AFAR",
      "GUEST SINGER",
    ]);
  });

  it("leaves an already clean list unchanged", () => {
    expect(cleanArtistList(["AND SO I WATCH YOU FROM AFAR"])).toEqual(["AND SO I WATCH YOU FROM AFAR"]);
    expect(cleanArtistList(["WITH CONFIDENCE, OPENER"])).toEqual(["WITH CONFIDENCE", "OPENER"]);
  });
});
