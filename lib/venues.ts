import type { VenueConfig } from "@/types";

/** Venues to scrape. `scraper` must match a registered scraper id. */
export const VENUES_CONFIG: VenueConfig[] = [
  {
    id: "brickandmortar",
    name: "Brick & Mortar Music Hall",
    baseUrl: "https://www.brickandmortarmusic.com",
    calendarPath: "/calendar/",
    scraper: "brickandmortar",
    enabled: true,
  },
  {
    id: "warfield",
    name: "The Warfield",
    baseUrl: "https://www.thewarfieldtheatre.com",
    calendarPath: "/events/",
    scraper: "warfield",
    enabled: true,
    starred: true,
  },
  {
    id: "neckofthewoods",
    name: "Neck of the Woods",
    baseUrl: "https://www.neckofthewoodssf.com",
    calendarPath: "/calendar/",
    scraper: "neckofthewoods",
    enabled: true,
  },
  {
    id: "bottomofthehill",
    name: "Bottom of the Hill",
    baseUrl: "https://www.bottomofthehill.com",
    calendarPath: "/calendar.html",
    scraper: "bottomofthehill",
    enabled: true,
  },
];

export function getEnabledVenues(venues: VenueConfig[] = VENUES_CONFIG): VenueConfig[] {
  return venues.filter((v) => v.enabled !== false);
}

export function getVenueById(id: string, venues: VenueConfig[] = VENUES_CONFIG): VenueConfig | undefined {
  return venues.find((v) => v.id === id);
}

export function calendarUrl(venue: Pick<VenueConfig, "baseUrl" | "calendarPath">): string {
  return new URL(venue.calendarPath, venue.baseUrl).href;
}
