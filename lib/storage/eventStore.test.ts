import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { Event } from "@/types";
import { StorageError } from "@/lib/errors";
import { EventStore } from "./eventStore";

const NOW = new Date("2025-07-01T12:00:00.000Z");

const HALL = { name: "Test Hall", baseUrl: "https://testhall.example", calendarPath: "/calendar/", starred: false };
const CLUB = { name: "Side Club", baseUrl: "https://sideclub.example", calendarPath: "/shows/", starred: true };

function event(overrides: Partial<Event> = {}): Event {
  return {
    venue: HALL.name,
    date: "2025-07-23",
    time: "20:00",
    artists: ["HEADLINER", "OPENER"],
    url: "https://testhall.example/events/1",
    cost: "$20",
    ...overrides,
  };
}

function columnNames(db: Database.Database, table: string): string[] {
  return db
    .prepare<[], { name: string }>(`PRAGMA table_info(${table})`)
    .all()
    .map((c) => c.name);
}

describe("EventStore", () => {
  let store: EventStore;

  beforeEach(() => {
    store = new EventStore(":memory:", { now: () => NOW });
    store.saveVenue(HALL);
    store.saveVenue(CLUB);
  });

  afterEach(() => {
    store.close();
  });

  describe("saveEvents", () => {
    it("only counts new rows when a batch is saved again", () => {
      const batch = [
        event(),
        event({ date: "2025-07-24", url: "https://testhall.example/events/2" }),
        event({ venue: CLUB.name, url: "https://sideclub.example/shows/9" }),
      ];
      expect(store.saveEvents(batch)).toBe(3);
      expect(store.saveEvents(batch)).toBe(0);
      expect(store.countEvents()).toBe(3);
    });

    it("treats a different artist line as a different event", () => {
      store.saveEvents([event()]);
      expect(store.saveEvents([event({ artists: ["HEADLINER"] })])).toBe(1);
    });

    it("keeps the pinned flag when an event is scraped again", () => {
      store.saveEvents([event()]);
      const [saved] = store.getEvents();
      expect(store.setPinned(saved.id, true)).toBe(true);

      store.saveEvents([event()]);
      const [again] = store.getEvents();
      expect(again.id).toBe(saved.id);
      expect(again.pinned).toBe(true);
    });

    it("rolls back the whole batch for an unknown venue", () => {
      store.saveEvents([event()]);
      const batch = [event({ date: "2025-08-01" }), event({ venue: "Nowhere" })];
      expect(() => store.saveEvents(batch)).toThrow(StorageError);
      expect(() => store.saveEvents(batch)).toThrow("Venue Nowhere not found");
      expect(store.countEvents()).toBe(1);
    });

    it("stamps new rows with the store clock", () => {
      store.saveEvents([event({ time: null, cost: null })]);
      expect(store.getEvents()).toEqual([
        {
          id: 1,
          venue: "Test Hall",
          date: "2025-07-23",
          time: null,
          artists: ["HEADLINER", "OPENER"],
          url: "https://testhall.example/events/1",
          cost: null,
          pinned: false,
          createdAt: "2025-07-01T12:00:00.000Z",
          starred: false,
        },
      ]);
    });

    it("returns 0 for an empty batch", () => {
      expect(store.saveEvents([])).toBe(0);
    });
  });

  describe("getEvents", () => {
    beforeEach(() => {
      store.saveEvents([
        event({ date: "2025-08-02", time: null, url: "https://testhall.example/e/untimed" }),
        event({ date: "2025-08-02", time: "21:00", url: "https://testhall.example/e/late" }),
        event({ date: "2025-08-02", time: "19:00", url: "https://testhall.example/e/early" }),
        event({ date: "2025-06-15", url: "https://testhall.example/e/past" }),
        event({ venue: CLUB.name, date: "2025-09-10", url: "https://sideclub.example/e/club" }),
      ]);
    });

    const urls = (events: Event[]) => events.map((e) => e.url.split("/").pop());

    it("orders by date, then time with untimed events last", () => {
      expect(urls(store.getEvents())).toEqual(["past", "early", "late", "untimed", "club"]);
    });

    it("filters to upcoming events", () => {
      expect(urls(store.getEvents({ futureOnly: true, today: "2025-07-01" }))).toEqual([
        "early",
        "late",
        "untimed",
        "club",
      ]);
    });

    it("uses the store clock for upcoming events by default", () => {
      expect(store.getEvents({ futureOnly: true })).toHaveLength(4);
    });

    it("filters by date range, venue and limit", () => {
      expect(urls(store.getEvents({ from: "2025-08-01", to: "2025-09-01" }))).toEqual(["early", "late", "untimed"]);
      expect(urls(store.getEvents({ venue: CLUB.name }))).toEqual(["club"]);
      expect(urls(store.getEvents({ limit: 2 }))).toEqual(["past", "early"]);
    });

    it("filters to pinned events and carries the venue's star", () => {
      const club = store.getEvents({ venue: CLUB.name })[0];
      store.setPinned(club.id, true);
      const pinned = store.getEvents({ pinnedOnly: true });
      expect(urls(pinned)).toEqual(["club"]);
      expect(pinned[0].starred).toBe(true);
    });
  });

  describe("venues", () => {
    it("updates a venue in place and never unstars it", () => {
      const id = store.getVenueId(CLUB.name);
      expect(store.saveVenue({ ...CLUB, calendarPath: "/calendar/", starred: false })).toBe(id);
      const club = store.getVenues().find((v) => v.name === CLUB.name);
      expect(club).toMatchObject({ calendarPath: "/calendar/", starred: true, lastScraped: null });
    });

    it("records when a venue was scraped", () => {
      store.markScraped(HALL.name, new Date("2025-07-02T08:30:00.000Z"));
      expect(store.getVenues().map((v) => [v.name, v.lastScraped])).toEqual([
        ["Side Club", null],
        ["Test Hall", "2025-07-02T08:30:00.000Z"],
      ]);
    });

    it("rejects scrape marks for unknown venues", () => {
      expect(() => store.markScraped("Nowhere")).toThrow(StorageError);
    });
  });

  it("updates cost and reports missing ids", () => {
    store.saveEvents([event()]);
    const [saved] = store.getEvents();
    expect(store.updateCost(saved.id, "$30")).toBe(true);
    expect(store.getEvents()[0].cost).toBe("$30");
    expect(store.updateCost(999, "$30")).toBe(false);
    expect(store.setPinned(999, true)).toBe(false);
  });
});

describe("EventStore failures", () => {
  it("reports reads on a closed database as StorageError", () => {
    const closed = new EventStore(":memory:");
    closed.close();
    expect(() => closed.countEvents()).toThrow(StorageError);
    expect(() => closed.getVenues()).toThrow("Failed to read venues");
    expect(() => closed.getVenueId("Test Hall")).toThrow("Failed to look up venue Test Hall");
  });
});

describe("EventStore migration", () => {
  const LEGACY_SCHEMA = `
    CREATE TABLE venues (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT UNIQUE NOT NULL,
      base_url TEXT NOT NULL,
      calendar_path TEXT NOT NULL DEFAULT '/calendar/',
      created_at TEXT DEFAULT CURRENT_TIMESTAMP
    );
    CREATE TABLE events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      venue_id INTEGER NOT NULL,
      date TEXT NOT NULL,
      time TEXT,
      artists TEXT NOT NULL,
      url TEXT NOT NULL,
      UNIQUE (venue_id, date, artists, url),
      FOREIGN KEY (venue_id) REFERENCES venues (id)
    );
  `;

  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
    db.exec(LEGACY_SCHEMA);
    db.prepare("INSERT INTO venues (name, base_url) VALUES (?, ?)").run(HALL.name, HALL.baseUrl);
    db.prepare("INSERT INTO events (venue_id, date, time, artists, url) VALUES (1, ?, ?, ?, ?)").run(
      "2025-07-23",
      "20:00",
      "HEADLINER, OPENER",
      "https://testhall.example/events/1"
    );
  });

  afterEach(() => {
    db.close();
  });

  it("adds missing columns and keeps existing rows", () => {
    const store = new EventStore(db, { now: () => NOW });

    expect(columnNames(db, "events")).toEqual([
      "id",
      "venue_id",
      "date",
      "time",
      "artists",
      "url",
      "cost",
      "pinned",
      "created_at",
    ]);
    expect(columnNames(db, "venues")).toContain("starred");
    expect(columnNames(db, "venues")).toContain("last_scraped");

    const [legacy] = store.getEvents();
    expect(legacy).toMatchObject({
      venue: "Test Hall",
      artists: ["HEADLINER", "OPENER"],
      cost: null,
      pinned: false,
      starred: false,
    });
    expect(legacy.createdAt).not.toBe("");
  });

  it("is safe to run again", () => {
    const store = new EventStore(db);
    store.migrate();
    new EventStore(db);
    expect(store.countEvents()).toBe(1);
    expect(store.saveEvents([event()])).toBe(0);
  });
});
