import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { ARTIST_SEPARATOR, DEFAULT_TIMEZONE } from "@/types";
import type { CalendarDate, Event, StoredEvent, StoredVenue, VenueConfig } from "@/types";
import { StorageError, errorMessage } from "@/lib/errors";
import { joinArtists } from "@/lib/normalize/artists";
import { todayInTimeZone } from "@/lib/scrapers/timezone";

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS venues (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    base_url TEXT NOT NULL,
    calendar_path TEXT NOT NULL DEFAULT '/calendar/',
    starred INTEGER NOT NULL DEFAULT 0,
    last_scraped TEXT,
    created_at TEXT DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS events (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    venue_id INTEGER NOT NULL REFERENCES venues (id),
    date TEXT NOT NULL,
    time TEXT,
    artists TEXT NOT NULL,
    url TEXT NOT NULL,
    cost TEXT,
    pinned INTEGER NOT NULL DEFAULT 0,
    created_at TEXT,
    UNIQUE (venue_id, date, artists, url)
  );

  CREATE INDEX IF NOT EXISTS idx_events_date ON events (date);
  CREATE INDEX IF NOT EXISTS idx_events_venue ON events (venue_id);
`;

interface ColumnMigration {
  table: "venues" | "events";
  column: string;
  definition: string;
  backfill?: string;
}

/** Columns added after the first schema; applied to older databases on open. */
const COLUMN_MIGRATIONS: ColumnMigration[] = [
  { table: "events", column: "cost", definition: "cost TEXT" },
  { table: "events", column: "pinned", definition: "pinned INTEGER NOT NULL DEFAULT 0" },
  {
    table: "events",
    column: "created_at",
    definition: "created_at TEXT",
    backfill: "UPDATE events SET created_at = CURRENT_TIMESTAMP WHERE created_at IS NULL",
  },
  { table: "venues", column: "starred", definition: "starred INTEGER NOT NULL DEFAULT 0" },
  { table: "venues", column: "last_scraped", definition: "last_scraped TEXT" },
];

export interface EventFilter {
  /** Only events on or after `today`. */
  futureOnly?: boolean;
  /** Inclusive lower bound. */
  from?: CalendarDate;
  /** Exclusive upper bound. */
  to?: CalendarDate;
  /** Venue name. */
  venue?: string;
  pinnedOnly?: boolean;
  limit?: number;
  /** Defaults to today in Los Angeles. */
  today?: CalendarDate;
}

interface EventRow {
  id: number;
  venue: string;
  starred: number;
  date: string;
  time: string | null;
  artists: string;
  url: string;
  cost: string | null;
  pinned: number;
  created_at: string | null;
}

interface VenueRow {
  id: number;
  name: string;
  base_url: string;
  calendar_path: string;
  starred: number;
  last_scraped: string | null;
}

function toStoredEvent(row: EventRow): StoredEvent {
  return {
    id: row.id,
    venue: row.venue,
    date: row.date,
    time: row.time,
    artists: row.artists.split(ARTIST_SEPARATOR).map((a) => a.trim()).filter(Boolean),
    url: row.url,
    cost: row.cost,
    pinned: row.pinned === 1,
    createdAt: row.created_at ?? "",
    starred: row.starred === 1,
  };
}

function toStoredVenue(row: VenueRow): StoredVenue {
  return {
    id: row.id,
    name: row.name,
    baseUrl: row.base_url,
    calendarPath: row.calendar_path,
    starred: row.starred === 1,
    lastScraped: row.last_scraped,
  };
}

/**
 * SQLite-backed store for venues and events.
 *
 * Events are unique on (venue, date, joined artists, url). Saving an event
 * that is already stored is a no-op, so repeated scrapes never duplicate
 * rows or reset a pinned flag.
 */
export class EventStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(source: string | Database.Database = ":memory:", opts: { now?: () => Date } = {}) {
    this.now = opts.now ?? (() => new Date());
    if (typeof source === "string") {
      if (source !== ":memory:") mkdirSync(dirname(source), { recursive: true });
      this.db = new Database(source);
      if (source !== ":memory:") this.db.pragma("journal_mode = WAL");
    } else {
      this.db = source;
    }
    this.db.pragma("foreign_keys = ON");
    this.migrate();
  }

  private guard<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (e instanceof StorageError) throw e;
      throw new StorageError(`${action}: ${errorMessage(e)}`, { cause: e });
    }
  }

  private columns(table: string): Set<string> {
    const rows = this.db.prepare<[], { name: string }>(`PRAGMA table_info(${table})`).all();
    return new Set(rows.map((r) => r.name));
  }

  /** Create missing tables, then add any columns an older database lacks. Safe to run repeatedly. */
  migrate(): void {
    this.guard("Failed to migrate schema", () => {
      this.db.exec(SCHEMA);
      for (const migration of COLUMN_MIGRATIONS) {
        if (this.columns(migration.table).has(migration.column)) continue;
        console.info(`[store] adding ${migration.table}.${migration.column}`);
        this.db.exec(`ALTER TABLE ${migration.table} ADD COLUMN ${migration.definition}`);
        if (migration.backfill) this.db.exec(migration.backfill);
      }
    });
  }

  /** Insert or update a venue by name; returns its id. A venue stays starred once starred. */
  saveVenue(venue: Pick<VenueConfig, "name" | "baseUrl" | "calendarPath" | "starred">): number {
    return this.guard(`Failed to save venue ${venue.name}`, () => {
      this.db
        .prepare<[string, string, string, number]>(
          `INSERT INTO venues (name, base_url, calendar_path, starred) VALUES (?, ?, ?, ?)
           ON CONFLICT (name) DO UPDATE SET
             base_url = excluded.base_url,
             calendar_path = excluded.calendar_path,
             starred = MAX(venues.starred, excluded.starred)`
        )
        .run(venue.name, venue.baseUrl, venue.calendarPath, venue.starred ? 1 : 0);
      const id = this.getVenueId(venue.name);
      if (id === null) throw new StorageError(`Venue ${venue.name} was not saved`);
      return id;
    });
  }

  getVenueId(name: string): number | null {
    return this.guard(`Failed to look up venue ${name}`, () => {
      const row = this.db.prepare<[string], { id: number }>("SELECT id FROM venues WHERE name = ?").get(name);
      return row?.id ?? null;
    });
  }

  getVenues(): StoredVenue[] {
    return this.guard("Failed to read venues", () =>
      this.db
        .prepare<[], VenueRow>(
          "SELECT id, name, base_url, calendar_path, starred, last_scraped FROM venues ORDER BY name"
        )
        .all()
        .map(toStoredVenue)
    );
  }

  markScraped(venueName: string, at: Date = this.now()): void {
    this.guard(`Failed to update ${venueName}`, () => {
      const result = this.db
        .prepare<[string, string]>("UPDATE venues SET last_scraped = ? WHERE name = ?")
        .run(at.toISOString(), venueName);
      if (result.changes === 0) throw new StorageError(`Venue ${venueName} not found`);
    });
  }

  /**
   * Insert a batch in one transaction and return how many rows were new.
   * Events already stored are skipped. An unknown venue or a database
   * failure rolls back the whole batch.
   */
  saveEvents(events: Event[]): number {
    if (events.length === 0) return 0;
    const insert = this.db.prepare<[number, string, string | null, string, string, string | null, string]>(
      `INSERT INTO events (venue_id, date, time, artists, url, cost, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT (venue_id, date, artists, url) DO NOTHING`
    );
    const insertBatch = this.db.transaction((batch: Event[]) => {
      const venueIds = new Map<string, number>();
      const createdAt = this.now().toISOString();
      let inserted = 0;
      for (const event of batch) {
        let venueId = venueIds.get(event.venue);
        if (venueId === undefined) {
          const id = this.getVenueId(event.venue);
          if (id === null) throw new StorageError(`Venue ${event.venue} not found`);
          venueId = id;
          venueIds.set(event.venue, id);
        }
        const result = insert.run(
          venueId,
          event.date,
          event.time,
          joinArtists(event.artists),
          event.url,
          event.cost,
          createdAt
        );
        inserted += result.changes;
      }
      return inserted;
    });
    return this.guard("Failed to save events", () => insertBatch(events));
  }

  /** Stored events joined with their venue, ordered by date then time (untimed last). */
  getEvents(filter: EventFilter = {}): StoredEvent[] {
    const clauses: string[] = [];
    const params: (string | number)[] = [];
    if (filter.futureOnly) {
      clauses.push("e.date >= ?");
      params.push(filter.today ?? todayInTimeZone(this.now(), DEFAULT_TIMEZONE));
    }
    if (filter.from) {
      clauses.push("e.date >= ?");
      params.push(filter.from);
    }
    if (filter.to) {
      clauses.push("e.date < ?");
      params.push(filter.to);
    }
    if (filter.venue) {
      clauses.push("v.name = ?");
      params.push(filter.venue);
    }
    if (filter.pinnedOnly) clauses.push("e.pinned = 1");

    let sql = `
      SELECT e.id, v.name AS venue, v.starred, e.date, e.time, e.artists, e.url, e.cost, e.pinned, e.created_at
      FROM events e
      JOIN venues v ON e.venue_id = v.id
      ${clauses.length ? `WHERE ${clauses.join(" AND ")}` : ""}
      ORDER BY e.date, e.time IS NULL, e.time, e.id`;
    if (filter.limit != null) {
      sql += " LIMIT ?";
      params.push(filter.limit);
    }

    return this.guard("Failed to read events", () =>
      this.db.prepare<(string | number)[], EventRow>(sql).all(...params).map(toStoredEvent)
    );
  }

  setPinned(id: number, pinned: boolean): boolean {
    return this.guard(`Failed to pin event ${id}`, () => {
      const result = this.db.prepare<[number, number]>("UPDATE events SET pinned = ? WHERE id = ?").run(pinned ? 1 : 0, id);
      return result.changes > 0;
    });
  }

  updateCost(id: number, cost: string | null): boolean {
    return this.guard(`Failed to update cost of event ${id}`, () => {
      const result = this.db.prepare<[string | null, number]>("UPDATE events SET cost = ? WHERE id = ?").run(cost, id);
      return result.changes > 0;
    });
  }

  countEvents(): number {
    return this.guard("Failed to count events", () => {
      const row = this.db.prepare<[], { count: number }>("SELECT COUNT(*) AS count FROM events").get();
      return row?.count ?? 0;
    });
  }

  close(): void {
    this.db.close();
  }
}
