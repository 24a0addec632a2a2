import { ARTIST_SEPARATOR } from "@/types";
import type { Event } from "@/types";

/** Column order of the interchange format. */
export const RECORD_COLUMNS = ["date", "time", "artists", "venue", "url", "cost"] as const;

export type EventRecord = Record<(typeof RECORD_COLUMNS)[number], string>;

/** Flatten an event; absent time and cost become empty fields. */
export function toRecord(event: Event): EventRecord {
  return {
    date: event.date,
    time: event.time ?? "",
    artists: event.artists.join(ARTIST_SEPARATOR),
    venue: event.venue,
    url: event.url,
    cost: event.cost ?? "",
  };
}

export function fromRecord(record: EventRecord): Event {
  return {
    venue: record.venue,
    date: record.date,
    time: record.time || null,
    artists: record.artists
      .split(ARTIST_SEPARATOR)
      .map((a) => a.trim())
      .filter(Boolean),
    url: record.url,
    cost: record.cost || null,
  };
}

function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function formatEventsCsv(events: Event[]): string {
  const lines = [RECORD_COLUMNS.join(",")];
  for (const event of events) {
    const record = toRecord(event);
    lines.push(RECORD_COLUMNS.map((column) => escapeCsvField(record[column])).join(","));
  }
  return lines.join("\n") + "\n";
}

/** Split CSV text into rows of fields (RFC 4180 quoting, LF or CRLF). */
function parseCsvRows(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = "";
  let quoted = false;

  for (let i = 0; i < text.length; i++) {
    const c = text[i];
    if (quoted) {
      if (c === '"' && text[i + 1] === '"') {
        field += '"';
        i++;
      } else if (c === '"') {
        quoted = false;
      } else {
        field += c;
      }
    } else if (c === '"') {
      quoted = true;
    } else if (c === ",") {
      row.push(field);
      field = "";
    } else if (c === "\n" || c === "\r") {
      if (c === "\r" && text[i + 1] === "\n") i++;
      row.push(field);
      rows.push(row);
      row = [];
      field = "";
    } else {
      field += c;
    }
  }
  if (field !== "" || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows.filter((r) => !(r.length === 1 && r[0] === ""));
}

export function parseEventsCsv(text: string): Event[] {
  const [header, ...rows] = parseCsvRows(text);
  if (!header || header.join(",") !== RECORD_COLUMNS.join(",")) {
    throw new Error(`Unexpected CSV header: ${header?.join(",") ?? "(empty)"}`);
  }
  return rows.map((fields, i) => {
    if (fields.length !== RECORD_COLUMNS.length) {
      throw new Error(`CSV row ${i + 2} has ${fields.length} fields, expected ${RECORD_COLUMNS.length}`);
    }
    const [date, time, artists, venue, url, cost] = fields;
    return fromRecord({ date, time, artists, venue, url, cost });
  });
}
