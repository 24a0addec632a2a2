import { loadConfig } from "@/lib/config";
import { EventStore } from "./eventStore";

let store: EventStore | null = null;

/** Shared store for route handlers, opened on first use at DATABASE_PATH. */
export function getEventStore(): EventStore {
  if (!store) {
    const { databasePath } = loadConfig();
    store = new EventStore(databasePath);
  }
  return store;
}
