import { DEFAULT_TIMEZONE } from "@/types";

/** Desktop browser agent; many venue sites reject default client agents. */
export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36";

export interface IngestConfig {
  cacheDir: string;
  /** Cached responses at least this old are ignored. */
  cacheExpiryHours: number;
  databasePath: string;
  fetchTimeoutMs: number;
  scrapeConcurrency: number;
  timeZone: string;
  userAgent: string;
}

type Env = Record<string, string | undefined>;

function readPositive(env: Env, name: string, fallback: number, parse: (raw: string) => number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const n = parse(raw);
  if (!Number.isFinite(n) || n <= 0) return fallback;
  return n;
}

function readString(env: Env, name: string, fallback: string): string {
  return env[name]?.trim() || fallback;
}

/**
 * Read configuration from the environment once. The result is passed
 * explicitly to the cache, fetcher and store.
 */
export function loadConfig(env: Env = process.env): IngestConfig {
  return {
    cacheDir: readString(env, "CACHE_DIR", ".cache/responses"),
    cacheExpiryHours: readPositive(env, "CACHE_EXPIRY_HOURS", 6, Number.parseFloat),
    databasePath: readString(env, "DATABASE_PATH", "data/events.db"),
    fetchTimeoutMs: readPositive(env, "FETCH_TIMEOUT_MS", 15_000, (raw) => Number.parseInt(raw, 10)),
    scrapeConcurrency: readPositive(env, "SCRAPE_CONCURRENCY", 4, (raw) => Number.parseInt(raw, 10)),
    timeZone: readString(env, "EVENTS_TIMEZONE", DEFAULT_TIMEZONE),
    userAgent: readString(env, "SCRAPE_USER_AGENT", DEFAULT_USER_AGENT),
  };
}
