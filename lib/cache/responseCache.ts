import { createHash, randomBytes } from "node:crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

export interface ResponseCache {
  /** Cached body for (venue, url), or null when absent or expired. */
  get(venue: string, url: string): Promise<string | null>;
  /** Store a body, replacing any previous entry atomically. */
  put(venue: string, url: string, html: string): Promise<void>;
}

export interface ResponseCacheOptions {
  dir: string;
  expiryHours: number;
  /** Clock in epoch ms. */
  now?: () => number;
}

/** SHA-256 hex digest of "venue:url"; used as the cache file name. */
export function fingerprint(venue: string, url: string): string {
  return createHash("sha256").update(`${venue}:${url}`).digest("hex");
}

function isMissing(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

/**
 * File-per-entry response cache. An entry's age is taken from the file's
 * mtime; entries are never deleted, only ignored once stale and
 * overwritten by the next live fetch.
 */
export function createResponseCache(opts: ResponseCacheOptions): ResponseCache {
  const expiryMs = opts.expiryHours * 60 * 60 * 1000;
  const now = opts.now ?? Date.now;
  const pathFor = (venue: string, url: string) => join(opts.dir, `${fingerprint(venue, url)}.html`);

  return {
    async get(venue, url) {
      const file = pathFor(venue, url);
      try {
        const info = await stat(file);
        if (now() - info.mtimeMs >= expiryMs) return null;
        return await readFile(file, "utf-8");
      } catch (e) {
        if (isMissing(e)) return null;
        throw e;
      }
    },

    async put(venue, url, html) {
      const file = pathFor(venue, url);
      const tmp = `${file}.${process.pid}.${randomBytes(6).toString("hex")}.tmp`;
      await mkdir(opts.dir, { recursive: true });
      try {
        await writeFile(tmp, html, "utf-8");
        await rename(tmp, file);
      } catch (e) {
        await rm(tmp, { force: true });
        throw e;
      }
    },
  };
}
