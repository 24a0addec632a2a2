import { FetchError, errorMessage } from "@/lib/errors";
import type { ResponseCache } from "@/lib/cache/responseCache";
import { DEFAULT_USER_AGENT } from "@/lib/config";

const DEFAULT_TIMEOUT_MS = 15_000;

export type FetchImpl = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetchHtmlOptions {
  timeoutMs?: number;
  userAgent?: string;
  fetchImpl?: FetchImpl;
}

/**
 * GET a page with a browser user-agent. Throws FetchError on network failure, timeout or non-2xx status.
 */
export async function fetchHtml(url: string, opts: FetchHtmlOptions = {}): Promise<string> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchImpl = opts.fetchImpl ?? fetch;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetchImpl(url, {
      signal: controller.signal,
      redirect: "follow",
      headers: { "User-Agent": opts.userAgent ?? DEFAULT_USER_AGENT },
    });
    if (!res.ok) {
      throw new FetchError(url, `HTTP ${res.status}: ${url}`, { status: res.status });
    }
    return await res.text();
  } catch (e) {
    if (e instanceof FetchError) throw e;
    if (controller.signal.aborted) {
      throw new FetchError(url, `Timed out after ${timeoutMs}ms: ${url}`, { cause: e });
    }
    throw new FetchError(url, `Request failed: ${url}: ${errorMessage(e)}`, { cause: e });
  } finally {
    clearTimeout(timeoutId);
  }
}

export interface Fetcher {
  fetch(venue: string, url: string): Promise<string>;
}

export interface FetcherOptions extends FetchHtmlOptions {
  cache?: ResponseCache | null;
}

/** Fetch venue pages through the response cache. Failed requests are never cached. */
export function createFetcher(opts: FetcherOptions = {}): Fetcher {
  const { cache, ...httpOpts } = opts;
  return {
    async fetch(venue, url) {
      const cached = cache ? await cache.get(venue, url) : null;
      if (cached != null) {
        console.info(`[fetch] ${venue}: cache hit for ${url}`);
        return cached;
      }
      const html = await fetchHtml(url, httpOpts);
      if (cache) {
        try {
          await cache.put(venue, url, html);
        } catch (e) {
          console.warn(`[fetch] ${venue}: could not cache ${url}: ${errorMessage(e)}`);
        }
      }
      return html;
    },
  };
}
