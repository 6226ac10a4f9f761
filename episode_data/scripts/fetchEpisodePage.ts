import fetch, { type RequestInit, type Response } from "node-fetch";
import iconv from "iconv-lite";
import {
  MIN_REQUEST_INTERVAL_MS,
  REQUEST_TIMEOUT_MS,
  USER_AGENT,
} from "./config.js";

export type RawPage = {
  url: string;
  status: number;
  html: string;
};

export type FetchErrorKind = "http" | "timeout" | "network";

export class FetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly url: string;
  readonly status?: number;

  constructor(
    kind: FetchErrorKind,
    url: string,
    message: string,
    options?: { status?: number; cause?: unknown }
  ) {
    super(message, { cause: options?.cause });
    this.name = "FetchError";
    this.kind = kind;
    this.url = url;
    this.status = options?.status;
  }
}

export type FetchResult =
  | { ok: true; page: RawPage }
  | { ok: false; error: FetchError };

/** Anything that can turn an episode URL into a page. */
export interface EpisodePageSource {
  fetch(url: string): Promise<FetchResult>;
}

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export type HttpGet = (url: string, init: RequestInit) => Promise<Response>;

export type EpisodePageFetcherOptions = {
  clock?: Clock;
  httpGet?: HttpGet;
  minIntervalMs?: number;
  timeoutMs?: number;
};

/**
 * Fetches wiki pages one at a time, keeping at least `minIntervalMs` between
 * the start of one request and the start of the next.
 */
export class EpisodePageFetcher implements EpisodePageSource {
  private readonly clock: Clock;
  private readonly httpGet: HttpGet;
  private readonly minIntervalMs: number;
  private readonly timeoutMs: number;
  private lastRequestStartedAt: number | undefined;

  constructor(options: EpisodePageFetcherOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.httpGet = options.httpGet ?? fetch;
    this.minIntervalMs = options.minIntervalMs ?? MIN_REQUEST_INTERVAL_MS;
    this.timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  }

  async fetch(url: string): Promise<FetchResult> {
    await this.waitForSlot();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    try {
      const response = await this.httpGet(url, {
        headers: { "User-Agent": USER_AGENT },
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          ok: false,
          error: new FetchError(
            "http",
            url,
            `Failed to fetch ${url}: ${response.status} ${response.statusText}`,
            { status: response.status }
          ),
        };
      }

      const buffer = Buffer.from(await response.arrayBuffer());
      const html = iconv.decode(buffer, charsetOf(response));
      return { ok: true, page: { url, status: response.status, html } };
    } catch (e) {
      if (timedOut) {
        return {
          ok: false,
          error: new FetchError(
            "timeout",
            url,
            `Timed out after ${this.timeoutMs}ms fetching ${url}`,
            { cause: e }
          ),
        };
      }
      const reason = e instanceof Error ? e.message : String(e);
      return {
        ok: false,
        error: new FetchError("network", url, `Error fetching ${url}: ${reason}`, {
          cause: e,
        }),
      };
    } finally {
      clearTimeout(timer);
    }
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastRequestStartedAt !== undefined) {
      const wait = this.lastRequestStartedAt + this.minIntervalMs - this.clock.now();
      if (wait > 0) {
        await this.clock.sleep(wait);
      }
    }
    this.lastRequestStartedAt = this.clock.now();
  }
}

function charsetOf(response: Response): string {
  const contentType = response.headers.get("content-type") ?? "";
  const match = /charset=["']?([^;"'\s]+)/i.exec(contentType);
  if (match && iconv.encodingExists(match[1])) {
    return match[1];
  }
  return "utf-8";
}
