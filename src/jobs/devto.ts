import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { Logger } from "pino";
import { logger as rootLogger } from "../lib/logger";
import { dayBounds } from "../lib/day";
import {
  MalformedResponse,
  NetworkError,
  RateLimited,
  errorMessage,
  type FetchError,
} from "../lib/errors";
import { withRetries, type RetryPolicy } from "../lib/rate_limit";
import { err, ok, type Result } from "../lib/result";
import type { Post } from "../types/api";
import { DevToPageSchema, type DevToArticle } from "../types/devto";
import { DEVTO } from "./config";

export type UpstreamOptions = {
  baseUrl: string;
  apiKey: string | null;
  perPage: number;
  maxPages: number;
  timeoutMs: number;
  retry?: RetryPolicy;
  /** Swapped in tests with an instance on a stub adapter */
  http?: AxiosInstance;
  logger?: Logger;
};

export type TopPage = {
  /** Posts of this page published on the requested day, unsorted */
  posts: Post[];
  /** False once pagination should stop */
  hasMore: boolean;
};

/** Simple normalizer: guarantees required fields and trims */
export function normalize(a: DevToArticle): Post {
  return {
    id: String(a.id),
    title: a.title.trim() || "(no title)",
    url: a.url,
    upvotes: Math.max(0, a.positive_reactions_count),
    published_at: new Date(a.published_at).toISOString(),
    author: a.user.name.trim() || "unknown",
  };
}

/** Retry-After is either delta-seconds or an HTTP date. */
export function parseRetryAfter(
  value: string | undefined,
  now: number = Date.now()
): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000;
  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return null;
  return Math.max(0, at - now);
}

function headerValue(res: AxiosResponse<unknown>, name: string) {
  const v: unknown = res.headers[name];
  return typeof v === "string" ? v : undefined;
}

/** Typed wrapper around GET /articles/latest. Never throws on I/O. */
export class UpstreamClient {
  private readonly http: AxiosInstance;
  private readonly retry: RetryPolicy;
  private readonly log: Logger;

  constructor(private readonly opts: UpstreamOptions) {
    this.http = opts.http ?? axios.create();
    this.retry = opts.retry ?? DEVTO.retry;
    this.log = (opts.logger ?? rootLogger).child({ component: "upstream" });
  }

  get maxPages(): number {
    return this.opts.maxPages;
  }

  /** Build a URL for the latest-articles endpoint with safe params */
  buildUrl(page: number): string {
    const params = new URLSearchParams({
      per_page: String(this.opts.perPage),
      page: String(page),
    });
    return `${this.opts.baseUrl}/articles/latest?${params.toString()}`;
  }

  /**
   * One page of the day's posts. `hasMore` turns false on a short page, on
   * the page limit, or once the listing has gone past the start of `day`.
   */
  async fetchTop(
    day: string,
    page: number
  ): Promise<Result<TopPage, FetchError>> {
    if (!Number.isInteger(page) || page < 1) {
      throw new RangeError(`page must be a positive integer, got ${page}`);
    }
    const { start, end } = dayBounds(day);

    const res = await withRetries(
      () => this.fetchPage(page),
      this.retry,
      ({ attempt, maxAttempts, delayMs, error }) =>
        this.log.warn(
          { page, attempt, maxAttempts, delayMs, err: error.message },
          "upstream page failed, retrying"
        )
    );
    if (!res.ok) return res;

    const items = res.value;
    const posts: Post[] = [];
    let oldest = Infinity;
    for (const a of items) {
      const at = Date.parse(a.published_at);
      oldest = Math.min(oldest, at);
      if (at >= start && at < end) posts.push(normalize(a));
    }

    const hasMore =
      items.length >= this.opts.perPage &&
      page < this.opts.maxPages &&
      oldest >= start;

    this.log.debug(
      { day, page, received: items.length, kept: posts.length, hasMore },
      "upstream page"
    );
    return ok({ posts, hasMore });
  }

  /** Fetch and validate one raw page, no retries */
  async fetchPage(page: number): Promise<Result<DevToArticle[], FetchError>> {
    const headers: Record<string, string> = {
      Accept: "application/json",
      "User-Agent": DEVTO.userAgent,
    };
    if (this.opts.apiKey) headers["api-key"] = this.opts.apiKey;

    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.get<unknown>(this.buildUrl(page), {
        headers,
        timeout: this.opts.timeoutMs,
        // Status handling is ours, see below.
        validateStatus: () => true,
      });
    } catch (e) {
      return err(new NetworkError(`GET page ${page}: ${errorMessage(e)}`, { cause: e }));
    }

    if (res.status === 429) {
      return err(new RateLimited(parseRetryAfter(headerValue(res, "retry-after"))));
    }
    if (res.status >= 500) {
      return err(new NetworkError(`GET page ${page}: upstream status ${res.status}`));
    }
    if (res.status < 200 || res.status >= 300) {
      return err(new MalformedResponse(`GET page ${page}: unexpected status ${res.status}`));
    }

    const parsed = DevToPageSchema.safeParse(res.data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "body"}: ${issue.message}` : "body";
      return err(new MalformedResponse(`GET page ${page}: ${where}`, { cause: parsed.error }));
    }
    return ok(parsed.data);
  }
}
