import type { Logger } from "pino";
import { logger as rootLogger } from "../lib/logger";
import { targetDay } from "../lib/day";
import type { FetchError } from "../lib/errors";
import { ok, type Result } from "../lib/result";
import type { Post, RankedSnapshot } from "../types/api";
import type { TopPage } from "./devto";
import { mergePosts, rankPosts } from "./ranking";

/** What the cache needs from the upstream client. */
export interface TopSource {
  readonly maxPages: number;
  fetchTop(day: string, page: number): Promise<Result<TopPage, FetchError>>;
}

export type RankedCacheOptions = {
  source: TopSource;
  maxPosts: number;
  /** 1 ranks yesterday (a complete day), 0 ranks today so far */
  dayOffsetDays: number;
  now?: () => Date;
  logger?: Logger;
};

export type CacheStatus = {
  ready: boolean;
  refreshing: boolean;
  consecutiveFailures: number;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
  lastError: string | null;
};

/**
 * Holds the one current snapshot. A refresh builds the next snapshot off to
 * the side and installs it with a single assignment, so `current()` returns
 * either the old list or the new one and never waits on the network.
 */
export class RankedCache {
  private snapshot: RankedSnapshot | null = null;
  private inflight: Promise<Result<RankedSnapshot, FetchError>> | null = null;

  private consecutiveFailures = 0;
  private lastSuccessAt: string | null = null;
  private lastFailureAt: string | null = null;
  private lastError: string | null = null;

  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private readonly opts: RankedCacheOptions) {
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: "cache" });
  }

  /** Latest complete snapshot, or null before the first successful refresh */
  current(): RankedSnapshot | null {
    return this.snapshot;
  }

  status(): CacheStatus {
    return {
      ready: this.snapshot !== null,
      refreshing: this.inflight !== null,
      consecutiveFailures: this.consecutiveFailures,
      lastSuccessAt: this.lastSuccessAt,
      lastFailureAt: this.lastFailureAt,
      lastError: this.lastError,
    };
  }

  /** Callers that arrive mid-refresh share the in-flight one. */
  refresh(): Promise<Result<RankedSnapshot, FetchError>> {
    if (!this.inflight) {
      this.inflight = this.rebuild().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async rebuild(): Promise<Result<RankedSnapshot, FetchError>> {
    const day = targetDay(this.now(), this.opts.dayOffsetDays);
    const { source } = this.opts;
    this.log.info({ day }, "refresh start");

    const pages: Post[][] = [];
    for (let page = 1; page <= source.maxPages; page++) {
      const res = await source.fetchTop(day, page);
      if (!res.ok) {
        this.consecutiveFailures++;
        this.lastFailureAt = this.now().toISOString();
        this.lastError = res.error.message;
        this.log.error(
          { day, page, kind: res.error.kind, err: res.error.message },
          "refresh failed, keeping previous snapshot"
        );
        return res;
      }
      pages.push(res.value.posts);
      if (!res.value.hasMore) break;
    }

    const posts = rankPosts(mergePosts(pages), this.opts.maxPosts).map((p) =>
      Object.freeze({ ...p })
    );
    const next: RankedSnapshot = Object.freeze({
      fetched_at: this.now().toISOString(),
      day,
      posts: Object.freeze(posts),
    });

    this.snapshot = next;
    this.consecutiveFailures = 0;
    this.lastSuccessAt = next.fetched_at;
    this.lastError = null;
    this.log.info(
      { day, pages: pages.length, posts: posts.length },
      "refresh done"
    );
    return ok(next);
  }
}
