import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import pino, { type Logger } from "pino";
import { z } from "zod";
import {
  Malformed,
  NotReady,
  Timeout,
  Unreachable,
  errorMessage,
  type FeedError,
} from "../lib/errors";
import { err, ok, type Result } from "../lib/result";
import type { RankedSnapshot } from "../types/api";

const PostSchema = z.object({
  id: z.string(),
  title: z.string(),
  url: z.string(),
  upvotes: z.number().int().nonnegative(),
  published_at: z.string(),
  author: z.string(),
});

export const FeedResponseSchema = z.object({
  fetched_at: z.string(),
  day: z.string(),
  posts: z.array(PostSchema),
});

export type FeedClientOptions = {
  serverUrl: string;
  timeoutMs: number;
  http?: AxiosInstance;
  logger?: Logger;
};

/** GET /posts against a devnews server, one retry on transient failures */
export class FeedClient {
  private readonly http: AxiosInstance;
  private readonly log: Logger;

  constructor(private readonly opts: FeedClientOptions) {
    this.http = opts.http ?? axios.create();
    this.log = opts.logger ?? pino({ level: "silent" });
  }

  get url(): string {
    return `${this.opts.serverUrl}/posts`;
  }

  async fetchFeed(): Promise<Result<RankedSnapshot, FeedError>> {
    const first = await this.attempt();
    if (first.ok || !first.error.retryable) return first;
    this.log.info({ err: first.error.message }, "feed fetch failed, retrying once");
    return this.attempt();
  }

  private async attempt(): Promise<Result<RankedSnapshot, FeedError>> {
    let res: AxiosResponse<unknown>;
    try {
      res = await this.http.get<unknown>(this.url, {
        timeout: this.opts.timeoutMs,
        headers: { Accept: "application/json" },
        validateStatus: () => true,
      });
    } catch (e) {
      if (
        axios.isAxiosError(e) &&
        (e.code === "ECONNABORTED" || e.code === "ETIMEDOUT")
      ) {
        return err(new Timeout(this.opts.timeoutMs));
      }
      return err(new Unreachable(`${this.url}: ${errorMessage(e)}`, { cause: e }));
    }

    if (res.status === 503) {
      const body = z.object({ error: z.literal("not_ready") }).safeParse(res.data);
      if (body.success) return err(new NotReady());
    }
    if (res.status >= 500) {
      return err(new Unreachable(`${this.url}: server answered ${res.status}`));
    }
    if (res.status !== 200) {
      return err(new Malformed(`${this.url}: unexpected status ${res.status}`));
    }

    const parsed = FeedResponseSchema.safeParse(res.data);
    if (!parsed.success) {
      return err(new Malformed(`${this.url}: response does not look like a feed`, {
        cause: parsed.error,
      }));
    }
    return ok(parsed.data);
  }
}
