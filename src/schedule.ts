import cron from "node-cron";
import type { Logger } from "pino";
import { logger as rootLogger } from "./lib/logger";
import { errorMessage, type FetchError } from "./lib/errors";
import type { Result } from "./lib/result";
import type { RankedSnapshot } from "./types/api";

export const WARN_AFTER_FAILURES = 3;

type Stoppable = { stop(): void };
type ScheduleFn = (expr: string, fn: () => void) => Stoppable;

export type SchedulerOptions = {
  cache: { refresh(): Promise<Result<RankedSnapshot, FetchError>> };
  cron: string;
  retryBaseMs: number;
  retryMaxMs: number;
  logger?: Logger;
  /** Defaults to node-cron in UTC */
  schedule?: ScheduleFn;
};

/** Wait before retrying after `failures` consecutive failed refreshes. */
export function retryDelay(
  failures: number,
  baseMs: number,
  maxMs: number
): number {
  return Math.min(baseMs * 2 ** Math.max(0, failures - 1), maxMs);
}

const utcCron: ScheduleFn = (expr, fn) =>
  cron.schedule(expr, fn, { timezone: "Etc/UTC" });

/**
 * Drives RankedCache.refresh(): once at start, then on the cron expression.
 * A failed run is retried on a capped exponential timer until one succeeds.
 */
export class RefreshScheduler {
  private task: Stoppable | null = null;
  private retryTimer: NodeJS.Timeout | null = null;
  private inflight: Promise<boolean> | null = null;
  private failures = 0;
  private running = false;
  private readonly log: Logger;

  constructor(private readonly opts: SchedulerOptions) {
    this.log = (opts.logger ?? rootLogger).child({ component: "scheduler" });
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  /** Resolves after the first refresh attempt, whatever its outcome. */
  async start(): Promise<boolean> {
    if (this.running) return this.failures === 0;
    this.running = true;
    const schedule = this.opts.schedule ?? utcCron;
    this.task = schedule(this.opts.cron, () => {
      void this.tick();
    });
    this.log.info({ cron: this.opts.cron }, "scheduler started");
    return this.tick();
  }

  stop(): void {
    this.running = false;
    this.task?.stop();
    this.task = null;
    this.clearRetry();
  }

  /** One refresh run. Never rejects. A tick that arrives mid-run joins it. */
  tick(): Promise<boolean> {
    if (!this.inflight) {
      this.inflight = this.run().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async run(): Promise<boolean> {
    this.clearRetry();

    let res: Result<RankedSnapshot, FetchError> | null = null;
    let message: string;
    try {
      res = await this.opts.cache.refresh();
      message = res.ok ? "" : res.error.message;
    } catch (e) {
      message = errorMessage(e);
    }

    if (res?.ok) {
      if (this.failures > 0) {
        this.log.info({ after: this.failures }, "refresh recovered");
      }
      this.failures = 0;
      return true;
    }

    this.failures++;
    const delayMs = retryDelay(
      this.failures,
      this.opts.retryBaseMs,
      this.opts.retryMaxMs
    );
    if (this.failures >= WARN_AFTER_FAILURES) {
      this.log.warn(
        { failures: this.failures, delayMs, err: message },
        "refresh keeps failing, serving stale snapshot"
      );
    } else {
      this.log.info(
        { failures: this.failures, delayMs, err: message },
        "refresh failed, will retry"
      );
    }

    if (this.running) {
      this.clearRetry();
      this.retryTimer = setTimeout(() => {
        void this.tick();
      }, delayMs);
    }
    return false;
  }

  private clearRetry(): void {
    if (this.retryTimer) clearTimeout(this.retryTimer);
    this.retryTimer = null;
  }
}
