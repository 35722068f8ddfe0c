/**
 * Unit tests for refresh scheduling and failure backoff.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import pino from "pino";
import { NetworkError, type FetchError } from "../../src/lib/errors";
import { err, ok, type Result } from "../../src/lib/result";
import { RefreshScheduler, WARN_AFTER_FAILURES, retryDelay } from "../../src/schedule";
import type { RankedSnapshot } from "../../src/types/api";
import { deferred } from "../utils/deferred";
import { snapshot } from "../utils/fixtures";

type Outcome =
  | Result<RankedSnapshot, FetchError>
  | Promise<Result<RankedSnapshot, FetchError>>
  | Error;

function harness(outcomes: Outcome[]) {
  const lines: { level: number; msg: string; failures?: number; delayMs?: number }[] = [];
  const logger = pino({ level: "debug" }, { write: (line: string) => void lines.push(JSON.parse(line)) });

  const refresh = vi.fn(async (): Promise<Result<RankedSnapshot, FetchError>> => {
    const next = outcomes.shift() ?? ok(snapshot([]));
    if (next instanceof Error) throw next;
    return await next;
  });

  const cronTask = { stop: vi.fn() };
  let cronTick: () => void = () => {};
  const schedule = vi.fn((_expr: string, fn: () => void) => {
    cronTick = fn;
    return cronTask;
  });

  const scheduler = new RefreshScheduler({
    cache: { refresh },
    cron: "0 0 * * *",
    retryBaseMs: 1000,
    retryMaxMs: 5000,
    logger,
    schedule,
  });

  return { scheduler, refresh, schedule, cronTask, lines, fireCron: () => cronTick() };
}

const failure = () => err(new NetworkError("upstream down"));

async function settle() {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

describe("retryDelay", () => {
  it("doubles per consecutive failure", () => {
    expect(retryDelay(1, 1000, 10_000)).toBe(1000);
    expect(retryDelay(2, 1000, 10_000)).toBe(2000);
    expect(retryDelay(3, 1000, 10_000)).toBe(4000);
  });

  it("is capped", () => {
    expect(retryDelay(5, 1000, 10_000)).toBe(10_000);
    expect(retryDelay(50, 1000, 10_000)).toBe(10_000);
  });
});

describe("RefreshScheduler", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("refreshes once at start and registers the cron expression", async () => {
    const h = harness([]);
    const okFirst = await h.scheduler.start();
    expect(okFirst).toBe(true);
    expect(h.refresh).toHaveBeenCalledTimes(1);
    expect(h.schedule).toHaveBeenCalledWith("0 0 * * *", expect.any(Function));
    h.scheduler.stop();
  });

  it("refreshes on every cron tick", async () => {
    const h = harness([]);
    await h.scheduler.start();
    h.fireCron();
    await settle();
    expect(h.refresh).toHaveBeenCalledTimes(2);
    h.scheduler.stop();
  });

  it("retries a failed refresh with exponential backoff", async () => {
    const h = harness([failure(), failure(), failure()]);
    expect(await h.scheduler.start()).toBe(false);

    await vi.advanceTimersByTimeAsync(999);
    expect(h.refresh).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    await settle();
    expect(h.refresh).toHaveBeenCalledTimes(2);

    // second failure waits 2000ms
    await vi.advanceTimersByTimeAsync(1999);
    expect(h.refresh).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(1);
    await settle();
    expect(h.refresh).toHaveBeenCalledTimes(3);
    h.scheduler.stop();
  });

  it("warns from the third consecutive failure on", async () => {
    const h = harness([failure(), failure(), failure()]);
    const warnings = () => h.lines.filter((l) => l.level === 40);

    await h.scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);
    await settle();
    expect(warnings()).toHaveLength(0);

    await vi.advanceTimersByTimeAsync(2000);
    await settle();
    expect(h.scheduler.consecutiveFailures).toBe(WARN_AFTER_FAILURES);
    expect(warnings()).toHaveLength(1);
    expect(warnings()[0]).toMatchObject({
      msg: "refresh keeps failing, serving stale snapshot",
      failures: 3,
      delayMs: 4000,
    });
    h.scheduler.stop();
  });

  it("stops retrying once a refresh succeeds", async () => {
    const h = harness([failure()]);
    await h.scheduler.start();
    await vi.advanceTimersByTimeAsync(1000);
    await settle();
    expect(h.scheduler.consecutiveFailures).toBe(0);

    await vi.advanceTimersByTimeAsync(60_000);
    expect(h.refresh).toHaveBeenCalledTimes(2);
    h.scheduler.stop();
  });

  it("counts a thrown refresh as a failure instead of rejecting", async () => {
    const h = harness([new Error("bug")]);
    await expect(h.scheduler.start()).resolves.toBe(false);
    expect(h.scheduler.consecutiveFailures).toBe(1);
    h.scheduler.stop();
  });

  it("counts a refresh that a cron tick lands on only once", async () => {
    const gate = deferred<Result<RankedSnapshot, FetchError>>();
    const h = harness([gate.promise]);

    const first = h.scheduler.start();
    h.fireCron();
    gate.resolve(failure());
    expect(await first).toBe(false);
    await settle();

    expect(h.refresh).toHaveBeenCalledTimes(1);
    expect(h.scheduler.consecutiveFailures).toBe(1);

    h.scheduler.stop();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(h.refresh).toHaveBeenCalledTimes(1);
  });

  it("cancels the pending retry and the cron task on stop", async () => {
    const h = harness([failure()]);
    await h.scheduler.start();
    h.scheduler.stop();
    await vi.advanceTimersByTimeAsync(10_000);
    expect(h.refresh).toHaveBeenCalledTimes(1);
    expect(h.cronTask.stop).toHaveBeenCalledTimes(1);
  });
});
