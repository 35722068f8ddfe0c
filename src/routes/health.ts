import { Router, type Request, type Response } from "express";
import type { RankedCache } from "../jobs/cache";

export function healthRouter(
  cache: Pick<RankedCache, "current" | "status">,
  now: () => Date = () => new Date()
): Router {
  const router = Router();

  // 1) Liveness
  router.get("/live", (_req: Request, res: Response) => {
    res.json({ ok: true, service: "devnews", status: "alive" });
  });

  // 2) Snapshot freshness
  router.get("/cache", (_req: Request, res: Response) => {
    const snapshot = cache.current();
    const s = cache.status();
    res.json({
      ok: s.consecutiveFailures === 0,
      ready: snapshot !== null,
      day: snapshot?.day ?? null,
      fetched_at: snapshot?.fetched_at ?? null,
      age_seconds: snapshot
        ? Math.floor((now().getTime() - Date.parse(snapshot.fetched_at)) / 1000)
        : null,
      posts: snapshot?.posts.length ?? 0,
      consecutive_failures: s.consecutiveFailures,
      last_error: s.lastError,
      refreshing: s.refreshing,
    });
  });

  return router;
}
