import { Router, type Request, type Response } from "express";
import type { RankedCache } from "../jobs/cache";
import type { ErrorResponse, FeedResponse } from "../types/api";

/** Seconds a client should wait before asking again while not ready */
export const NOT_READY_RETRY_AFTER = 30;

type SnapshotSource = Pick<RankedCache, "current">;

export function postsRouter(cache: SnapshotSource): Router {
  const router = Router();

  /**
   * GET /posts?limit=10
   * - limit: optional, 1..N; returns the first `limit` ranked posts.
   */
  router.get(
    "/posts",
    (req: Request, res: Response<FeedResponse | ErrorResponse>) => {
      // One read of the slot per request
      const snapshot = cache.current();
      if (!snapshot) {
        res.set("Retry-After", String(NOT_READY_RETRY_AFTER));
        return res.status(503).json({ error: "not_ready" });
      }

      let posts = snapshot.posts;
      if (req.query.limit !== undefined) {
        const raw = String(req.query.limit);
        const limit = /^\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
        if (!(limit >= 1)) {
          return res.status(400).json({ error: "invalid_limit" });
        }
        posts = posts.slice(0, limit);
      }

      return res.json({
        fetched_at: snapshot.fetched_at,
        day: snapshot.day,
        posts: [...posts],
      });
    }
  );

  return router;
}
