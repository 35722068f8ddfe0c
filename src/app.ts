import express, {
  type NextFunction,
  type Request,
  type Response,
} from "express";
import pinoHttp from "pino-http";
import type { Logger } from "pino";
import type { RankedCache } from "./jobs/cache";
import { logger as rootLogger } from "./lib/logger";
import { healthRouter } from "./routes/health";
import { postsRouter } from "./routes/posts";

export type AppDeps = {
  cache: Pick<RankedCache, "current" | "status">;
  logger?: Logger;
  now?: () => Date;
};

/** Read-only feed API. There is no mutation endpoint. */
export function createApp({ cache, logger = rootLogger, now }: AppDeps) {
  const app = express();
  app.disable("x-powered-by");
  app.use(pinoHttp({ logger }));

  app.get("/", (_req, res) => {
    res.type("text/plain").send("devnews feed server is running");
  });

  app.use(postsRouter(cache));
  app.use("/health", healthRouter(cache, now));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "not_found" });
  });

  // Express recognises error handlers by arity, keep all four params.
  app.use((e: unknown, req: Request, res: Response, _next: NextFunction) => {
    req.log.error({ err: e }, "request failed");
    res.status(500).json({ error: "server_error" });
  });

  return app;
}
