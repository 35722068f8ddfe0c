#!/usr/bin/env node
import type { Server } from "http";
import { createApp } from "./app";
import { RankedCache } from "./jobs/cache";
import { UpstreamClient } from "./jobs/devto";
import { loadServerConfig, type ServerConfig } from "./lib/env";
import { logger } from "./lib/logger";
import { RefreshScheduler } from "./schedule";

process.on("unhandledRejection", (reason) => {
  logger.error({ reason }, "UNHANDLED_REJECTION");
});
process.on("uncaughtException", (err) => {
  logger.error({ err }, "UNCAUGHT_EXCEPTION");
});

function listen(
  app: ReturnType<typeof createApp>,
  { host, port }: ServerConfig["listen"]
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host, () => resolve(server));
    server.once("error", reject);
  });
}

async function main() {
  const config = loadServerConfig();

  const upstream = new UpstreamClient(config.upstream);
  const cache = new RankedCache({
    source: upstream,
    maxPosts: config.maxPosts,
    dayOffsetDays: config.dayOffsetDays,
  });
  const scheduler = new RefreshScheduler({
    cache,
    cron: config.refresh.cron,
    retryBaseMs: config.refresh.retryBaseMs,
    retryMaxMs: config.refresh.retryMaxMs,
  });

  const server = await listen(createApp({ cache }), config.listen);
  logger.info(
    {
      url: `http://${config.listen.host}:${config.listen.port}`,
      upstream: config.upstream.baseUrl,
      hasApiKey: config.upstream.apiKey !== null,
      maxPosts: config.maxPosts,
      maxPages: config.upstream.maxPages,
      cron: config.refresh.cron,
    },
    "devnews server listening"
  );

  // Serve 503s until the first refresh lands, don't hold the port back.
  void scheduler.start();

  const shutdown = (signal: string) => {
    logger.info({ signal }, "shutting down");
    scheduler.stop();
    server.close(() => process.exit(0));
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((e: unknown) => {
  logger.fatal({ err: e }, "server failed to start");
  process.exit(1);
});
