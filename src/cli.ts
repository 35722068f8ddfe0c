#!/usr/bin/env node
import { Command, InvalidArgumentError } from "commander";
import { FeedClient } from "./client/feed";
import { errorMessage } from "./lib/errors";
import { loadClientConfig } from "./lib/env";
import { fileLogger } from "./lib/logger";
import { BrowserApp } from "./tui/app";
import { openInBrowser } from "./tui/opener";
import { TerminalView } from "./tui/view";

function parseServerUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new InvalidArgumentError(`not a URL: ${raw}`);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new InvalidArgumentError(`expected http(s) URL, got ${url.protocol}`);
  }
  return raw.replace(/\/+$/, "");
}

function parseTimeout(raw: string): number {
  const ms = Number(raw);
  if (!Number.isInteger(ms) || ms < 100) {
    throw new InvalidArgumentError("timeout must be an integer >= 100 (ms)");
  }
  return ms;
}

const program = new Command();

program
  .name("devnews")
  .description("Browse the day's most-upvoted developer posts in the terminal")
  .version("0.1.0")
  .option("-s, --server <url>", "feed server base URL (overrides SERVER_URL)", parseServerUrl)
  .option("-t, --timeout <ms>", "request timeout in ms", parseTimeout)
  .action(async (opts: { server?: string; timeout?: number }) => {
    const config = loadClientConfig();
    const log = fileLogger(config.logLevel, config.logFile);
    const serverUrl = opts.server ?? config.serverUrl;

    const feed = new FeedClient({
      serverUrl,
      timeoutMs: opts.timeout ?? config.timeoutMs,
      logger: log.child({ component: "feed" }),
    });
    const view = new TerminalView();
    const app = new BrowserApp({
      feed,
      view,
      opener: openInBrowser,
      logger: log.child({ component: "browser" }),
    });
    view.bindKeys((event) => app.dispatch(event));
    log.info({ serverUrl }, "devnews started");

    try {
      await app.run();
    } finally {
      view.destroy();
    }
    log.info("devnews quit");
    process.exit(0);
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`devnews: ${errorMessage(e)}`);
  process.exit(1);
});
