import pino, { type Logger } from "pino";
import { errorMessage, type FeedError } from "../lib/errors";
import type { Result } from "../lib/result";
import type { RankedSnapshot } from "../types/api";
import { Channel } from "./channel";
import {
  initialState,
  reduce,
  type BrowserEvent,
  type BrowserState,
  type Effect,
} from "./state";

export interface FeedSource {
  fetchFeed(): Promise<Result<RankedSnapshot, FeedError>>;
}

export interface Renderer {
  render(state: BrowserState): void;
}

export type BrowserAppOptions = {
  feed: FeedSource;
  view: Renderer;
  /** Hands a URL to the system browser */
  opener: (url: string) => Promise<void>;
  logger?: Logger;
};

/** Status-line text for a failed fetch */
export function describeFeedError(e: FeedError): string {
  switch (e.kind) {
    case "unreachable":
      return "Cannot reach the feed server";
    case "timeout":
      return `Feed server did not answer within ${e.timeoutMs}ms`;
    case "not_ready":
      return "Feed server has no posts yet";
    case "malformed":
      return "Feed server sent an unexpected response";
  }
}

/**
 * Event loop of the terminal client. Key presses and fetch completions are
 * both sent into one channel and applied in order by `run()`, so a fetch in
 * flight never blocks navigation.
 */
export class BrowserApp {
  private state: BrowserState = initialState();
  private readonly events = new Channel<BrowserEvent>();
  private readonly log: Logger;

  constructor(private readonly opts: BrowserAppOptions) {
    this.log = opts.logger ?? pino({ level: "silent" });
  }

  get current(): BrowserState {
    return this.state;
  }

  dispatch(event: BrowserEvent): void {
    this.events.send(event);
  }

  /** Resolves when the user quits. */
  async run(): Promise<void> {
    this.opts.view.render(this.state);
    this.dispatch({ type: "start" });

    for await (const event of this.events) {
      const { state, effects } = reduce(this.state, event);
      const changed = state !== this.state;
      this.state = state;
      if (changed) this.opts.view.render(state);

      for (const effect of effects) {
        if (effect.type === "quit") {
          this.events.close();
          return;
        }
        this.perform(effect);
      }
    }
  }

  private perform(effect: Exclude<Effect, { type: "quit" }>): void {
    switch (effect.type) {
      case "fetch":
        this.fetchInBackground(effect.seq);
        return;
      case "open":
        this.log.info({ url: effect.url }, "opening post");
        this.opts.opener(effect.url).catch((e: unknown) => {
          this.log.warn({ url: effect.url, err: errorMessage(e) }, "could not open post");
        });
        return;
    }
  }

  private fetchInBackground(seq: number): void {
    this.log.debug({ seq }, "fetch start");
    void this.opts.feed.fetchFeed().then(
      (res) => {
        if (res.ok) {
          this.log.info({ seq, posts: res.value.posts.length }, "fetch done");
          this.dispatch({ type: "fetch:succeeded", seq, snapshot: res.value });
        } else {
          this.log.warn({ seq, kind: res.error.kind, err: res.error.message }, "fetch failed");
          this.dispatch({ type: "fetch:failed", seq, message: describeFeedError(res.error) });
        }
      },
      (e: unknown) => {
        this.log.error({ seq, err: errorMessage(e) }, "fetch crashed");
        this.dispatch({ type: "fetch:failed", seq, message: errorMessage(e) });
      }
    );
  }
}
