/**
 * The terminal event loop: key events and fetch completions through one
 * channel, with fake feed, view and opener.
 */

import { describe, it, expect, vi } from "vitest";
import { BrowserApp, describeFeedError, type FeedSource, type Renderer } from "../../src/tui/app";
import type { BrowserState } from "../../src/tui/state";
import { Malformed, NotReady, Timeout, Unreachable, type FeedError } from "../../src/lib/errors";
import { err, ok, type Result } from "../../src/lib/result";
import type { RankedSnapshot } from "../../src/types/api";
import { deferred, type Deferred } from "../utils/deferred";
import { post, snapshot } from "../utils/fixtures";

type FeedResult = Result<RankedSnapshot, FeedError>;

/** Every fetchFeed() call parks on a deferred the test settles */
class FakeFeed implements FeedSource {
  pending: Deferred<FeedResult>[] = [];
  fetchFeed(): Promise<FeedResult> {
    const d = deferred<FeedResult>();
    this.pending.push(d);
    return d.promise;
  }
}

class FakeView implements Renderer {
  frames: BrowserState[] = [];
  render(state: BrowserState): void {
    this.frames.push(state);
  }
  get last(): BrowserState | undefined {
    return this.frames[this.frames.length - 1];
  }
}

const S = snapshot([post("a", 3), post("b", 2), post("c", 1)]);
const S2 = snapshot([post("z", 50)], "2024-03-11T00:05:00.000Z");

function setup(opener: (url: string) => Promise<void> = vi.fn(async () => {})) {
  const feed = new FakeFeed();
  const view = new FakeView();
  const app = new BrowserApp({ feed, view, opener });
  const done = app.run();
  return { feed, view, app, opener, done };
}

describe("BrowserApp", () => {
  it("renders Loading, fetches on start, then renders the list", async () => {
    const { feed, view, app, done } = setup();
    await vi.waitFor(() => expect(feed.pending).toHaveLength(1));
    expect(view.frames[0].status).toEqual({ kind: "loading" });

    feed.pending[0].resolve(ok(S));
    await vi.waitFor(() => expect(view.last?.status).toEqual({ kind: "ready" }));
    expect(view.last?.snapshot).toBe(S);

    app.dispatch({ type: "quit" });
    await done;
  });

  it("keeps navigating while a refresh is in flight", async () => {
    const { feed, view, app, done } = setup();
    await vi.waitFor(() => expect(feed.pending).toHaveLength(1));
    feed.pending[0].resolve(ok(S));
    await vi.waitFor(() => expect(view.last?.status.kind).toBe("ready"));

    app.dispatch({ type: "refresh" });
    app.dispatch({ type: "move", delta: 1 });
    await vi.waitFor(() => expect(view.last?.selectedIndex).toBe(1));
    expect(view.last?.status.kind).toBe("loading");
    expect(view.last?.snapshot).toBe(S);

    feed.pending[1].resolve(ok(S2));
    await vi.waitFor(() => expect(view.last?.snapshot).toBe(S2));
    expect(view.last?.selectedIndex).toBe(0);

    app.dispatch({ type: "quit" });
    await done;
  });

  it("shows a failed refresh as an error over the old list", async () => {
    const { feed, view, app, done } = setup();
    await vi.waitFor(() => expect(feed.pending).toHaveLength(1));
    feed.pending[0].resolve(ok(S));
    await vi.waitFor(() => expect(view.last?.status.kind).toBe("ready"));

    app.dispatch({ type: "refresh" });
    await vi.waitFor(() => expect(feed.pending).toHaveLength(2));
    feed.pending[1].resolve(err(new Timeout(5000)));

    await vi.waitFor(() =>
      expect(view.last?.status).toEqual({ kind: "error", message: "Feed server did not answer within 5000ms" })
    );
    expect(view.last?.snapshot).toBe(S);

    app.dispatch({ type: "quit" });
    await done;
  });

  it("turns a rejected fetch into an error state", async () => {
    const { feed, app, done } = setup();
    await vi.waitFor(() => expect(feed.pending).toHaveLength(1));
    feed.pending[0].reject(new Error("socket hang up"));
    await vi.waitFor(() => expect(app.current.status).toEqual({ kind: "error", message: "socket hang up" }));

    app.dispatch({ type: "quit" });
    await done;
  });

  it("opens the selected post", async () => {
    const { feed, app, opener, done } = setup();
    await vi.waitFor(() => expect(feed.pending).toHaveLength(1));
    feed.pending[0].resolve(ok(S));
    await vi.waitFor(() => expect(app.current.status.kind).toBe("ready"));
    app.dispatch({ type: "move", delta: 2 });
    app.dispatch({ type: "open" });

    await vi.waitFor(() => expect(opener).toHaveBeenCalledWith("https://dev.example/posts/c"));
    app.dispatch({ type: "quit" });
    await done;
  });

  it("survives an opener failure", async () => {
    const opener = vi.fn(async (_url: string) => {
      throw new Error("no browser");
    });
    const { feed, app, done } = setup(opener);
    await vi.waitFor(() => expect(feed.pending).toHaveLength(1));
    feed.pending[0].resolve(ok(S));
    await vi.waitFor(() => expect(app.current.status.kind).toBe("ready"));
    app.dispatch({ type: "open" });
    await vi.waitFor(() => expect(opener).toHaveBeenCalledTimes(1));

    app.dispatch({ type: "move", delta: 1 });
    await vi.waitFor(() => expect(app.current.selectedIndex).toBe(1));
    app.dispatch({ type: "quit" });
    await done;
  });

  it("stops consuming events after quit", async () => {
    const { feed, app, done } = setup();
    await vi.waitFor(() => expect(feed.pending).toHaveLength(1));
    feed.pending[0].resolve(ok(S));
    await vi.waitFor(() => expect(app.current.status.kind).toBe("ready"));

    app.dispatch({ type: "quit" });
    app.dispatch({ type: "refresh" });
    await done;
    expect(feed.pending).toHaveLength(1);
  });
});

describe("describeFeedError", () => {
  it("has a status-line message for every error kind", () => {
    expect(describeFeedError(new Unreachable("ECONNREFUSED"))).toBe("Cannot reach the feed server");
    expect(describeFeedError(new Timeout(2000))).toBe("Feed server did not answer within 2000ms");
    expect(describeFeedError(new NotReady())).toBe("Feed server has no posts yet");
    expect(describeFeedError(new Malformed("bad"))).toBe("Feed server sent an unexpected response");
  });
});
