import type { Post, RankedSnapshot } from "../types/api";

export type Status =
  | { kind: "loading" }
  | { kind: "ready" }
  | { kind: "error"; message: string };

export type BrowserState = {
  /** Last successfully fetched list; kept through Loading and Error */
  snapshot: RankedSnapshot | null;
  selectedIndex: number;
  status: Status;
  /** Sequence number of the latest fetch issued */
  requestSeq: number;
};

export type BrowserEvent =
  | { type: "start" }
  | { type: "refresh" }
  | { type: "fetch:succeeded"; seq: number; snapshot: RankedSnapshot }
  | { type: "fetch:failed"; seq: number; message: string }
  | { type: "move"; delta: number }
  | { type: "jump"; to: "top" | "bottom" }
  | { type: "open" }
  | { type: "dismiss" }
  | { type: "quit" };

export type Effect =
  | { type: "fetch"; seq: number }
  | { type: "open"; url: string }
  | { type: "quit" };

export type Transition = { state: BrowserState; effects: Effect[] };

export function initialState(): BrowserState {
  return {
    snapshot: null,
    selectedIndex: 0,
    status: { kind: "loading" },
    requestSeq: 0,
  };
}

function clamp(index: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(Math.max(index, 0), length - 1);
}

export function selectedPost(state: BrowserState): Post | null {
  return state.snapshot?.posts[state.selectedIndex] ?? null;
}

const unchanged = (state: BrowserState): Transition => ({ state, effects: [] });

function load(state: BrowserState): Transition {
  const seq = state.requestSeq + 1;
  return {
    state: { ...state, status: { kind: "loading" }, requestSeq: seq },
    effects: [{ type: "fetch", seq }],
  };
}

/**
 * The whole browser as one transition function. Key presses and fetch
 * completions both arrive here; effects are carried out by the caller.
 */
export function reduce(state: BrowserState, event: BrowserEvent): Transition {
  switch (event.type) {
    case "start":
      return load(state);

    case "refresh":
      // a fetch is already in flight
      if (state.status.kind === "loading") return unchanged(state);
      return load(state);

    case "fetch:succeeded":
      if (event.seq !== state.requestSeq) return unchanged(state);
      return {
        state: {
          ...state,
          snapshot: event.snapshot,
          selectedIndex: 0,
          status: { kind: "ready" },
        },
        effects: [],
      };

    case "fetch:failed":
      if (event.seq !== state.requestSeq) return unchanged(state);
      return {
        state: { ...state, status: { kind: "error", message: event.message } },
        effects: [],
      };

    case "move":
    case "jump": {
      const posts = state.snapshot?.posts ?? [];
      if (posts.length === 0) return unchanged(state);
      const target =
        event.type === "move"
          ? state.selectedIndex + event.delta
          : event.to === "top"
            ? 0
            : posts.length - 1;
      const selectedIndex = clamp(target, posts.length);
      if (selectedIndex === state.selectedIndex) return unchanged(state);
      return { state: { ...state, selectedIndex }, effects: [] };
    }

    case "open": {
      const post = selectedPost(state);
      if (!post) return unchanged(state);
      return { state, effects: [{ type: "open", url: post.url }] };
    }

    case "dismiss":
      if (state.status.kind !== "error" || !state.snapshot) return unchanged(state);
      return { state: { ...state, status: { kind: "ready" } }, effects: [] };

    case "quit":
      return { state, effects: [{ type: "quit" }] };
  }
}
