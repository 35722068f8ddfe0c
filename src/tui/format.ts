import type { Post, RankedSnapshot } from "../types/api";
import type { BrowserState } from "./state";

export const KEY_HINTS =
  "↑/↓ move  PgUp/PgDn page  Enter open  r refresh  q quit";

function clock(iso: string): string {
  return `${iso.slice(11, 16)} UTC`;
}

export function formatPostLine(post: Post, rank: number): string {
  return `${String(rank).padStart(2)}. ${post.title} — ${post.author} (▲ ${post.upvotes})`;
}

function snapshotSummary(s: RankedSnapshot): string {
  return `${s.day} · updated ${clock(s.fetched_at)}`;
}

/** Bottom line; there is always something to say. */
export function statusLine(state: BrowserState): string {
  const { snapshot, status } = state;
  switch (status.kind) {
    case "loading":
      return snapshot
        ? `Refreshing… · showing ${snapshotSummary(snapshot)}`
        : "Loading posts…";
    case "ready":
      return snapshot
        ? `${snapshot.posts.length} posts · ${snapshotSummary(snapshot)}`
        : "No data";
    case "error":
      return snapshot
        ? `Error: ${status.message} · press R to retry, Esc to dismiss`
        : `Error: ${status.message} · press R to retry`;
  }
}

/** What fills the list area when there is no post to show. */
export function placeholder(state: BrowserState): string | null {
  const { snapshot, status } = state;
  if (snapshot && snapshot.posts.length > 0) return null;
  if (snapshot) return `No posts for ${snapshot.day}.`;
  if (status.kind === "error") {
    return `Could not load posts.\n${status.message}\n\nPress R to retry, q to quit.`;
  }
  return "Fetching the day's top posts…";
}
