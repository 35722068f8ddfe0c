import type { Post } from "../types/api";

/** Collapse pages into one set keyed by id. A later sighting wins. */
export function mergePosts(pages: readonly (readonly Post[])[]): Post[] {
  const byId = new Map<string, Post>();
  for (const page of pages) {
    for (const p of page) {
      // delete first so the entry moves to its last-seen position
      byId.delete(p.id);
      byId.set(p.id, p);
    }
  }
  return [...byId.values()];
}

/** upvotes desc, then published_at desc, then id asc */
export function comparePosts(a: Post, b: Post): number {
  if (a.upvotes !== b.upvotes) return b.upvotes - a.upvotes;
  const ta = Date.parse(a.published_at);
  const tb = Date.parse(b.published_at);
  if (ta !== tb) return tb - ta;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function rankPosts(posts: readonly Post[], maxPosts: number): Post[] {
  return [...posts].sort(comparePosts).slice(0, Math.max(0, maxPosts));
}
