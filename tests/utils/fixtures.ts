import type { DevToArticle } from "../../src/types/devto";
import type { Post, RankedSnapshot } from "../../src/types/api";

/** A dev.to list item; published at noon of 2024-03-09 UTC unless given. */
export function article(
  id: number,
  reactions: number,
  overrides: Partial<DevToArticle> = {}
): DevToArticle {
  return {
    id,
    title: `Post ${id}`,
    url: `https://dev.example/posts/${id}`,
    positive_reactions_count: reactions,
    published_at: "2024-03-09T12:00:00Z",
    user: { name: `author${id}` },
    ...overrides,
  };
}

export function post(id: string, upvotes: number, overrides: Partial<Post> = {}): Post {
  return {
    id,
    title: `Post ${id}`,
    url: `https://dev.example/posts/${id}`,
    upvotes,
    published_at: "2024-03-09T12:00:00.000Z",
    author: `author${id}`,
    ...overrides,
  };
}

export function snapshot(posts: Post[], fetchedAt = "2024-03-10T00:05:00.000Z"): RankedSnapshot {
  return { fetched_at: fetchedAt, day: "2024-03-09", posts };
}
