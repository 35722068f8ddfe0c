export type Post = {
  id: string;
  title: string;
  url: string;
  upvotes: number; // integer >= 0
  published_at: string; // ISO
  author: string;
};

/** One refresh worth of ranked posts. Frozen once installed. */
export type RankedSnapshot = {
  fetched_at: string; // ISO
  day: string; // YYYY-MM-DD (UTC)
  posts: readonly Post[];
};

/** Body of GET /posts */
export type FeedResponse = {
  fetched_at: string;
  day: string;
  posts: Post[];
};

export type ErrorResponse = {
  error: "not_ready" | "invalid_limit" | "not_found" | "server_error";
};
