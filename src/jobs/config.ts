import { retryPolicy } from "../lib/rate_limit";

export const DEVTO = {
  userAgent: "devnews/0.1.0",
  // Per page, not per refresh.
  retry: retryPolicy({
    maxAttempts: 4,
    baseDelayMs: 1000,
    multiplier: 2,
    maxDelayMs: 30_000,
  }),
};
