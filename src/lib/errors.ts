// Upstream (dev.to) failures

/** Connection failure, timeout or 5xx. Retryable. */
export class NetworkError extends Error {
  readonly kind = "network" as const;
  readonly retryable = true;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
  }
}

/** HTTP 429. Callers back off for at least `retryAfterMs` when it is known. */
export class RateLimited extends Error {
  readonly kind = "rate_limited" as const;
  readonly retryable = true;
  constructor(readonly retryAfterMs: number | null) {
    super(
      retryAfterMs === null
        ? "Rate limited by upstream"
        : `Rate limited by upstream, retry after ${retryAfterMs}ms`
    );
    this.name = "RateLimited";
  }
}

export class MalformedResponse extends Error {
  readonly kind = "malformed_response" as const;
  readonly retryable = false;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MalformedResponse";
  }
}

export type FetchError = NetworkError | RateLimited | MalformedResponse;

// Feed server failures, as seen by the terminal client

export class Unreachable extends Error {
  readonly kind = "unreachable" as const;
  readonly retryable = true;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "Unreachable";
  }
}

export class Timeout extends Error {
  readonly kind = "timeout" as const;
  readonly retryable = true;
  constructor(readonly timeoutMs: number) {
    super(`Request timed out after ${timeoutMs}ms`);
    this.name = "Timeout";
  }
}

export class Malformed extends Error {
  readonly kind = "malformed" as const;
  readonly retryable = false;
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "Malformed";
  }
}

/** The server is up but has not produced its first snapshot. */
export class NotReady extends Error {
  readonly kind = "not_ready" as const;
  readonly retryable = true;
  constructor() {
    super("Feed is not ready yet");
    this.name = "NotReady";
  }
}

export type FeedError = Unreachable | Timeout | Malformed | NotReady;

/** Best-effort message for anything caught. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
