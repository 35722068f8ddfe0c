import * as dotenv from "dotenv";
import cron from "node-cron";
import { z } from "zod";

dotenv.config();

const intIn = (min: number, max: number, fallback: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const ServerEnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  LOG_LEVEL: z.string().default("info"),
  UPSTREAM_BASE_URL: z.string().url().default("https://dev.to/api"),
  DEV_TO_API_KEY: z.string().optional(),
  UPSTREAM_PER_PAGE: intIn(1, 1000, 100),
  UPSTREAM_TIMEOUT_MS: intIn(100, 120_000, 10_000),
  MAX_PAGES: intIn(1, 100, 10),
  MAX_POSTS: intIn(1, 1000, 27),
  DAY_OFFSET_DAYS: intIn(0, 30, 1),
  LISTEN_ADDR: z.string().min(1).default("127.0.0.1"),
  PORT: intIn(0, 65_535, 3000),
  REFRESH_INTERVAL: z
    .string()
    .default("0 0 * * *")
    .refine((expr) => cron.validate(expr), "not a valid cron expression"),
  RETRY_BASE_MS: intIn(10, 86_400_000, 60_000),
  RETRY_MAX_MS: intIn(10, 86_400_000, 3_600_000),
});

const ClientEnvSchema = z.object({
  LOG_LEVEL: z.string().default("info"),
  SERVER_URL: z.string().url().default("http://127.0.0.1:3000"),
  CLIENT_TIMEOUT_MS: intIn(100, 120_000, 5000),
  DEVNEWS_LOG_FILE: z.string().optional(),
});

export type ServerConfig = {
  nodeEnv: string;
  logLevel: string;
  upstream: {
    baseUrl: string;
    apiKey: string | null;
    perPage: number;
    timeoutMs: number;
    maxPages: number;
  };
  maxPosts: number;
  dayOffsetDays: number;
  listen: { host: string; port: number };
  refresh: { cron: string; retryBaseMs: number; retryMaxMs: number };
};

export type ClientConfig = {
  logLevel: string;
  serverUrl: string;
  timeoutMs: number;
  logFile: string | null;
};

/** Thrown at startup; the entry points turn it into a non-zero exit. */
export class ConfigError extends Error {
  constructor(issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "env"}: ${i.message}`);
}

// Empty strings in .env mean "unset".
function clean(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) {
    if (v !== undefined && v.trim() !== "") out[k] = v.trim();
  }
  return out;
}

export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env
): ServerConfig {
  const parsed = ServerEnvSchema.safeParse(clean(env));
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    upstream: {
      baseUrl: e.UPSTREAM_BASE_URL.replace(/\/+$/, ""),
      apiKey: e.DEV_TO_API_KEY ?? null,
      perPage: e.UPSTREAM_PER_PAGE,
      timeoutMs: e.UPSTREAM_TIMEOUT_MS,
      maxPages: e.MAX_PAGES,
    },
    maxPosts: e.MAX_POSTS,
    dayOffsetDays: e.DAY_OFFSET_DAYS,
    listen: { host: e.LISTEN_ADDR, port: e.PORT },
    refresh: {
      cron: e.REFRESH_INTERVAL,
      retryBaseMs: e.RETRY_BASE_MS,
      retryMaxMs: Math.max(e.RETRY_MAX_MS, e.RETRY_BASE_MS),
    },
  };
}

export function loadClientConfig(
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  const parsed = ClientEnvSchema.safeParse(clean(env));
  if (!parsed.success) throw new ConfigError(formatIssues(parsed.error));
  const e = parsed.data;
  return {
    logLevel: e.LOG_LEVEL,
    serverUrl: e.SERVER_URL.replace(/\/+$/, ""),
    timeoutMs: e.CLIENT_TIMEOUT_MS,
    logFile: e.DEVNEWS_LOG_FILE ?? null,
  };
}
