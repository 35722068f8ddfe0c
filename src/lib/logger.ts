import pino, { type Logger } from "pino";

const nodeEnv = process.env.NODE_ENV || "development";
const isDev = nodeEnv !== "production" && nodeEnv !== "test";

export const logger = pino({
  level: process.env.LOG_LEVEL || "info",
  ...(isDev
    ? {
        transport: {
          target: "pino-pretty",
          options: { translateTime: "SYS:standard" },
        },
      }
    : {}),
});

/**
 * Logger for the terminal client. Anything written to stdout or stderr would
 * tear the screen, so it logs to a file or not at all. Writes are synchronous:
 * the CLI leaves through process.exit() right after the quit is logged.
 */
export function fileLogger(level: string, file: string | null): Logger {
  if (!file) return pino({ level: "silent" });
  return pino({ level }, pino.destination({ dest: file, sync: true, mkdir: true }));
}
