import pino, { type Logger } from "pino";

// ── Structured Logger (pino) ─────────────────────────────
// JSON output in production and tests. Pretty output for local dev,
// or anywhere LOG_PRETTY=true.

const env = process.env.NODE_ENV;
const isPretty =
  process.env.LOG_PRETTY === "true" ||
  (process.env.LOG_PRETTY !== "false" && env !== "production" && env !== "test");

export const log = pino({
  level: process.env.LOG_LEVEL || "info",
  base: { service: "kb-concierge" },
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname,service",
          },
        },
      }
    : {}),
});

/** Child logger tagged with the module that owns the log line. */
export function moduleLogger(module: string): Logger {
  return log.child({ module });
}
