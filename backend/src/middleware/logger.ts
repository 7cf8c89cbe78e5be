import { pino } from "pino";
import { createMiddleware } from "hono/factory";
import type { AppEnv } from "../app.js";
import { env } from "../env.js";

function defaultLevel(): string {
  if (env.NODE_ENV === "test") return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

export const log = pino({
  level: env.LOG_LEVEL ?? defaultLevel(),
  transport: env.NODE_ENV === "development" ? { target: "pino-pretty" } : undefined,
  redact: ["req.headers.authorization", "apiKey", "*.apiKey"],
});

export const requestLogger = createMiddleware<AppEnv>(async (c, next) => {
  const start = Date.now();
  await next();
  const duration = Date.now() - start;

  log.info({
    requestId: c.get("requestId"),
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    duration,
  });
});
