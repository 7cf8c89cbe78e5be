import { Hono } from "hono";
import { getChatClient, listChatProviders } from "../services/llm/factory.js";
import { log } from "../middleware/logger.js";
import type { AppEnv } from "../app.js";

const health = new Hono<AppEnv>();

const startTime = Date.now();
const CHECK_TIMEOUT_MS = 5000;

type CheckResult = { status: "ok" | "degraded"; latency?: number; detail?: string };

function withTimeout(check: Promise<boolean>): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), CHECK_TIMEOUT_MS);
  });
  return Promise.race([check, timeout]).finally(() => clearTimeout(timer));
}

// Provider health — reported, never fatal: a down provider should not fail a deploy
health.get("/health", async (c) => {
  const requestId = c.get("requestId");
  const checks: Record<string, CheckResult> = {};

  for (const provider of listChatProviders()) {
    const start = Date.now();
    try {
      const client = getChatClient(provider);
      const healthy = await withTimeout(client.healthCheck());
      checks[provider] = {
        status: healthy ? "ok" : "degraded",
        latency: Date.now() - start,
        detail: healthy ? client.name : "Health check failed or timed out",
      };
    } catch (err) {
      checks[provider] = {
        status: "degraded",
        detail: err instanceof Error ? err.message : "Client not initialized",
      };
    }
  }

  const degraded = Object.values(checks).some((check) => check.status !== "ok");
  const response = {
    status: degraded ? "degraded" : "ok",
    version: process.env.npm_package_version ?? "0.1.0",
    uptime: Math.floor((Date.now() - startTime) / 1000),
    timestamp: new Date().toISOString(),
    checks,
  };

  if (degraded) {
    log.warn({ requestId, health: response }, "Health check returned non-ok status");
  }

  return c.json(response);
});

export { health };
