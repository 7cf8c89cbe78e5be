import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { env } from "./env.js";
import { log } from "./middleware/logger.js";
import { resetClients } from "./services/llm/factory.js";
import { clearTemplateCache } from "./services/template.service.js";

const app = createApp();

const server = serve({ fetch: app.fetch, port: env.PORT }, (info) => {
  log.info(
    {
      port: info.port,
      env: env.NODE_ENV,
      chatProvider: env.AI_CHAT_PROVIDER,
      embeddingProvider: env.AI_EMBEDDING_PROVIDER,
    },
    "Server started",
  );
});

// ── Graceful Shutdown ─────────────────────────────

let isShuttingDown = false;

function gracefulShutdown(signal: string) {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info({ signal }, "Graceful shutdown initiated");

  server.close(() => {
    resetClients();
    clearTemplateCache();
    log.info("Shutdown complete");
    process.exit(0);
  });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

// Catch unhandled errors — log and exit
process.on("uncaughtException", (err) => {
  log.fatal({ err: err.message, stack: err.stack }, "Uncaught exception");
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  log.fatal({ reason: String(reason) }, "Unhandled rejection");
  process.exit(1);
});
