import { Hono } from "hono";
import { requestId } from "hono/request-id";
import { errorHandler } from "./middleware/error-handler.js";
import { requestLogger } from "./middleware/logger.js";
import { routes } from "./routes/index.js";

export type AppEnv = {
  Variables: {
    requestId: string;
  };
};

export function createApp() {
  const app = new Hono<AppEnv>();

  // Global middleware (order matters — outermost first)
  app.use("*", requestId());
  app.use("*", requestLogger);

  // Error handling
  app.onError(errorHandler);

  // API routes
  app.route("/api/v1", routes);

  return app;
}
