import type { ErrorHandler } from "hono";
import { ZodError } from "zod";
import { TemplateError, UnknownMessageTypeError } from "@aibridge/shared";
import { AppError, ProviderError } from "../lib/errors.js";
import { log } from "./logger.js";
import type { AppEnv } from "../app.js";

export const errorHandler: ErrorHandler<AppEnv> = (err, c) => {
  const requestId = c.get("requestId");

  // Template authoring/usage errors from the shared package
  if (err instanceof TemplateError) {
    return c.json(
      { error: err.message, code: err.code, detail: [...err.missingVariables], requestId },
      422,
    );
  }

  if (err instanceof UnknownMessageTypeError) {
    return c.json({ error: err.message, code: err.code, requestId }, 422);
  }

  if (err instanceof ProviderError) {
    log.warn(
      { requestId, provider: err.provider, upstreamStatus: err.upstreamStatus, err: err.message },
      "Provider call failed",
    );
  }

  // Known application errors
  if (err instanceof AppError) {
    return c.json(
      { error: err.message, code: err.code, requestId },
      err.statusCode as 400,
    );
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    return c.json(
      {
        error: "Validation failed",
        code: "VALIDATION_ERROR",
        detail: err.flatten().fieldErrors,
        requestId,
      },
      422,
    );
  }

  // Unknown errors — log full detail, return generic message
  log.error({ requestId, err: err.message, stack: err.stack }, "Unhandled error");
  return c.json(
    { error: "Internal server error", code: "INTERNAL_ERROR", requestId },
    500,
  );
};
