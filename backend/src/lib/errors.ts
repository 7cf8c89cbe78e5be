export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(resource = "Resource") {
    super(404, "NOT_FOUND", `${resource} not found`);
  }
}

export class ValidationError extends AppError {
  constructor(message = "Validation failed") {
    super(422, "VALIDATION_ERROR", message);
  }
}

// Rejected before any network call is made
export class InvalidPromptError extends AppError {
  constructor(message = "Prompt has no user or assistant messages") {
    super(400, "INVALID_PROMPT", message);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(500, "CONFIG_ERROR", message);
  }
}

/** Upstream failure: non-2xx status, network error or an unexpected body. */
export class ProviderError extends AppError {
  constructor(
    public provider: string,
    message: string,
    public upstreamStatus?: number,
  ) {
    super(502, "PROVIDER_ERROR", `${provider}: ${message}`);
  }
}
