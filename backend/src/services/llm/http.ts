import type { z } from "zod";
import { ProviderError } from "../../lib/errors.js";

type JsonRequest = {
  provider: string;
  url: string;
  body: unknown;
  headers?: Record<string, string>;
};

/**
 * One JSON POST, validated against `schema`. Every failure (network, status,
 * body) surfaces as a ProviderError; nothing is retried.
 */
export async function postJson<T>(
  request: JsonRequest,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Promise<T> {
  let response: Response;
  try {
    response = await fetch(request.url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...request.headers },
      body: JSON.stringify(request.body),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : "Unknown error";
    throw new ProviderError(request.provider, `request failed: ${message}`);
  }

  if (!response.ok) {
    const errorBody = await response.text().catch(() => "");
    throw new ProviderError(
      request.provider,
      `API error: ${response.status} ${errorBody}`.trim(),
      response.status,
    );
  }

  let json: unknown;
  try {
    json = await response.json();
  } catch {
    throw new ProviderError(request.provider, "response body is not JSON", response.status);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(
      request.provider,
      `unexpected response body: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      response.status,
    );
  }
  return parsed.data;
}
