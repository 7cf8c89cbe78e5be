import { z } from "zod";
import {
  createAiResponse,
  createGeneration,
  DEFAULT_MODELS,
  type AiResponse,
  type Prompt,
} from "@aibridge/shared";
import type { AiClient, EmbeddingClient, SamplingOptions } from "./base.js";
import { postJson } from "./http.js";
import { InvalidPromptError } from "../../lib/errors.js";
import { log } from "../../middleware/logger.js";

const VERTEX_API = "https://generativelanguage.googleapis.com/v1beta3";

export type VertexAiConnection = {
  apiKey: string;
  baseUrl?: string;
};

export type VertexAiChatOptions = VertexAiConnection &
  SamplingOptions & {
    model?: string;
  };

// ── Wire types (generateMessage) ───────────────────

export type VertexMessage = { author: string; content: string };

export type GenerateMessageRequest = {
  prompt: { context: string; messages: VertexMessage[] };
  temperature?: number;
  candidateCount?: number;
  topP?: number;
  topK?: number;
};

const generateMessageResponseSchema = z.object({
  candidates: z
    .array(z.object({ author: z.string().optional(), content: z.string() }))
    .default([]),
  filters: z.array(z.record(z.unknown())).optional(),
});

const embedTextResponseSchema = z.object({
  embedding: z.object({ value: z.array(z.number()) }),
});

const batchEmbedTextResponseSchema = z.object({
  embeddings: z.array(z.object({ value: z.array(z.number()) })),
});

/**
 * System messages become the shared context; user and assistant messages
 * are the turn sequence. Function messages have no place in this API and
 * are dropped.
 */
export function buildGenerateMessageRequest(
  prompt: Prompt,
  sampling: SamplingOptions = {},
): GenerateMessageRequest {
  const context = prompt.messages
    .filter((m) => m.messageType === "system")
    .map((m) => m.content)
    .join("\n");

  const messages = prompt.messages
    .filter((m) => m.messageType === "user" || m.messageType === "assistant")
    .map((m) => ({ author: m.messageType, content: m.content }));

  if (messages.length === 0) {
    throw new InvalidPromptError("No user or assistant messages found in the prompt");
  }

  const request: GenerateMessageRequest = { prompt: { context, messages } };
  if (sampling.temperature !== undefined) request.temperature = sampling.temperature;
  if (sampling.candidateCount !== undefined) request.candidateCount = sampling.candidateCount;
  if (sampling.topP !== undefined) request.topP = sampling.topP;
  if (sampling.topK !== undefined) request.topK = sampling.topK;
  return request;
}

function modelUrl(baseUrl: string, model: string, method: string, apiKey: string): string {
  return `${baseUrl}/models/${model}:${method}?key=${encodeURIComponent(apiKey)}`;
}

export class VertexAiChatClient implements AiClient {
  readonly name: string;
  private readonly options: Readonly<VertexAiChatOptions>;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(options: VertexAiChatOptions) {
    this.options = Object.freeze({ ...options });
    this.baseUrl = options.baseUrl ?? VERTEX_API;
    this.model = options.model ?? DEFAULT_MODELS.vertexChat;
    this.name = `vertex/${this.model}`;
  }

  async generate(prompt: Prompt): Promise<AiResponse> {
    const request = buildGenerateMessageRequest(prompt, this.options);

    const response = await postJson(
      {
        provider: "vertex",
        url: modelUrl(this.baseUrl, this.model, "generateMessage", this.options.apiKey),
        body: request,
      },
      generateMessageResponseSchema,
    );

    const generations = response.candidates.map((candidate) => {
      const properties: Record<string, unknown> = {};
      if (candidate.author !== undefined) properties.author = candidate.author;
      if (response.filters) properties.filters = response.filters;
      return createGeneration(candidate.content, properties);
    });

    log.debug(
      { provider: "vertex", model: this.model, generations: generations.length },
      "Vertex AI message generated",
    );
    return createAiResponse(generations);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(
        `${this.baseUrl}/models/${this.model}?key=${encodeURIComponent(this.options.apiKey)}`,
      );
      return res.ok;
    } catch {
      return false;
    }
  }
}

export class VertexAiEmbeddingClient implements EmbeddingClient {
  readonly name: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly model: string;

  constructor(options: VertexAiConnection & { model?: string }) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? VERTEX_API;
    this.model = options.model ?? DEFAULT_MODELS.vertexEmbedding;
    this.name = `vertex/${this.model}`;
  }

  async embed(text: string): Promise<number[]> {
    const response = await postJson(
      {
        provider: "vertex",
        url: modelUrl(this.baseUrl, this.model, "embedText", this.apiKey),
        body: { text },
      },
      embedTextResponseSchema,
    );
    return response.embedding.value;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const response = await postJson(
      {
        provider: "vertex",
        url: modelUrl(this.baseUrl, this.model, "batchEmbedText", this.apiKey),
        body: { texts },
      },
      batchEmbedTextResponseSchema,
    );
    return response.embeddings.map((e) => e.value);
  }
}
