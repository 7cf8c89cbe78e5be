import {
  GoogleGenAI,
  type Content,
  type EmbedContentResponse,
  type GenerateContentConfig,
  type GenerateContentResponse,
} from "@google/genai";
import {
  createAiResponse,
  createGeneration,
  DEFAULT_MODELS,
  type AiResponse,
  type Prompt,
} from "@aibridge/shared";
import type { AiClient, EmbeddingClient, SamplingOptions } from "./base.js";
import { InvalidPromptError, ProviderError } from "../../lib/errors.js";
import { log } from "../../middleware/logger.js";

export type GeminiChatOptions = SamplingOptions & {
  apiKey: string;
  model?: string;
};

export type GeminiRequest = {
  contents: Content[];
  config: GenerateContentConfig;
};

export function buildGeminiRequest(prompt: Prompt, sampling: SamplingOptions = {}): GeminiRequest {
  const systemInstruction = prompt.messages
    .filter((m) => m.messageType === "system")
    .map((m) => m.content)
    .join("\n");

  const contents = prompt.messages.flatMap((m): Content[] => {
    if (m.messageType === "user") return [{ role: "user", parts: [{ text: m.content }] }];
    if (m.messageType === "assistant") return [{ role: "model", parts: [{ text: m.content }] }];
    return [];
  });

  if (contents.length === 0) {
    throw new InvalidPromptError("No user or assistant messages found in the prompt");
  }

  const config: GenerateContentConfig = {};
  if (systemInstruction) config.systemInstruction = systemInstruction;
  if (sampling.temperature !== undefined) config.temperature = sampling.temperature;
  if (sampling.topP !== undefined) config.topP = sampling.topP;
  if (sampling.topK !== undefined) config.topK = sampling.topK;
  if (sampling.candidateCount !== undefined) config.candidateCount = sampling.candidateCount;

  return { contents, config };
}

function providerError(err: unknown): ProviderError {
  const message = err instanceof Error ? err.message : "Unknown error";
  const status = message.includes("429") || message.includes("RESOURCE_EXHAUSTED") ? 429 : undefined;
  return new ProviderError("gemini", message, status);
}

export class GeminiChatClient implements AiClient {
  readonly name: string;
  private client: GoogleGenAI;
  private readonly model: string;
  private readonly sampling: Readonly<SamplingOptions>;

  constructor(options: GeminiChatOptions) {
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.model = options.model ?? DEFAULT_MODELS.geminiChat;
    this.sampling = Object.freeze({
      temperature: options.temperature,
      topP: options.topP,
      topK: options.topK,
      candidateCount: options.candidateCount,
    });
    this.name = `gemini/${this.model}`;
  }

  async generate(prompt: Prompt): Promise<AiResponse> {
    const { contents, config } = buildGeminiRequest(prompt, this.sampling);

    let response: GenerateContentResponse;
    try {
      response = await this.client.models.generateContent({ model: this.model, contents, config });
    } catch (err) {
      throw providerError(err);
    }

    const usage: Record<string, number> = {};
    if (response.usageMetadata?.promptTokenCount !== undefined) {
      usage.promptTokenCount = response.usageMetadata.promptTokenCount;
    }
    if (response.usageMetadata?.candidatesTokenCount !== undefined) {
      usage.candidatesTokenCount = response.usageMetadata.candidatesTokenCount;
    }
    if (response.usageMetadata?.totalTokenCount !== undefined) {
      usage.totalTokenCount = response.usageMetadata.totalTokenCount;
    }

    const generations = (response.candidates ?? []).map((candidate) => {
      const text = (candidate.content?.parts ?? [])
        .map((part) => part.text ?? "")
        .join("");
      const properties: Record<string, unknown> = { ...usage };
      if (candidate.finishReason !== undefined) properties.finishReason = candidate.finishReason;
      if (candidate.index !== undefined) properties.index = candidate.index;
      return createGeneration(text, properties);
    });

    log.debug(
      { provider: "gemini", model: this.model, generations: generations.length },
      "Gemini content generated",
    );
    return createAiResponse(generations);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.get({ model: this.model });
      return true;
    } catch {
      return false;
    }
  }
}

export class GeminiEmbeddingClient implements EmbeddingClient {
  readonly name: string;
  private client: GoogleGenAI;
  private model: string;

  constructor(apiKey: string, model: string = DEFAULT_MODELS.geminiEmbedding) {
    this.client = new GoogleGenAI({ apiKey });
    this.model = model;
    this.name = `gemini/${model}`;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    let result: EmbedContentResponse;
    try {
      result = await this.client.models.embedContent({
        model: this.model,
        contents: texts,
      });
    } catch (err) {
      throw providerError(err);
    }

    const embeddings = result.embeddings ?? [];
    if (embeddings.length !== texts.length) {
      throw new ProviderError(
        "gemini",
        `Expected ${texts.length} embeddings, got ${embeddings.length}`,
      );
    }
    return embeddings.map((embedding, i) => {
      if (!embedding.values) {
        throw new ProviderError("gemini", `Embedding ${i} has no values`);
      }
      return embedding.values;
    });
  }
}
