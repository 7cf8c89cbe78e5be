import {
  CHAT_PROVIDERS,
  type ChatProviderName,
  type EmbeddingProviderName,
} from "@aibridge/shared";
import type { AiClient, EmbeddingClient } from "./base.js";
import { VertexAiChatClient, VertexAiEmbeddingClient } from "./vertex.js";
import { HuggingfaceChatClient } from "./huggingface.js";
import { GeminiChatClient, GeminiEmbeddingClient } from "./gemini.js";
import { ConfigError } from "../../lib/errors.js";
import { env } from "../../env.js";
import { log } from "../../middleware/logger.js";

const chatClients = new Map<ChatProviderName, AiClient>();
const embeddingClients = new Map<EmbeddingProviderName, EmbeddingClient>();

function requireSetting(value: string | undefined, key: string, provider: string): string {
  if (!value) {
    throw new ConfigError(`${key} required when using the ${provider} provider`);
  }
  return value;
}

function createChatClient(provider: ChatProviderName): AiClient {
  switch (provider) {
    case "vertex":
      return new VertexAiChatClient({
        baseUrl: env.VERTEX_AI_BASE_URL,
        apiKey: requireSetting(env.VERTEX_AI_API_KEY, "VERTEX_AI_API_KEY", provider),
        model: env.VERTEX_AI_CHAT_MODEL,
        temperature: env.VERTEX_AI_CHAT_TEMPERATURE,
        topP: env.VERTEX_AI_CHAT_TOP_P,
        topK: env.VERTEX_AI_CHAT_TOP_K,
        candidateCount: env.VERTEX_AI_CHAT_CANDIDATE_COUNT,
      });
    case "huggingface":
      return new HuggingfaceChatClient({
        url: requireSetting(env.HUGGINGFACE_URL, "HUGGINGFACE_URL", provider),
        apiKey: requireSetting(env.HUGGINGFACE_API_KEY, "HUGGINGFACE_API_KEY", provider),
        maxNewTokens: env.HUGGINGFACE_MAX_NEW_TOKENS,
      });
    case "gemini":
      return new GeminiChatClient({
        apiKey: requireSetting(env.GEMINI_API_KEY, "GEMINI_API_KEY", provider),
        model: env.GEMINI_MODEL,
        temperature: env.GEMINI_TEMPERATURE,
      });
  }
}

function createEmbeddingClient(provider: EmbeddingProviderName): EmbeddingClient {
  switch (provider) {
    case "vertex":
      return new VertexAiEmbeddingClient({
        baseUrl: env.VERTEX_AI_BASE_URL,
        apiKey: requireSetting(env.VERTEX_AI_API_KEY, "VERTEX_AI_API_KEY", provider),
        model: env.VERTEX_AI_EMBEDDING_MODEL,
      });
    case "gemini":
      return new GeminiEmbeddingClient(
        requireSetting(env.GEMINI_API_KEY, "GEMINI_API_KEY", provider),
        env.GEMINI_EMBEDDING_MODEL,
      );
  }
}

export function getChatClient(provider: ChatProviderName = env.AI_CHAT_PROVIDER): AiClient {
  const cached = chatClients.get(provider);
  if (cached) return cached;

  const client = createChatClient(provider);
  chatClients.set(provider, client);
  log.info({ provider, client: client.name }, "Chat client initialized");
  return client;
}

export function getEmbeddingClient(
  provider: EmbeddingProviderName = env.AI_EMBEDDING_PROVIDER,
): EmbeddingClient {
  const cached = embeddingClients.get(provider);
  if (cached) return cached;

  const client = createEmbeddingClient(provider);
  embeddingClients.set(provider, client);
  log.info({ provider, client: client.name }, "Embedding client initialized");
  return client;
}

/** Chat providers whose required settings are present. */
export function listChatProviders(): ChatProviderName[] {
  return CHAT_PROVIDERS.filter((provider) => {
    switch (provider) {
      case "vertex":
        return Boolean(env.VERTEX_AI_API_KEY);
      case "huggingface":
        return Boolean(env.HUGGINGFACE_URL && env.HUGGINGFACE_API_KEY);
      case "gemini":
        return Boolean(env.GEMINI_API_KEY);
    }
  });
}

// Reset clients — used in graceful shutdown and testing
export function resetClients(): void {
  chatClients.clear();
  embeddingClients.clear();
}
