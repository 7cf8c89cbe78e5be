import { beforeEach, describe, it, expect, vi } from "vitest";
import {
  getChatClient,
  getEmbeddingClient,
  listChatProviders,
  resetClients,
} from "./factory.js";
import { VertexAiChatClient, VertexAiEmbeddingClient } from "./vertex.js";
import { HuggingfaceChatClient } from "./huggingface.js";
import { GeminiChatClient } from "./gemini.js";
import { ConfigError } from "../../lib/errors.js";

const mocks = vi.hoisted(() => ({
  env: {
    NODE_ENV: "test",
    AI_CHAT_PROVIDER: "vertex",
    AI_EMBEDDING_PROVIDER: "vertex",
    VERTEX_AI_BASE_URL: "https://vertex.test/v1beta3",
    VERTEX_AI_API_KEY: "test-key",
    VERTEX_AI_CHAT_MODEL: "chat-bison-001",
    VERTEX_AI_EMBEDDING_MODEL: "embedding-gecko-001",
    VERTEX_AI_CHAT_TEMPERATURE: 0.7,
    VERTEX_AI_CHAT_CANDIDATE_COUNT: 1,
    HUGGINGFACE_URL: undefined as string | undefined,
    HUGGINGFACE_API_KEY: undefined as string | undefined,
    HUGGINGFACE_MAX_NEW_TOKENS: 1000,
    GEMINI_API_KEY: undefined as string | undefined,
    GEMINI_MODEL: "gemini-2.5-flash",
    GEMINI_EMBEDDING_MODEL: "text-embedding-004",
    GEMINI_TEMPERATURE: 0.7,
  },
}));

vi.mock("../../env.js", () => ({ env: mocks.env }));

vi.mock("@google/genai", () => ({
  GoogleGenAI: class {
    models = {};
  },
}));

beforeEach(() => {
  resetClients();
  mocks.env.HUGGINGFACE_URL = undefined;
  mocks.env.HUGGINGFACE_API_KEY = undefined;
  mocks.env.GEMINI_API_KEY = undefined;
});

describe("getChatClient", () => {
  it("builds the configured default provider once", () => {
    const client = getChatClient();
    expect(client).toBeInstanceOf(VertexAiChatClient);
    expect(client.name).toBe("vertex/chat-bison-001");
    expect(getChatClient()).toBe(client);
  });

  it("requires the provider's settings", () => {
    expect(() => getChatClient("huggingface")).toThrow(ConfigError);
    expect(() => getChatClient("huggingface")).toThrow(
      "HUGGINGFACE_URL required when using the huggingface provider",
    );
  });

  it("builds other providers on request", () => {
    mocks.env.HUGGINGFACE_URL = "https://endpoint.test";
    mocks.env.HUGGINGFACE_API_KEY = "test-key";
    mocks.env.GEMINI_API_KEY = "test-key";

    expect(getChatClient("huggingface")).toBeInstanceOf(HuggingfaceChatClient);
    expect(getChatClient("gemini")).toBeInstanceOf(GeminiChatClient);
  });

  it("creates fresh clients after a reset", () => {
    const first = getChatClient();
    resetClients();
    expect(getChatClient()).not.toBe(first);
  });
});

describe("listChatProviders", () => {
  it("names only configured providers", () => {
    expect(listChatProviders()).toEqual(["vertex"]);

    mocks.env.GEMINI_API_KEY = "test-key";
    expect(listChatProviders()).toEqual(["vertex", "gemini"]);
  });
});

describe("getEmbeddingClient", () => {
  it("defaults to the vertex embedding model", () => {
    const client = getEmbeddingClient();
    expect(client).toBeInstanceOf(VertexAiEmbeddingClient);
    expect(client.name).toBe("vertex/embedding-gecko-001");
  });

  it("requires a gemini key for gemini embeddings", () => {
    expect(() => getEmbeddingClient("gemini")).toThrow(ConfigError);
  });
});
