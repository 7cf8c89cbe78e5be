export const CHAT_PROVIDERS = ["vertex", "huggingface", "gemini"] as const;
export type ChatProviderName = (typeof CHAT_PROVIDERS)[number];

export const EMBEDDING_PROVIDERS = ["vertex", "gemini"] as const;
export type EmbeddingProviderName = (typeof EMBEDDING_PROVIDERS)[number];

export const DEFAULT_MODELS = {
  vertexChat: "chat-bison-001",
  vertexEmbedding: "embedding-gecko-001",
  geminiChat: "gemini-2.5-flash",
  geminiEmbedding: "text-embedding-004",
} as const;
