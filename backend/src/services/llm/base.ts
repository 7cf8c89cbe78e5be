import type { AiResponse, Prompt } from "@aibridge/shared";

/** Sampling knobs, passed to the backend unmodified. */
export type SamplingOptions = {
  temperature?: number;
  topP?: number;
  topK?: number;
  candidateCount?: number;
};

export interface AiClient {
  /** Provider/model label for logs and health output */
  readonly name: string;

  generate(prompt: Prompt): Promise<AiResponse>;

  healthCheck(): Promise<boolean>;
}

export interface EmbeddingClient {
  readonly name: string;

  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}
