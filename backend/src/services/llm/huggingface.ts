import { z } from "zod";
import {
  createAiResponse,
  createGeneration,
  promptContents,
  type AiResponse,
  type Prompt,
} from "@aibridge/shared";
import type { AiClient } from "./base.js";
import { postJson } from "./http.js";
import { InvalidPromptError } from "../../lib/errors.js";
import { log } from "../../middleware/logger.js";

export type HuggingfaceOptions = {
  /** Full URL of the text-generation inference endpoint */
  url: string;
  apiKey: string;
  maxNewTokens?: number;
};

export type TextGenerationRequest = {
  inputs: string;
  parameters: { max_new_tokens: number; details: true };
};

const generatedTextSchema = z.object({
  generated_text: z.string(),
  details: z.record(z.unknown()).nullish(),
});

// Inference endpoints answer with a list; a bare object is accepted too
const textGenerationResponseSchema = z
  .union([z.array(generatedTextSchema), generatedTextSchema])
  .transform((body) => (Array.isArray(body) ? body : [body]));

export function buildTextGenerationRequest(
  prompt: Prompt,
  maxNewTokens: number,
): TextGenerationRequest {
  const inputs = promptContents(prompt);
  if (!inputs) {
    throw new InvalidPromptError("Prompt has no content to send to the inference endpoint");
  }
  return { inputs, parameters: { max_new_tokens: maxNewTokens, details: true } };
}

export class HuggingfaceChatClient implements AiClient {
  readonly name = "huggingface";
  private readonly url: string;
  private readonly apiKey: string;
  private readonly maxNewTokens: number;

  constructor(options: HuggingfaceOptions) {
    this.url = options.url.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.maxNewTokens = options.maxNewTokens ?? 1000;
  }

  async generate(prompt: Prompt): Promise<AiResponse> {
    const results = await postJson(
      {
        provider: "huggingface",
        url: this.url,
        body: buildTextGenerationRequest(prompt, this.maxNewTokens),
        headers: { Authorization: `Bearer ${this.apiKey}` },
      },
      textGenerationResponseSchema,
    );

    const generations = results.map((r) => createGeneration(r.generated_text, r.details ?? {}));

    log.debug(
      { provider: "huggingface", generations: generations.length },
      "Inference endpoint text generated",
    );
    return createAiResponse(generations);
  }

  async healthCheck(): Promise<boolean> {
    try {
      const res = await fetch(`${this.url}/health`, {
        headers: { Authorization: `Bearer ${this.apiKey}` },
      });
      return res.ok;
    } catch {
      return false;
    }
  }
}
