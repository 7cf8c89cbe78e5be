export type GenerationProperties = Readonly<Record<string, unknown>>;

/** One candidate output; `properties` keeps backend metadata such as token counts. */
export type Generation = Readonly<{
  content: string;
  properties: GenerationProperties;
}>;

export type AiResponse = Readonly<{
  generations: readonly Generation[];
}>;

export function createGeneration(
  content: string,
  properties: Record<string, unknown> = {},
): Generation {
  return Object.freeze({ content, properties: Object.freeze({ ...properties }) });
}

export function createAiResponse(generations: Generation[]): AiResponse {
  return Object.freeze({ generations: Object.freeze([...generations]) });
}

export function firstGeneration(response: AiResponse): Generation | undefined {
  return response.generations[0];
}
