// Message model
export {
  MESSAGE_TYPES,
  parseMessageType,
  createMessage,
  userMessage,
  assistantMessage,
  systemMessage,
  functionMessage,
} from "./types/message.js";
export type { Message, MessageType, MessageProperties } from "./types/message.js";

export { createPrompt, promptContents } from "./types/prompt.js";
export type { Prompt, PromptInput } from "./types/prompt.js";

export { createGeneration, createAiResponse, firstGeneration } from "./types/response.js";
export type { Generation, GenerationProperties, AiResponse } from "./types/response.js";

// Templates
export { PromptTemplate, SystemPromptTemplate } from "./templates/prompt-template.js";
export type { TemplateVariables, PromptTemplateOptions } from "./templates/prompt-template.js";
export { ChatPromptTemplate } from "./templates/chat-prompt-template.js";

// Errors
export { TemplateError, UnknownMessageTypeError } from "./errors.js";

// Schemas
export {
  messageTypeSchema,
  messageSchema,
  promptInputSchema,
  generateInputSchema,
  promptFromInput,
} from "./schemas/prompt.js";
export type { MessageInput, PromptInputBody, GenerateInput } from "./schemas/prompt.js";

export {
  templateVariablesSchema,
  renderTemplateInputSchema,
  renderNamedTemplateInputSchema,
  templateNameSchema,
} from "./schemas/template.js";
export type { RenderTemplateInput, RenderNamedTemplateInput } from "./schemas/template.js";

export { embedInputSchema } from "./schemas/embedding.js";
export type { EmbedInput } from "./schemas/embedding.js";

// Constants
export { CHAT_PROVIDERS, EMBEDDING_PROVIDERS, DEFAULT_MODELS } from "./constants/providers.js";
export type { ChatProviderName, EmbeddingProviderName } from "./constants/providers.js";
export { LIMITS } from "./constants/limits.js";
