export const LIMITS = {
  TEMPLATE_MAX_LENGTH: 32_000,
  MESSAGE_MAX_LENGTH: 32_000,
  MESSAGES_PER_PROMPT: 200,
  EMBED_BATCH_MAX: 100,
} as const;
