import { z } from "zod";
import { LIMITS } from "../constants/limits.js";
import { CHAT_PROVIDERS } from "../constants/providers.js";
import { createMessage, MESSAGE_TYPES, parseMessageType } from "../types/message.js";
import { createPrompt, type Prompt } from "../types/prompt.js";

export const messageTypeSchema = z.enum(MESSAGE_TYPES);

// ── Message ─────────────────────────────────────────
// Roles are checked by parseMessageType in promptFromInput, not here
export const messageSchema = z.object({
  messageType: z.string().min(1),
  content: z.string().max(LIMITS.MESSAGE_MAX_LENGTH),
  properties: z.record(z.unknown()).default({}),
});

export type MessageInput = z.infer<typeof messageSchema>;

// ── Prompt: a bare string or an ordered message list ─
export const promptInputSchema = z.union([
  z.string().min(1).max(LIMITS.MESSAGE_MAX_LENGTH),
  z.array(messageSchema).min(1).max(LIMITS.MESSAGES_PER_PROMPT),
]);

export type PromptInputBody = z.infer<typeof promptInputSchema>;

export const generateInputSchema = z.object({
  provider: z.enum(CHAT_PROVIDERS).optional(),
  prompt: promptInputSchema,
});

export type GenerateInput = z.infer<typeof generateInputSchema>;

export function promptFromInput(input: PromptInputBody): Prompt {
  if (typeof input === "string") return createPrompt(input);
  return createPrompt(
    input.map((m) => createMessage(m.content, parseMessageType(m.messageType), m.properties)),
  );
}
