import { z } from "zod";
import { LIMITS } from "../constants/limits.js";
import { CHAT_PROVIDERS } from "../constants/providers.js";
import { messageTypeSchema } from "./prompt.js";

export const templateVariablesSchema = z.record(z.unknown());

export const renderTemplateInputSchema = z.object({
  template: z.string().max(LIMITS.TEMPLATE_MAX_LENGTH),
  variables: templateVariablesSchema.optional(),
  messageType: messageTypeSchema.default("user"),
});

export type RenderTemplateInput = z.infer<typeof renderTemplateInputSchema>;

// Named templates come from the template directory; `create` sends the result to a chat client
export const renderNamedTemplateInputSchema = z.object({
  variables: templateVariablesSchema.optional(),
  messageType: messageTypeSchema.optional(),
  create: z.boolean().default(false),
  provider: z.enum(CHAT_PROVIDERS).optional(),
});

export type RenderNamedTemplateInput = z.infer<typeof renderNamedTemplateInputSchema>;

export const templateNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9_-]+$/, "Template names may only contain letters, numbers, hyphens, underscores");
