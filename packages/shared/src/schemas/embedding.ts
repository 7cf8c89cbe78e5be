import { z } from "zod";
import { LIMITS } from "../constants/limits.js";
import { EMBEDDING_PROVIDERS } from "../constants/providers.js";

export const embedInputSchema = z.object({
  provider: z.enum(EMBEDDING_PROVIDERS).optional(),
  texts: z.array(z.string().min(1)).min(1).max(LIMITS.EMBED_BATCH_MAX),
});

export type EmbedInput = z.infer<typeof embedInputSchema>;
