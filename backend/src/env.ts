import { z } from "zod";
import "dotenv/config";

// dotenv reads `KEY=` as "", which means "not set" for optional keys
function optional<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === "" ? undefined : value), schema.optional());
}

export const envSchema = z.object({
  // App
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().default(8000),
  LOG_LEVEL: optional(z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])),

  // Client selection
  AI_CHAT_PROVIDER: z.enum(["vertex", "huggingface", "gemini"]).default("vertex"),
  AI_EMBEDDING_PROVIDER: z.enum(["vertex", "gemini"]).default("vertex"),

  // Vertex AI (generative language API) — chat + embeddings
  VERTEX_AI_BASE_URL: z.string().url().default("https://generativelanguage.googleapis.com/v1beta3"),
  VERTEX_AI_API_KEY: optional(z.string()),
  VERTEX_AI_CHAT_MODEL: z.string().default("chat-bison-001"),
  VERTEX_AI_EMBEDDING_MODEL: z.string().default("embedding-gecko-001"),
  VERTEX_AI_CHAT_TEMPERATURE: z.coerce.number().min(0).max(1).default(0.7),
  VERTEX_AI_CHAT_TOP_P: optional(z.coerce.number().min(0).max(1)),
  VERTEX_AI_CHAT_TOP_K: optional(z.coerce.number().int().min(1)),
  VERTEX_AI_CHAT_CANDIDATE_COUNT: z.coerce.number().int().min(1).max(8).default(1),

  // Hugging Face inference endpoint
  HUGGINGFACE_URL: optional(z.string().url()),
  HUGGINGFACE_API_KEY: optional(z.string()),
  HUGGINGFACE_MAX_NEW_TOKENS: z.coerce.number().int().min(1).default(1000),

  // Gemini
  GEMINI_API_KEY: optional(z.string()),
  GEMINI_MODEL: z.string().default("gemini-2.5-flash"),
  GEMINI_EMBEDDING_MODEL: z.string().default("text-embedding-004"),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),

  // Prompt templates loaded by name
  TEMPLATE_DIR: z.string().default("./templates"),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
  const result = envSchema.safeParse(process.env);
  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(JSON.stringify(result.error.flatten().fieldErrors, null, 2));
    process.exit(1);
  }
  return result.data;
}

export const env = loadEnv();
