import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { embedInputSchema } from "@aibridge/shared";
import { getEmbeddingClient } from "../services/llm/factory.js";
import type { AppEnv } from "../app.js";

const embeddings = new Hono<AppEnv>();

embeddings.post("/embeddings", zValidator("json", embedInputSchema), async (c) => {
  const input = c.req.valid("json");
  const client = getEmbeddingClient(input.provider);
  const vectors = await client.embedBatch(input.texts);
  return c.json({ data: vectors });
});

export { embeddings };
