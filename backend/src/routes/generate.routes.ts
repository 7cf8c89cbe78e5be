import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { generateInputSchema, promptFromInput } from "@aibridge/shared";
import { getChatClient } from "../services/llm/factory.js";
import { log } from "../middleware/logger.js";
import type { AppEnv } from "../app.js";

const generate = new Hono<AppEnv>();

// ── Prompt → AiResponse ──────────────────────────
generate.post("/generate", zValidator("json", generateInputSchema), async (c) => {
  const requestId = c.get("requestId");
  const input = c.req.valid("json");

  const prompt = promptFromInput(input.prompt);
  const client = getChatClient(input.provider);
  const response = await client.generate(prompt);

  log.debug(
    { requestId, client: client.name, messages: prompt.messages.length },
    "Prompt generated",
  );
  return c.json({ data: response });
});

export { generate };
