import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import {
  PromptTemplate,
  renderNamedTemplateInputSchema,
  renderTemplateInputSchema,
} from "@aibridge/shared";
import { loadTemplate } from "../services/template.service.js";
import { getChatClient } from "../services/llm/factory.js";
import type { AppEnv } from "../app.js";

const templates = new Hono<AppEnv>();

// ── Inline template ──────────────────────────────
templates.post("/templates/render", zValidator("json", renderTemplateInputSchema), (c) => {
  const input = c.req.valid("json");
  const template = new PromptTemplate(input.template, { messageType: input.messageType });
  const message = template.createMessage(input.variables);

  return c.json({
    data: {
      content: message.content,
      messageType: message.messageType,
      inputVariables: template.inputVariables,
    },
  });
});

// ── Template from the template directory ─────────
templates.post(
  "/templates/:name/render",
  zValidator("json", renderNamedTemplateInputSchema),
  async (c) => {
    const input = c.req.valid("json");
    const template = loadTemplate(c.req.param("name"), { messageType: input.messageType });

    if (input.create) {
      const response = await getChatClient(input.provider).generate(template.create(input.variables));
      return c.json({ data: response });
    }

    const message = template.createMessage(input.variables);
    return c.json({
      data: {
        content: message.content,
        messageType: message.messageType,
        inputVariables: template.inputVariables,
      },
    });
  },
);

export { templates };
