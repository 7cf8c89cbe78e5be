import { readFileSync, existsSync } from "node:fs";
import { join, resolve } from "node:path";
import {
  PromptTemplate,
  SystemPromptTemplate,
  templateNameSchema,
  type MessageType,
} from "@aibridge/shared";
import { NotFoundError, ValidationError } from "../lib/errors.js";
import { env } from "../env.js";
import { log } from "../middleware/logger.js";

const TEMPLATE_EXTENSION = ".st";

// Raw template text by absolute path; templates are treated as read-only once loaded
const cache = new Map<string, string>();

export type LoadTemplateOptions = {
  messageType?: MessageType;
  dir?: string;
};

function readTemplateText(name: string, dir: string): string {
  const parsed = templateNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new ValidationError(parsed.error.issues[0]?.message ?? "Invalid template name");
  }

  const path = join(resolve(dir), `${name}${TEMPLATE_EXTENSION}`);
  const cached = cache.get(path);
  if (cached !== undefined) return cached;

  if (!existsSync(path)) throw new NotFoundError(`Template "${name}"`);

  const text = readFileSync(path, "utf8");
  cache.set(path, text);
  log.debug({ template: name, path }, "Template loaded");
  return text;
}

/** Load `<dir>/<name>.st`; the message type picks the template flavour. */
export function loadTemplate(name: string, options: LoadTemplateOptions = {}): PromptTemplate {
  const text = readTemplateText(name, options.dir ?? env.TEMPLATE_DIR);
  const messageType = options.messageType ?? "user";
  return messageType === "system"
    ? new SystemPromptTemplate(text)
    : new PromptTemplate(text, { messageType });
}

export function clearTemplateCache(): void {
  cache.clear();
}
