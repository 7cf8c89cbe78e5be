import type { Message } from "../types/message.js";
import { createPrompt, type Prompt } from "../types/prompt.js";
import type { PromptTemplate, TemplateVariables } from "./prompt-template.js";

/** Several message templates rendered with one variable mapping into one Prompt. */
export class ChatPromptTemplate {
  readonly templates: readonly PromptTemplate[];
  readonly inputVariables: readonly string[];

  constructor(templates: readonly PromptTemplate[]) {
    this.templates = Object.freeze([...templates]);
    this.inputVariables = Object.freeze([
      ...new Set(templates.flatMap((t) => t.inputVariables)),
    ]);
  }

  render(variables?: TemplateVariables): string {
    return this.templates.map((t) => t.render(variables)).join("\n");
  }

  createMessages(variables?: TemplateVariables): Message[] {
    return this.templates.map((t) => t.createMessage(variables));
  }

  create(variables?: TemplateVariables): Prompt {
    return createPrompt(this.createMessages(variables));
  }
}
