import { TemplateError } from "../errors.js";
import { createMessage, type Message, type MessageType } from "../types/message.js";
import { createPrompt, type Prompt } from "../types/prompt.js";
import {
  formatValue,
  parseTemplate,
  variableNames,
  type TemplateSegment,
} from "./placeholders.js";

export type TemplateVariables = Readonly<Record<string, unknown>>;

export type PromptTemplateOptions = {
  messageType?: MessageType;
  variables?: TemplateVariables;
};

/**
 * Text with `{name}` placeholders, rendered into a string, a Message or a Prompt.
 *
 * Instances are immutable: rendering never changes the template, so one
 * instance can be shared and rendered with different variables.
 */
export class PromptTemplate {
  readonly template: string;
  readonly messageType: MessageType;
  readonly inputVariables: readonly string[];
  private readonly segments: readonly TemplateSegment[];
  private readonly bound: TemplateVariables;

  constructor(template: string, options: PromptTemplateOptions = {}) {
    this.template = template;
    this.messageType = options.messageType ?? "user";
    this.segments = parseTemplate(template);
    this.inputVariables = Object.freeze(variableNames(this.segments));
    this.bound = Object.freeze({ ...options.variables });
  }

  /**
   * Without arguments the template must not need any variables (bound ones
   * excepted). With a mapping, every placeholder must be supplied; extra
   * entries are ignored and substituted values are never re-templated.
   */
  render(variables?: TemplateVariables): string {
    const values: Record<string, unknown> = { ...this.bound, ...variables };
    const missing = this.inputVariables.filter(
      (name) => !Object.hasOwn(values, name) || values[name] === undefined,
    );

    if (missing.length > 0) {
      throw variables === undefined
        ? new TemplateError(
            `Template has unresolved placeholders: ${missing.join(", ")}`,
            missing,
          )
        : new TemplateError(`Missing template variables: ${missing.join(", ")}`, missing);
    }

    return this.segments
      .map((segment) =>
        segment.kind === "text" ? segment.value : formatValue(values[segment.name]),
      )
      .join("");
  }

  createMessage(variables?: TemplateVariables): Message {
    return createMessage(this.render(variables), this.messageType);
  }

  create(variables?: TemplateVariables): Prompt {
    return createPrompt(this.createMessage(variables));
  }

  /** New template with `variables` bound as defaults; call-time values win. */
  withVariables(variables: TemplateVariables): PromptTemplate {
    return new PromptTemplate(this.template, {
      messageType: this.messageType,
      variables: { ...this.bound, ...variables },
    });
  }
}

export class SystemPromptTemplate extends PromptTemplate {
  constructor(template: string, options: Omit<PromptTemplateOptions, "messageType"> = {}) {
    super(template, { ...options, messageType: "system" });
  }
}
