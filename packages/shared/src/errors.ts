export class TemplateError extends Error {
  readonly code = "TEMPLATE_ERROR";

  constructor(
    message: string,
    public readonly missingVariables: readonly string[] = [],
  ) {
    super(message);
    this.name = "TemplateError";
  }
}

export class UnknownMessageTypeError extends Error {
  readonly code = "UNKNOWN_MESSAGE_TYPE";

  constructor(public readonly value: string) {
    super(`Unknown message type: ${value}`);
    this.name = "UnknownMessageTypeError";
  }
}
