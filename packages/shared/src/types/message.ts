import { UnknownMessageTypeError } from "../errors.js";

export const MESSAGE_TYPES = ["user", "assistant", "system", "function"] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

export type MessageProperties = Readonly<Record<string, unknown>>;

/**
 * A single role-tagged unit of text within a prompt.
 * `properties` holds provider-specific metadata (function name, author, ...).
 */
export type Message = Readonly<{
  content: string;
  properties: MessageProperties;
  messageType: MessageType;
}>;

/** Strict parse of a role string — never falls back to a default role. */
export function parseMessageType(value: string): MessageType {
  const messageType = MESSAGE_TYPES.find((t) => t === value);
  if (!messageType) throw new UnknownMessageTypeError(value);
  return messageType;
}

export function createMessage(
  content: string,
  messageType: MessageType,
  properties: Record<string, unknown> = {},
): Message {
  return Object.freeze({
    content,
    properties: Object.freeze({ ...properties }),
    messageType,
  });
}

export function userMessage(content: string, properties?: Record<string, unknown>): Message {
  return createMessage(content, "user", properties);
}

export function assistantMessage(content: string, properties?: Record<string, unknown>): Message {
  return createMessage(content, "assistant", properties);
}

export function systemMessage(content: string, properties?: Record<string, unknown>): Message {
  return createMessage(content, "system", properties);
}

// Function results carry the function name so backends that support them can map it
export function functionMessage(name: string, content: string): Message {
  return createMessage(content, "function", { name });
}
