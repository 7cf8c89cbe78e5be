import { userMessage, type Message } from "./message.js";

/** Ordered conversation handed to a client. Order is conversation order. */
export type Prompt = Readonly<{
  messages: readonly Message[];
}>;

export type PromptInput = string | Message | readonly Message[];

export function createPrompt(input: PromptInput): Prompt {
  let messages: Message[];
  if (typeof input === "string") {
    messages = [userMessage(input)];
  } else if ("messageType" in input) {
    messages = [input];
  } else {
    messages = [...input];
  }
  return Object.freeze({ messages: Object.freeze(messages) });
}

/** All message contents in order, for backends that take a single text input. */
export function promptContents(prompt: Prompt): string {
  return prompt.messages.map((m) => m.content).join("");
}
