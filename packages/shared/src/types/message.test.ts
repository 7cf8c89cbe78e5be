import { describe, it, expect } from "vitest";
import {
  MESSAGE_TYPES,
  createMessage,
  functionMessage,
  parseMessageType,
  systemMessage,
  userMessage,
  assistantMessage,
} from "./message.js";
import { createPrompt, promptContents } from "./prompt.js";
import { createAiResponse, createGeneration, firstGeneration } from "./response.js";
import { UnknownMessageTypeError } from "../errors.js";

describe("parseMessageType", () => {
  it("accepts every canonical role", () => {
    for (const type of MESSAGE_TYPES) {
      expect(parseMessageType(type)).toBe(type);
    }
  });

  it("rejects unknown roles instead of defaulting", () => {
    expect(() => parseMessageType("tool")).toThrow(UnknownMessageTypeError);
    expect(() => parseMessageType("User")).toThrow("Unknown message type: User");
  });
});

describe("createMessage", () => {
  it("freezes the message and copies its properties", () => {
    const properties = { source: "test" };
    const message = createMessage("hello", "user", properties);
    properties.source = "changed";

    expect(message.properties).toEqual({ source: "test" });
    expect(Object.isFrozen(message)).toBe(true);
    expect(Object.isFrozen(message.properties)).toBe(true);
  });

  it("records the function name on function messages", () => {
    expect(functionMessage("lookup", "42")).toEqual({
      content: "42",
      properties: { name: "lookup" },
      messageType: "function",
    });
  });
});

describe("createPrompt", () => {
  it("wraps a string as a single user message", () => {
    const prompt = createPrompt("hi");
    expect(prompt.messages).toEqual([userMessage("hi")]);
  });

  it("accepts a single message", () => {
    expect(createPrompt(systemMessage("ctx")).messages).toHaveLength(1);
  });

  it("keeps message order and is detached from the caller's array", () => {
    const messages = [systemMessage("ctx"), userMessage("hi"), assistantMessage("hello")];
    const prompt = createPrompt(messages);
    messages.pop();

    expect(prompt.messages.map((m) => m.messageType)).toEqual(["system", "user", "assistant"]);
  });

  it("concatenates contents for single-input backends", () => {
    expect(promptContents(createPrompt([userMessage("a"), userMessage("b")]))).toBe("ab");
  });
});

describe("AiResponse", () => {
  it("returns the first generation", () => {
    const response = createAiResponse([createGeneration("one", { tokens: 3 }), createGeneration("two")]);
    expect(firstGeneration(response)).toEqual({ content: "one", properties: { tokens: 3 } });
    expect(firstGeneration(createAiResponse([]))).toBeUndefined();
  });
});
