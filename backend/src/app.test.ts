import { beforeEach, describe, it, expect, vi } from "vitest";
import { createAiResponse, createGeneration } from "@aibridge/shared";
import { createApp } from "./app.js";
import { InvalidPromptError, ProviderError } from "./lib/errors.js";

const mocks = vi.hoisted(() => ({
  generate: vi.fn(),
  healthCheck: vi.fn(),
  embedBatch: vi.fn(),
  getChatClient: vi.fn(),
  getEmbeddingClient: vi.fn(),
  listChatProviders: vi.fn(),
}));

vi.mock("./services/llm/factory.js", () => ({
  getChatClient: mocks.getChatClient,
  getEmbeddingClient: mocks.getEmbeddingClient,
  listChatProviders: mocks.listChatProviders,
  resetClients: vi.fn(),
}));

vi.mock("./services/template.service.js", async () => {
  const { PromptTemplate } = await import("@aibridge/shared");
  return {
    loadTemplate: vi.fn(() => new PromptTemplate("Summarize {text}")),
    clearTemplateCache: vi.fn(),
  };
});

const app = createApp();

function post(path: string, body: unknown) {
  return app.request(`/api/v1${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

beforeEach(() => {
  mocks.generate.mockReset();
  mocks.healthCheck.mockReset();
  mocks.embedBatch.mockReset();
  mocks.getChatClient.mockReset().mockReturnValue({
    name: "fake/chat",
    generate: mocks.generate,
    healthCheck: mocks.healthCheck,
  });
  mocks.getEmbeddingClient.mockReset().mockReturnValue({
    name: "fake/embedding",
    embed: vi.fn(),
    embedBatch: mocks.embedBatch,
  });
  mocks.listChatProviders.mockReset().mockReturnValue(["vertex"]);
});

describe("POST /api/v1/generate", () => {
  it("runs the prompt through the default client", async () => {
    mocks.generate.mockResolvedValue(createAiResponse([createGeneration("hello", { tokens: 2 })]));

    const res = await post("/generate", {
      prompt: [
        { messageType: "system", content: "ctx" },
        { messageType: "user", content: "hi" },
      ],
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { generations: [{ content: "hello", properties: { tokens: 2 } }] },
    });
    expect(mocks.getChatClient).toHaveBeenCalledWith(undefined);
    expect(mocks.generate).toHaveBeenCalledWith({
      messages: [
        { content: "ctx", properties: {}, messageType: "system" },
        { content: "hi", properties: {}, messageType: "user" },
      ],
    });
  });

  it("selects the requested provider", async () => {
    mocks.generate.mockResolvedValue(createAiResponse([]));
    await post("/generate", { provider: "huggingface", prompt: "hi" });
    expect(mocks.getChatClient).toHaveBeenCalledWith("huggingface");
  });

  it("rejects an invalid body", async () => {
    const res = await post("/generate", { prompt: [] });
    expect(res.status).toBe(400);
    expect(mocks.generate).not.toHaveBeenCalled();
  });

  it("reports an unknown message type as 422", async () => {
    const res = await post("/generate", { prompt: [{ messageType: "tool", content: "x" }] });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "Unknown message type: tool",
      code: "UNKNOWN_MESSAGE_TYPE",
      requestId: expect.any(String),
    });
    expect(mocks.generate).not.toHaveBeenCalled();
  });

  it("maps an invalid prompt to 400", async () => {
    mocks.generate.mockRejectedValue(new InvalidPromptError());

    const res = await post("/generate", { prompt: [{ messageType: "system", content: "ctx" }] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Prompt has no user or assistant messages",
      code: "INVALID_PROMPT",
      requestId: expect.any(String),
    });
  });

  it("maps provider failures to 502", async () => {
    mocks.generate.mockRejectedValue(new ProviderError("vertex", "API error: 500", 500));

    const res = await post("/generate", { prompt: "hi" });

    expect(res.status).toBe(502);
    expect(await res.json()).toMatchObject({ code: "PROVIDER_ERROR" });
  });
});

describe("POST /api/v1/templates/render", () => {
  it("renders an inline template", async () => {
    const res = await post("/templates/render", {
      template: "Hi {name}",
      variables: { name: "Ada" },
    });

    expect(await res.json()).toEqual({
      data: { content: "Hi Ada", messageType: "user", inputVariables: ["name"] },
    });
  });

  it("reports missing variables as 422", async () => {
    const res = await post("/templates/render", { template: "Hi {name}", variables: {} });

    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      error: "Missing template variables: name",
      code: "TEMPLATE_ERROR",
      detail: ["name"],
      requestId: expect.any(String),
    });
  });

  it("renders stray braces as text", async () => {
    const res = await post("/templates/render", { template: "Hi {" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      data: { content: "Hi {", messageType: "user", inputVariables: [] },
    });
  });
});

describe("POST /api/v1/templates/:name/render", () => {
  it("renders a named template", async () => {
    const res = await post("/templates/summary/render", { variables: { text: "abc" } });
    expect(await res.json()).toEqual({
      data: { content: "Summarize abc", messageType: "user", inputVariables: ["text"] },
    });
  });

  it("sends the rendered prompt to a client when asked to", async () => {
    mocks.generate.mockResolvedValue(createAiResponse([createGeneration("short")]));

    const res = await post("/templates/summary/render", {
      variables: { text: "abc" },
      create: true,
      provider: "gemini",
    });

    expect(await res.json()).toEqual({
      data: { generations: [{ content: "short", properties: {} }] },
    });
    expect(mocks.getChatClient).toHaveBeenCalledWith("gemini");
    expect(mocks.generate).toHaveBeenCalledWith({
      messages: [{ content: "Summarize abc", properties: {}, messageType: "user" }],
    });
  });
});

describe("POST /api/v1/embeddings", () => {
  it("returns one vector per text", async () => {
    mocks.embedBatch.mockResolvedValue([[0.1], [0.2]]);

    const res = await post("/embeddings", { texts: ["a", "b"] });

    expect(await res.json()).toEqual({ data: [[0.1], [0.2]] });
    expect(mocks.embedBatch).toHaveBeenCalledWith(["a", "b"]);
  });
});

describe("GET /api/v1/health", () => {
  it("reports each configured provider", async () => {
    mocks.healthCheck.mockResolvedValue(true);

    const res = await app.request("/api/v1/health");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "ok",
      checks: { vertex: { status: "ok", detail: "fake/chat" } },
    });
  });

  it("is degraded when a provider is down", async () => {
    mocks.healthCheck.mockResolvedValue(false);

    const res = await app.request("/api/v1/health");

    expect(await res.json()).toMatchObject({
      status: "degraded",
      checks: { vertex: { status: "degraded" } },
    });
  });
});
