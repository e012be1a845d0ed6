import { describe, expect, it, vi } from "vitest";
import { DimensionMismatchError, RateLimitedError } from "../../../src/errors.js";
import { LLMRateLimiter } from "../../../src/services/LLMRateLimiter.js";
import { LLMService } from "../../../src/services/LLMService.js";
import type { OpenAICompatibleClient } from "../../../src/services/llmTypes.js";

function createClient(content: string | null, embedding: number[] = [0.1, 0.2, 0.3]) {
  const chatCreate = vi.fn().mockResolvedValue({
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 1000, completion_tokens: 500 }
  });
  const embeddingsCreate = vi.fn().mockResolvedValue({
    data: [{ embedding }],
    usage: { prompt_tokens: 5 }
  });
  const client: OpenAICompatibleClient = {
    chat: { completions: { create: chatCreate } },
    embeddings: { create: embeddingsCreate }
  };
  return { client, chatCreate, embeddingsCreate };
}

const rateLimiter = (): LLMRateLimiter =>
  new LLMRateLimiter({ maxConcurrent: 2, maxRetries: 2, retryDelayMs: 1, requestsPerMinute: 100, timeoutMs: 5000 });

const baseConfig = {
  apiKey: "test-key",
  chatModel: "gpt-4o-mini",
  embeddingModel: "text-embedding-3-small",
  productName: "the Tiled map editor"
};

describe("LLMService", () => {
  it("sends the system prompt ahead of the conversation and records usage", async () => {
    const { client, chatCreate } = createClient("[DOCUMENTED] Answer.");
    const service = new LLMService(baseConfig, { client, rateLimiter: rateLimiter() });

    const reply = await service.complete(
      { system: "system text", messages: [{ role: "user", content: "question" }] },
      { purpose: "answer", conversationId: "conv-1", userId: "user-1" }
    );

    expect(reply).toBe("[DOCUMENTED] Answer.");
    expect(chatCreate).toHaveBeenCalledTimes(1);
    expect(chatCreate.mock.calls[0]?.[0]).toEqual({
      model: "gpt-4o-mini",
      temperature: 0.1,
      max_tokens: 4096,
      messages: [
        { role: "system", content: "system text" },
        { role: "user", content: "question" }
      ],
      user: "user-1"
    });

    const [record] = service.getUsageRecords();
    expect(record).toMatchObject({
      phase: "answer",
      model: "gpt-4o-mini",
      promptTokens: 1000,
      completionTokens: 500,
      conversationId: "conv-1"
    });
    expect(record?.estimatedCost).toBeCloseTo(0.00045, 10);
  });

  it("leaves completion retries to the caller", async () => {
    const { client, chatCreate } = createClient("unused");
    chatCreate.mockRejectedValue(Object.assign(new Error("server error"), { status: 500 }));
    const service = new LLMService(baseConfig, { client, rateLimiter: rateLimiter() });

    await expect(
      service.complete({ system: "s", messages: [] }, { purpose: "answer" })
    ).rejects.toThrow("server error");
    expect(chatCreate).toHaveBeenCalledTimes(1);
  });

  it("maps provider 429 responses to RateLimitedError", async () => {
    const { client, chatCreate } = createClient("unused");
    chatCreate.mockRejectedValue(Object.assign(new Error("slow down"), { status: 429 }));
    const service = new LLMService(baseConfig, { client, rateLimiter: rateLimiter() });

    await expect(
      service.complete({ system: "s", messages: [] }, { purpose: "answer" })
    ).rejects.toBeInstanceOf(RateLimitedError);
  });

  it("embeds text and checks the configured dimension", async () => {
    const { client, embeddingsCreate } = createClient(null, [0.1, 0.2, 0.3]);
    const service = new LLMService(
      { ...baseConfig, embeddingDimensions: 3 },
      { client, rateLimiter: rateLimiter() }
    );

    await expect(service.embed("layers")).resolves.toEqual([0.1, 0.2, 0.3]);
    expect(embeddingsCreate.mock.calls[0]?.[0]).toEqual({
      model: "text-embedding-3-small",
      input: "layers",
      dimensions: 3
    });

    const narrow = new LLMService(
      { ...baseConfig, embeddingDimensions: 4 },
      { client, rateLimiter: rateLimiter() }
    );
    await expect(narrow.embed("layers")).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it("uses a separate embedding client when one is given", async () => {
    const chat = createClient("unused");
    const embeddings = createClient(null, [1, 0]);
    const service = new LLMService(baseConfig, {
      client: chat.client,
      embeddingClient: embeddings.client,
      rateLimiter: rateLimiter()
    });

    await expect(service.embed("x")).resolves.toEqual([1, 0]);
    expect(chat.embeddingsCreate).not.toHaveBeenCalled();
  });

  it("describes a chunk from the model's JSON reply", async () => {
    const { client, chatCreate } = createClient(
      JSON.stringify({
        category: "Reference",
        features: ["layers", "objects"],
        file_formats: ["TMX"],
        version_info: " Since 1.10 "
      })
    );
    const service = new LLMService(baseConfig, { client, rateLimiter: rateLimiter() });

    const description = await service.describeChunk("Layer content.", "https://docs.test/layers");

    expect(description).toEqual({
      category: "Reference",
      features: ["layers", "objects"],
      fileFormats: ["TMX"],
      versionInfo: "Since 1.10"
    });
    const body = chatCreate.mock.calls[0]?.[0];
    expect(body.response_format).toEqual({ type: "json_object" });
    expect(body.messages[1]).toEqual({
      role: "user",
      content: "URL: https://docs.test/layers\n\nContent:\nLayer content."
    });
  });

  it("fills defaults for missing or malformed description fields", async () => {
    const { client } = createClient('Here you go: {"category": "", "features": "layers", "version_info": ""}');
    const service = new LLMService(baseConfig, { client, rateLimiter: rateLimiter() });

    await expect(service.describeChunk("c", "https://docs.test/x")).resolves.toEqual({
      category: "Documentation",
      features: [],
      fileFormats: [],
      versionInfo: null
    });
  });
});
