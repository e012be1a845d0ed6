import { describe, expect, it } from "vitest";
import { IngestionPipeline } from "../../../src/ingestion/IngestionPipeline.js";
import { Retriever } from "../../../src/retrieval/Retriever.js";
import { InMemoryConversationStore } from "../../../src/services/InMemoryConversationStore.js";
import { InMemoryEmbeddingIndex } from "../../../src/store/InMemoryEmbeddingIndex.js";
import { AnswerSynthesizer } from "../../../src/synthesis/AnswerSynthesizer.js";
import { FakeLLMService } from "../../helpers/FakeLLMService.js";

const sourceUrl = "https://docs.test/manual/tilesets";
const paragraph = "A tileset is a collection of tiles used by maps. ".repeat(5).trim();

describe("ingest, retrieve and answer", () => {
  it("answers from a single-section page and stores one turn", async () => {
    const llm = new FakeLLMService({
      completions: [`[DOCUMENTED] A tileset is a collection of tiles (${sourceUrl}).`],
      vectors: { ileset: [1, 0, 0], layer: [0, 1, 0] }
    });
    const index = new InMemoryEmbeddingIndex(3);
    const store = new InMemoryConversationStore();
    const pipeline = new IngestionPipeline(index, llm, null);
    const retriever = new Retriever(llm, index);
    const synthesizer = new AnswerSynthesizer(retriever, llm, store, { retryBaseDelayMs: 1 });

    expect(paragraph.split(" ")).toHaveLength(50);
    const ingested = await pipeline.ingest({ sourceUrl, content: `# Tilesets\n\n${paragraph}` });
    expect(ingested.chunkCount).toBe(1);

    const [stored] = await index.getSourceChunks(sourceUrl);
    expect(stored?.title).toBe("Tilesets");

    const retrieved = await retriever.retrieve("what is a tileset", 5);
    expect(retrieved).toHaveLength(1);
    expect(retrieved[0]?.chunk.sourceUrl).toBe(sourceUrl);
    expect(retrieved[0]?.score).toBe(1);

    const result = await synthesizer.answer({
      query: "what is a tileset",
      userId: "user-1",
      conversationId: "conv-tilesets"
    });

    expect(result.status).toBe("answered");
    expect(result.sources).toEqual([sourceUrl]);
    const history = await store.history("conv-tilesets", 10);
    expect(history).toHaveLength(1);
    expect(history[0]?.turnId).toBe(result.turnId);
  });
});
