import { describe, expect, it } from "vitest";
import type { ChunkSearchResult } from "@docent/shared";
import { cosineSimilarity, rankTopK } from "../../../src/retrieval/similarity.js";

function result(sourceUrl: string, chunkIndex: number, score: number): ChunkSearchResult {
  return {
    chunk: {
      sourceUrl,
      chunkIndex,
      title: "t",
      summary: "s",
      content: "c",
      metadata: {},
      embedding: [1, 0]
    },
    score
  };
}

describe("cosineSimilarity", () => {
  it("scores direction, not length", () => {
    expect(cosineSimilarity([1, 0], [3, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 2])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
  });

  it("scores zero vectors as 0", () => {
    expect(cosineSimilarity([0, 0], [1, 1])).toBe(0);
  });
});

describe("rankTopK", () => {
  it("orders by score, then chunk index, then source URL", () => {
    const ranked = rankTopK(
      [
        result("https://b.test", 0, 0.5),
        result("https://a.test", 1, 0.9),
        result("https://a.test", 0, 0.5),
        result("https://c.test", 0, 0.7)
      ],
      3
    );

    expect(ranked.map(({ chunk, score }) => [chunk.sourceUrl, chunk.chunkIndex, score])).toEqual([
      ["https://a.test", 1, 0.9],
      ["https://c.test", 0, 0.7],
      ["https://a.test", 0, 0.5]
    ]);
  });
});
