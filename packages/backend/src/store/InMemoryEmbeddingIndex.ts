import type {
  DocumentChunk,
  EmbeddingIndex,
  IndexStats,
  MetadataMap,
  RetrievalResult,
  SourceSummary
} from "@docent/shared";
import { mapContains } from "../metadata/metadataValue.js";
import { cosineSimilarity, rankTopK } from "../retrieval/similarity.js";
import { assertDimension, assertTopK, groupChunksBySource, summarizeSource } from "./indexGuards.js";

export class InMemoryEmbeddingIndex implements EmbeddingIndex {
  private readonly chunksBySource = new Map<string, DocumentChunk[]>();

  constructor(readonly dimension: number) {}

  close(): void {
    this.chunksBySource.clear();
  }

  async upsert(chunks: DocumentChunk[]): Promise<void> {
    const groups = groupChunksBySource(this.dimension, chunks);
    for (const [sourceUrl, group] of groups) {
      this.chunksBySource.set(
        sourceUrl,
        group.map((chunk) => ({ ...chunk, embedding: [...chunk.embedding] }))
      );
    }
  }

  async search(queryVector: number[], k: number, filter: MetadataMap = {}): Promise<RetrievalResult> {
    assertDimension(this.dimension, queryVector);
    assertTopK(k);

    const candidates: RetrievalResult = [];
    for (const chunks of this.chunksBySource.values()) {
      for (const chunk of chunks) {
        if (!mapContains(chunk.metadata, filter)) {
          continue;
        }
        candidates.push({
          chunk,
          score: cosineSimilarity(queryVector, chunk.embedding)
        });
      }
    }

    return rankTopK(candidates, k);
  }

  async listSources(): Promise<SourceSummary[]> {
    return [...this.chunksBySource.entries()]
      .map(([sourceUrl, chunks]) => summarizeSource(sourceUrl, chunks))
      .sort((a, b) => (a.sourceUrl < b.sourceUrl ? -1 : a.sourceUrl > b.sourceUrl ? 1 : 0));
  }

  async getSourceChunks(sourceUrl: string): Promise<DocumentChunk[]> {
    return [...(this.chunksBySource.get(sourceUrl) ?? [])];
  }

  async deleteSource(sourceUrl: string): Promise<boolean> {
    return this.chunksBySource.delete(sourceUrl);
  }

  async stats(): Promise<IndexStats> {
    let chunkCount = 0;
    for (const chunks of this.chunksBySource.values()) {
      chunkCount += chunks.length;
    }
    return {
      dimension: this.dimension,
      chunkCount,
      sourceCount: this.chunksBySource.size
    };
  }
}
