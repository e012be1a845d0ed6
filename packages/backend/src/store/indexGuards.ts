import type { DocumentChunk, SourceSummary } from "@docent/shared";
import { DimensionMismatchError, InvalidArgumentError } from "../errors.js";

export function assertDimension(expected: number, vector: number[]): void {
  if (vector.length !== expected) {
    throw new DimensionMismatchError(expected, vector.length);
  }
}

export function assertTopK(k: number): void {
  if (!Number.isInteger(k) || k <= 0) {
    throw new InvalidArgumentError(`k must be a positive integer, received ${k}`);
  }
}

/**
 * Validates a whole upsert batch before anything is written and groups it
 * by source, each group ordered by chunk index.
 */
export function groupChunksBySource(
  dimension: number,
  chunks: DocumentChunk[]
): Map<string, DocumentChunk[]> {
  const groups = new Map<string, DocumentChunk[]>();
  const seen = new Set<string>();

  for (const chunk of chunks) {
    if (chunk.sourceUrl.trim().length === 0) {
      throw new InvalidArgumentError("Chunk sourceUrl must not be empty");
    }
    if (!Number.isInteger(chunk.chunkIndex) || chunk.chunkIndex < 0) {
      throw new InvalidArgumentError(
        `Chunk index must be a non-negative integer, received ${chunk.chunkIndex}`
      );
    }
    assertDimension(dimension, chunk.embedding);

    const key = `${chunk.chunkIndex}\u0000${chunk.sourceUrl}`;
    if (seen.has(key)) {
      throw new InvalidArgumentError(
        `Duplicate chunk ${chunk.chunkIndex} for source ${chunk.sourceUrl}`
      );
    }
    seen.add(key);

    const group = groups.get(chunk.sourceUrl) ?? [];
    group.push(chunk);
    groups.set(chunk.sourceUrl, group);
  }

  for (const group of groups.values()) {
    group.sort((a, b) => a.chunkIndex - b.chunkIndex);
  }
  return groups;
}

export function summarizeSource(sourceUrl: string, chunks: DocumentChunk[]): SourceSummary {
  const first = chunks[0];
  return {
    sourceUrl,
    title: first ? pageTitle(first.title) : sourceUrl,
    chunkCount: chunks.length
  };
}

/** Chunk titles read "Page - Section"; the page part names the source. */
export function pageTitle(chunkTitle: string): string {
  const [page] = chunkTitle.split(" - ");
  return (page ?? chunkTitle).trim();
}
