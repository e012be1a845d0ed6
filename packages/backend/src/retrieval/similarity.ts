import type { ChunkSearchResult } from "@docent/shared";

export function dot(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += (a[i] ?? 0) * (b[i] ?? 0);
  }
  return sum;
}

export function norm(a: number[]): number {
  return Math.sqrt(dot(a, a));
}

/**
 * 1 - cosine distance. Zero vectors have no direction and score 0 against
 * everything.
 */
export function cosineSimilarity(a: number[], b: number[]): number {
  const denominator = norm(a) * norm(b);
  if (denominator === 0) {
    return 0;
  }
  const score = dot(a, b) / denominator;
  return Math.max(-1, Math.min(1, score));
}

export function compareSearchResults(a: ChunkSearchResult, b: ChunkSearchResult): number {
  if (a.score !== b.score) {
    return b.score - a.score;
  }
  if (a.chunk.chunkIndex !== b.chunk.chunkIndex) {
    return a.chunk.chunkIndex - b.chunk.chunkIndex;
  }
  if (a.chunk.sourceUrl === b.chunk.sourceUrl) {
    return 0;
  }
  return a.chunk.sourceUrl < b.chunk.sourceUrl ? -1 : 1;
}

export function rankTopK(candidates: ChunkSearchResult[], k: number): ChunkSearchResult[] {
  return [...candidates].sort(compareSearchResults).slice(0, k);
}
