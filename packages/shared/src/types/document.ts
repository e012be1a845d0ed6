import type { MetadataMap } from "./metadata.js";

export interface ChunkDraft {
  sourceUrl: string;
  chunkIndex: number;
  title: string;
  summary: string;
  content: string;
  metadata: MetadataMap;
}

export interface DocumentChunk extends ChunkDraft {
  embedding: number[];
}

export interface SourceSummary {
  sourceUrl: string;
  title: string;
  chunkCount: number;
}

export interface ChunkMetadataDescription {
  category: string;
  features: string[];
  fileFormats: string[];
  versionInfo: string | null;
}

export type IngestionPhase =
  | "chunking"
  | "enriching"
  | "embedding"
  | "saving"
  | "completed"
  | "error";
