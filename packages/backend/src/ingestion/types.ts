import type { IngestionPhase, JsonObject } from "@docent/shared";

export interface IngestionStatusEvent {
  sourceUrl: string;
  phase: IngestionPhase;
  progress: number;
  message?: string;
}

export interface IngestionPipelineOptions {
  maxChars: number;
  embeddingConcurrency: number;
  enrichMetadata: boolean;
  enrichmentConcurrency: number;
  metadataSource: string;
}

export interface IngestionRequest {
  sourceUrl: string;
  content: string;
  metadata?: JsonObject;
}

export interface IngestionResult {
  sourceUrl: string;
  chunkCount: number;
  /** Chunks whose metadata fell back to the heuristic defaults. */
  enrichmentFallbacks: number;
}
