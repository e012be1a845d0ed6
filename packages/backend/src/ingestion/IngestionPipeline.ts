import { EventEmitter } from "node:events";
import type {
  ChunkDraft,
  ChunkMetadataDescription,
  DocumentChunk,
  EmbeddingIndex,
  IngestionPhase,
  MetadataMap
} from "@docent/shared";
import { EmbeddingServiceError, InvalidArgumentError, isAbortError } from "../errors.js";
import { fromJsonObject, stringList } from "../metadata/metadataValue.js";
import type { ChunkDescriber, EmbeddingService } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { MarkdownChunker } from "./MarkdownChunker.js";
import type {
  IngestionPipelineOptions,
  IngestionRequest,
  IngestionResult,
  IngestionStatusEvent
} from "./types.js";

const defaultOptions: IngestionPipelineOptions = {
  maxChars: 4000,
  embeddingConcurrency: 5,
  enrichMetadata: true,
  enrichmentConcurrency: 3,
  metadataSource: "docs"
};

const fallbackDescription: ChunkMetadataDescription = {
  category: "Documentation",
  features: [],
  fileFormats: [],
  versionInfo: null
};

/**
 * Chunk, enrich, embed and store one source at a time. Re-ingesting a
 * source replaces its chunks; a failed run leaves the previous chunks in
 * place because nothing is written until every chunk is embedded.
 */
export class IngestionPipeline {
  private readonly eventEmitter: EventEmitter;
  private readonly options: IngestionPipelineOptions;
  private readonly chunker: MarkdownChunker;
  private readonly sourceLocks = new Map<string, Promise<void>>();

  constructor(
    private readonly index: EmbeddingIndex,
    private readonly embeddings: EmbeddingService,
    private readonly describer: ChunkDescriber | null = null,
    eventEmitter?: EventEmitter,
    options: Partial<IngestionPipelineOptions> = {}
  ) {
    this.eventEmitter = eventEmitter ?? new EventEmitter();
    this.options = {
      ...defaultOptions,
      ...options
    };
    this.chunker = new MarkdownChunker({
      maxChars: this.options.maxChars,
      metadataSource: this.options.metadataSource
    });
  }

  onStatus(listener: (event: IngestionStatusEvent) => void): void {
    this.eventEmitter.on("status", listener);
  }

  async ingest(request: IngestionRequest): Promise<IngestionResult> {
    const sourceUrl = request.sourceUrl.trim();
    if (sourceUrl.length === 0) {
      throw new InvalidArgumentError("Source URL must not be empty");
    }

    return this.withSourceLock(sourceUrl, () => this.process({ ...request, sourceUrl }));
  }

  private async process(request: IngestionRequest): Promise<IngestionResult> {
    const { sourceUrl } = request;
    try {
      this.emitStatus(sourceUrl, "chunking", 10);
      const drafts = await this.chunker.chunk(request.content, sourceUrl);

      this.emitStatus(sourceUrl, "enriching", 30);
      const { descriptions, fallbacks } = await this.describeChunks(drafts);

      this.emitStatus(sourceUrl, "embedding", 60);
      const extraMetadata = request.metadata ? fromJsonObject(request.metadata) : {};
      const chunks = await this.embedChunks(drafts, (draft, index) => ({
        ...describedMetadata(descriptions[index] ?? fallbackDescription),
        ...draft.metadata,
        ...extraMetadata
      }));

      this.emitStatus(sourceUrl, "saving", 90);
      await this.index.upsert(chunks);

      this.emitStatus(sourceUrl, "completed", 100);
      logger.info({ sourceUrl, chunkCount: chunks.length, fallbacks }, "Source ingested");
      return { sourceUrl, chunkCount: chunks.length, enrichmentFallbacks: fallbacks };
    } catch (error) {
      this.emitStatus(sourceUrl, "error", 100, error instanceof Error ? error.message : "Unknown error");
      throw error;
    }
  }

  private async describeChunks(
    drafts: ChunkDraft[]
  ): Promise<{ descriptions: ChunkMetadataDescription[]; fallbacks: number }> {
    const describer = this.describer;
    if (!describer || !this.options.enrichMetadata) {
      return { descriptions: drafts.map(() => fallbackDescription), fallbacks: 0 };
    }

    const descriptions = drafts.map(() => fallbackDescription);
    let fallbacks = 0;

    await runWithConcurrency(drafts, this.options.enrichmentConcurrency, async (draft, index) => {
      try {
        descriptions[index] = await describer.describeChunk(draft.content, draft.sourceUrl);
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        fallbacks += 1;
        logger.warn(
          { err: error, sourceUrl: draft.sourceUrl, chunkIndex: draft.chunkIndex },
          "Chunk metadata enrichment failed; using defaults"
        );
      }
    });

    return { descriptions, fallbacks };
  }

  private async embedChunks(
    drafts: ChunkDraft[],
    metadataFor: (draft: ChunkDraft, index: number) => MetadataMap
  ): Promise<DocumentChunk[]> {
    const vectors: number[][] = drafts.map(() => []);

    await runWithConcurrency(drafts, this.options.embeddingConcurrency, async (draft, index) => {
      try {
        vectors[index] = await this.embeddings.embed(draft.content);
      } catch (error) {
        throw isAbortError(error) || error instanceof EmbeddingServiceError
          ? error
          : new EmbeddingServiceError(error);
      }
    });

    return drafts.map((draft, index) => ({
      ...draft,
      metadata: metadataFor(draft, index),
      embedding: vectors[index] ?? []
    }));
  }

  /** Serializes runs per source URL; different sources proceed concurrently. */
  private async withSourceLock<T>(sourceUrl: string, task: () => Promise<T>): Promise<T> {
    const previous = this.sourceLocks.get(sourceUrl) ?? Promise.resolve();
    let release = (): void => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.sourceLocks.set(sourceUrl, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.sourceLocks.get(sourceUrl) === tail) {
        this.sourceLocks.delete(sourceUrl);
      }
    }
  }

  private emitStatus(sourceUrl: string, phase: IngestionPhase, progress: number, message?: string): void {
    const payload: IngestionStatusEvent = {
      sourceUrl,
      phase,
      progress
    };
    if (message !== undefined) {
      payload.message = message;
    }

    this.eventEmitter.emit("status", payload);
  }
}

function describedMetadata(description: ChunkMetadataDescription): MetadataMap {
  return {
    category: { kind: "string", value: description.category },
    features: stringList(description.features),
    file_formats: stringList(description.fileFormats),
    version_info:
      description.versionInfo === null
        ? { kind: "null" }
        : { kind: "string", value: description.versionInfo }
  };
}

async function runWithConcurrency<T>(
  items: T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  const safeConcurrency = Math.max(1, concurrency);
  let current = 0;

  const runners = Array.from({ length: Math.min(safeConcurrency, items.length) }, async () => {
    while (true) {
      const index = current;
      current += 1;
      if (index >= items.length) {
        break;
      }

      const item = items[index];
      if (item === undefined) {
        break;
      }
      await worker(item, index);
    }
  });

  await Promise.all(runners);
}
