import type { ConversationStore, EmbeddingIndex } from "@docent/shared";
import { appConfig } from "../config.js";
import { IngestionPipeline } from "../ingestion/IngestionPipeline.js";
import { Retriever } from "../retrieval/Retriever.js";
import { SqliteConversationStore } from "../services/ConversationStore.js";
import { InMemoryConversationStore } from "../services/InMemoryConversationStore.js";
import { LLMService } from "../services/LLMService.js";
import type { LLMServiceLike } from "../services/llmTypes.js";
import { InMemoryEmbeddingIndex } from "../store/InMemoryEmbeddingIndex.js";
import { SqliteEmbeddingIndex } from "../store/SqliteEmbeddingIndex.js";
import { AnswerSynthesizer } from "../synthesis/AnswerSynthesizer.js";
import { logger } from "../utils/logger.js";

let llmServiceSingleton: LLMServiceLike | null = null;
let embeddingIndexSingleton: EmbeddingIndex | null = null;
let conversationStoreSingleton: ConversationStore | null = null;
let ingestionPipelineSingleton: IngestionPipeline | null = null;
let answerSynthesizerSingleton: AnswerSynthesizer | null = null;

export function getLLMServiceSingleton(): LLMServiceLike {
  if (!llmServiceSingleton) {
    llmServiceSingleton = LLMService.fromEnv();
  }

  return llmServiceSingleton;
}

export function getEmbeddingIndexSingleton(): EmbeddingIndex {
  if (embeddingIndexSingleton) {
    return embeddingIndexSingleton;
  }

  try {
    embeddingIndexSingleton = new SqliteEmbeddingIndex({
      dbPath: appConfig.DATA_DB_PATH,
      dimension: appConfig.EMBEDDING_DIMENSIONS
    });
  } catch (error) {
    logger.warn(
      {
        error: error instanceof Error ? error.message : String(error)
      },
      "SQLite embedding index unavailable, falling back to in-memory index"
    );
    embeddingIndexSingleton = new InMemoryEmbeddingIndex(appConfig.EMBEDDING_DIMENSIONS);
  }

  return embeddingIndexSingleton;
}

export function getConversationStoreSingleton(): ConversationStore {
  if (conversationStoreSingleton) {
    return conversationStoreSingleton;
  }

  try {
    conversationStoreSingleton = new SqliteConversationStore({ dbPath: appConfig.DATA_DB_PATH });
  } catch (error) {
    logger.warn(
      {
        error: error instanceof Error ? error.message : String(error)
      },
      "SQLite conversation store unavailable, falling back to in-memory store"
    );
    conversationStoreSingleton = new InMemoryConversationStore();
  }

  return conversationStoreSingleton;
}

export function getIngestionPipelineSingleton(): IngestionPipeline {
  if (!ingestionPipelineSingleton) {
    const llmService = getLLMServiceSingleton();
    ingestionPipelineSingleton = new IngestionPipeline(
      getEmbeddingIndexSingleton(),
      llmService,
      llmService,
      undefined,
      {
        maxChars: appConfig.CHUNK_MAX_CHARS,
        embeddingConcurrency: appConfig.INGEST_EMBEDDING_CONCURRENCY,
        enrichMetadata: appConfig.INGEST_ENRICH_METADATA
      }
    );
  }

  return ingestionPipelineSingleton;
}

export function getAnswerSynthesizerSingleton(): AnswerSynthesizer {
  if (!answerSynthesizerSingleton) {
    const llmService = getLLMServiceSingleton();
    answerSynthesizerSingleton = new AnswerSynthesizer(
      new Retriever(llmService, getEmbeddingIndexSingleton()),
      llmService,
      getConversationStoreSingleton(),
      {
        productName: appConfig.DOCS_PRODUCT_NAME,
        topK: appConfig.RETRIEVAL_TOP_K,
        minSimilarity: appConfig.RETRIEVAL_MIN_SIMILARITY,
        recentTurnLimit: appConfig.HISTORY_TURN_LIMIT,
        retryBaseDelayMs: appConfig.SYNTHESIS_RETRY_DELAY_MS,
        failurePolicy: appConfig.RETRIEVAL_FAILURE_POLICY
      }
    );
  }

  return answerSynthesizerSingleton;
}

export function closeRuntime(): void {
  embeddingIndexSingleton?.close();
  conversationStoreSingleton?.close();
  embeddingIndexSingleton = null;
  conversationStoreSingleton = null;
  ingestionPipelineSingleton = null;
  answerSynthesizerSingleton = null;
}
