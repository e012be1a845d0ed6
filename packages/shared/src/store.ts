import type {
  ConversationTurn,
  NewConversationTurn,
  TurnCorrection
} from "./types/conversation.js";
import type { DocumentChunk, SourceSummary } from "./types/document.js";
import type { MetadataMap } from "./types/metadata.js";

export interface ChunkSearchResult {
  chunk: DocumentChunk;
  score: number;
}

export type RetrievalResult = ChunkSearchResult[];

export interface IndexStats {
  dimension: number;
  chunkCount: number;
  sourceCount: number;
}

export interface EmbeddingIndex {
  readonly dimension: number;
  upsert(chunks: DocumentChunk[]): Promise<void>;
  search(queryVector: number[], k: number, filter?: MetadataMap): Promise<RetrievalResult>;
  listSources(): Promise<SourceSummary[]>;
  getSourceChunks(sourceUrl: string): Promise<DocumentChunk[]>;
  deleteSource(sourceUrl: string): Promise<boolean>;
  stats(): Promise<IndexStats>;
  close(): void;
}

export interface ConversationStore {
  append(turn: NewConversationTurn): Promise<string>;
  history(conversationId: string, limit: number): Promise<ConversationTurn[]>;
  getTurn(turnId: string): Promise<ConversationTurn | null>;
  correct(turnId: string, correction: TurnCorrection): Promise<ConversationTurn>;
  listByUser(userId: string, limit?: number): Promise<ConversationTurn[]>;
  close(): void;
}
