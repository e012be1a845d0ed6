import type {
  AnswerStatus,
  CoverageSummary,
  Perspective,
  TurnMetadata
} from "./conversation.js";
import type { JsonObject } from "./metadata.js";

export interface AgentResponse<T = undefined> {
  success: boolean;
  message: string;
  data?: T;
}

export interface AskRequest {
  query: string;
  user_id: string;
  conversation_id?: string;
  perspective?: Perspective;
}

export interface AskResponseData {
  response: string;
  conversation_id: string;
  status: AnswerStatus;
  coverage: CoverageSummary;
  sources: string[];
}

export interface ConversationTurnPayload {
  id: string;
  conversation_id: string;
  user_id: string;
  query: string;
  response: string;
  metadata: TurnMetadata;
  created_at: string;
  updated_at: string;
}

export interface ConversationHistoryData {
  history: ConversationTurnPayload[];
}

export interface CorrectTurnRequest {
  response: string;
}

export interface IngestDocumentRequest {
  source_url: string;
  content: string;
  metadata?: JsonObject;
}

export interface IngestDocumentData {
  source_url: string;
  chunk_count: number;
}

export interface ListSourcesData {
  sources: Array<{
    source_url: string;
    title: string;
    chunk_count: number;
  }>;
}

export interface SourceContentData {
  source_url: string;
  content: string;
}

export interface ValidationIssue {
  path: string;
  message: string;
}
