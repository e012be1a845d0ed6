export type Perspective = "agent" | "developer";

export type DocumentationLabel = "documented" | "conceptual" | "uncertain";

export type AnswerStatus = "answered" | "answered_unpersisted";

export interface CoverageSummary {
  counts: Record<DocumentationLabel, number>;
  /** Text after the `[LABEL]:` lines of the response's coverage section. */
  listed: Partial<Record<DocumentationLabel, string>>;
  documentationGap: boolean;
}

export interface RetrievedChunkRef {
  sourceUrl: string;
  chunkIndex: number;
  score: number;
}

export interface TurnMetadata {
  source: string;
  interactionType: "query_response";
  perspective: Perspective;
  grounded: boolean;
  documentationCoverage: CoverageSummary;
  /** Retrieved source URLs the response actually cites. */
  sources: string[];
  /** Entries of the response's own "Sources" list. */
  listedSources: string[];
  retrievedChunks: RetrievedChunkRef[];
}

export interface ConversationTurn {
  turnId: string;
  conversationId: string;
  userId: string;
  query: string;
  response: string;
  metadata: TurnMetadata;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewConversationTurn {
  conversationId: string;
  userId: string;
  query: string;
  response: string;
  metadata: TurnMetadata;
  turnId?: string;
}

export interface TurnCorrection {
  response?: string;
  metadata?: TurnMetadata;
}
