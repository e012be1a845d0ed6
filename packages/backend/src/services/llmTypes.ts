import type { ChunkMetadataDescription, Perspective } from "@docent/shared";

export interface PromptMessage {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionPrompt {
  system: string;
  messages: PromptMessage[];
}

export interface CompletionMetadata {
  purpose: "answer" | "describe_chunk";
  conversationId?: string;
  userId?: string;
  perspective?: Perspective;
  sourceUrl?: string;
}

export interface CallOptions {
  signal?: AbortSignal;
}

export interface EmbeddingService {
  embed(text: string, options?: CallOptions): Promise<number[]>;
}

export interface CompletionService {
  complete(prompt: CompletionPrompt, metadata: CompletionMetadata, options?: CallOptions): Promise<string>;
}

export interface ChunkDescriber {
  describeChunk(content: string, sourceUrl: string, options?: CallOptions): Promise<ChunkMetadataDescription>;
}

export type LLMServiceLike = EmbeddingService & CompletionService & ChunkDescriber;

export interface LLMConfig {
  apiKey: string;
  /** Product named in prompts, for example "the Tiled map editor". */
  productName?: string;
  baseURL?: string;
  chatModel: string;
  embeddingModel: string;
  embeddingApiKey?: string;
  embeddingBaseURL?: string;
  embeddingDimensions?: number;
  temperature?: number;
  maxTokens?: number;
  maxConcurrent?: number;
  maxRetries?: number;
  retryDelayMs?: number;
  requestsPerMinute?: number;
  timeoutMs?: number;
}

export interface LLMRateLimitConfig {
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
}

export interface RunOptions {
  /** Overrides the limiter's configured retry count for this task. */
  maxRetries?: number;
  signal?: AbortSignal;
}

export type TokenUsagePhase = "answer" | "describe_chunk" | "embedding";

export interface TokenUsageRecord {
  phase: TokenUsagePhase;
  model: string;
  promptTokens: number;
  completionTokens: number;
  estimatedCost: number;
  timestamp: Date;
  conversationId?: string;
  sourceUrl?: string;
}

export interface TokenUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
}

/** The slice of the OpenAI SDK this service calls. */
export interface OpenAICompatibleClient {
  chat: {
    completions: {
      create(
        body: {
          model: string;
          temperature: number;
          max_tokens: number;
          messages: Array<{ role: "system" | "user" | "assistant"; content: string }>;
          response_format?: { type: "json_object" };
          user?: string;
        },
        options?: { signal?: AbortSignal }
      ): Promise<{
        choices: Array<{ message: { content: string | null } }>;
        usage?: TokenUsage;
      }>;
    };
  };
  embeddings: {
    create(
      body: { model: string; input: string; dimensions?: number },
      options?: { signal?: AbortSignal }
    ): Promise<{
      data: Array<{ embedding: number[] }>;
      usage?: TokenUsage;
    }>;
  };
}
