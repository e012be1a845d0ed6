import type {
  AnswerStatus,
  ConversationStore,
  ConversationTurn,
  CoverageSummary,
  MetadataMap,
  Perspective,
  RetrievalResult,
  TurnMetadata
} from "@docent/shared";
import type { Logger } from "pino";
import { InvalidArgumentError, SynthesisFailedError, isAbortError } from "../errors.js";
import { buildAnswerPrompt, type PromptChunk } from "../prompts/index.js";
import type { Retriever } from "../retrieval/Retriever.js";
import { isTransientLLMError, sleep } from "../services/LLMRateLimiter.js";
import type { CompletionPrompt, CompletionService } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { analyzeResponse } from "./coverage.js";

export type RetrievalFailurePolicy = "abort" | "ungrounded";

export type SynthesisState = "gather" | "compose" | "invoke" | "post_process" | "persist";

export interface AnswerSynthesizerOptions {
  productName: string;
  topK: number;
  minSimilarity: number;
  recentTurnLimit: number;
  retryBaseDelayMs: number;
  /** Initial call plus retries; the interactive path allows one retry. */
  maxAttempts: number;
  failurePolicy: RetrievalFailurePolicy;
  defaultPerspective: Perspective;
  turnSource: string;
}

export interface AnswerRequest {
  query: string;
  userId: string;
  conversationId: string;
  recentTurnLimit?: number;
  perspective?: Perspective;
  filter?: MetadataMap;
  signal?: AbortSignal;
}

export interface StructuredResponse {
  status: AnswerStatus;
  response: string;
  conversationId: string;
  /** Null when the turn could not be persisted. */
  turnId: string | null;
  grounded: boolean;
  coverage: CoverageSummary;
  /** Retrieved source URLs the response cites. */
  sources: string[];
  listedSources: string[];
  retrieved: RetrievalResult;
  attempts: number;
}

const defaultOptions: AnswerSynthesizerOptions = {
  productName: "the documented software",
  topK: 5,
  minSimilarity: 0.5,
  recentTurnLimit: 5,
  retryBaseDelayMs: 500,
  maxAttempts: 2,
  failurePolicy: "abort",
  defaultPerspective: "agent",
  turnSource: "docent"
};

interface GatheredContext {
  retrieved: RetrievalResult;
  grounded: boolean;
  history: ConversationTurn[];
}

export class AnswerSynthesizer {
  private readonly options: AnswerSynthesizerOptions;

  constructor(
    private readonly retriever: Retriever,
    private readonly completions: CompletionService,
    private readonly store: ConversationStore,
    options: Partial<AnswerSynthesizerOptions> = {}
  ) {
    this.options = { ...defaultOptions, ...options };
    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new InvalidArgumentError(`maxAttempts must be at least 1, received ${this.options.maxAttempts}`);
    }
  }

  async answer(request: AnswerRequest): Promise<StructuredResponse> {
    const query = request.query.trim();
    if (query.length === 0) {
      throw new InvalidArgumentError("Query text must not be empty");
    }
    const perspective = request.perspective ?? this.options.defaultPerspective;
    const log = logger.child({ conversationId: request.conversationId });

    try {
      this.trace(log, "gather");
      const gathered = await this.gather(query, request);

      this.trace(log, "compose");
      const promptChunks = this.selectPromptChunks(gathered.retrieved);
      const prompt = buildAnswerPrompt({
        productName: this.options.productName,
        perspective,
        grounded: gathered.grounded,
        chunks: promptChunks.map(toPromptChunk),
        history: gathered.history.map((turn) => ({ query: turn.query, response: turn.response })),
        query
      });

      this.trace(log, "invoke");
      const { response, attempts } = await this.invoke(prompt, request, perspective);

      this.trace(log, "post_process");
      const analysis = analyzeResponse(response, promptChunks);
      const metadata: TurnMetadata = {
        source: this.options.turnSource,
        interactionType: "query_response",
        perspective,
        grounded: gathered.grounded,
        documentationCoverage: analysis.coverage,
        sources: analysis.citedSources,
        listedSources: analysis.listedSources,
        retrievedChunks: gathered.retrieved.map(({ chunk, score }) => ({
          sourceUrl: chunk.sourceUrl,
          chunkIndex: chunk.chunkIndex,
          score
        }))
      };

      this.trace(log, "persist");
      const turnId = await this.persist(log, request, query, response, metadata);

      return {
        status: turnId === null ? "answered_unpersisted" : "answered",
        response,
        conversationId: request.conversationId,
        turnId,
        grounded: gathered.grounded,
        coverage: analysis.coverage,
        sources: analysis.citedSources,
        listedSources: analysis.listedSources,
        retrieved: gathered.retrieved,
        attempts
      };
    } catch (error) {
      if (isAbortError(error)) {
        log.debug("Answer synthesis aborted by caller");
      }
      throw error;
    }
  }

  private async gather(query: string, request: AnswerRequest): Promise<GatheredContext> {
    const limit = request.recentTurnLimit ?? this.options.recentTurnLimit;
    const callOptions = request.signal ? { signal: request.signal } : {};

    const [retrieval, history] = await Promise.all([
      this.retrieveOrDegrade(query, request.filter ?? {}, callOptions),
      this.store.history(request.conversationId, limit)
    ]);

    return { ...retrieval, history };
  }

  private async retrieveOrDegrade(
    query: string,
    filter: MetadataMap,
    callOptions: { signal?: AbortSignal }
  ): Promise<{ retrieved: RetrievalResult; grounded: boolean }> {
    try {
      const retrieved = await this.retriever.retrieve(query, this.options.topK, filter, callOptions);
      return { retrieved, grounded: true };
    } catch (error) {
      if (this.options.failurePolicy === "abort" || isAbortError(error) || error instanceof InvalidArgumentError) {
        throw error;
      }
      logger.warn({ err: error }, "Retrieval failed; answering without documentation");
      return { retrieved: [], grounded: false };
    }
  }

  private selectPromptChunks(retrieved: RetrievalResult): RetrievalResult {
    return retrieved.filter((result) => result.score >= this.options.minSimilarity);
  }

  private async invoke(
    prompt: CompletionPrompt,
    request: AnswerRequest,
    perspective: Perspective
  ): Promise<{ response: string; attempts: number }> {
    const { maxAttempts, retryBaseDelayMs } = this.options;

    for (let attempt = 1; ; attempt += 1) {
      try {
        const response = await this.completions.complete(
          prompt,
          {
            purpose: "answer",
            conversationId: request.conversationId,
            userId: request.userId,
            perspective
          },
          request.signal ? { signal: request.signal } : {}
        );
        if (response.trim().length === 0) {
          throw new SynthesisFailedError(attempt, new Error("Language model returned an empty response"));
        }
        return { response, attempts: attempt };
      } catch (error) {
        if (isAbortError(error) || error instanceof SynthesisFailedError) {
          throw error;
        }
        if (attempt >= maxAttempts || !isTransientLLMError(error)) {
          throw new SynthesisFailedError(attempt, error);
        }

        const delayMs = retryBaseDelayMs * 2 ** (attempt - 1);
        logger.warn(
          { err: error, attempt, delayMs, conversationId: request.conversationId },
          "Completion failed; retrying"
        );
        await sleep(delayMs, request.signal);
      }
    }
  }

  private async persist(
    log: Logger,
    request: AnswerRequest,
    query: string,
    response: string,
    metadata: TurnMetadata
  ): Promise<string | null> {
    try {
      return await this.store.append({
        conversationId: request.conversationId,
        userId: request.userId,
        query,
        response,
        metadata
      });
    } catch (error) {
      log.warn({ err: error }, "Conversation turn could not be stored; returning unpersisted answer");
      return null;
    }
  }

  private trace(log: Logger, state: SynthesisState): void {
    log.debug({ state }, "Answer synthesis state");
  }
}

function toPromptChunk({ chunk, score }: RetrievalResult[number]): PromptChunk {
  return {
    title: chunk.title,
    sourceUrl: chunk.sourceUrl,
    score,
    content: chunk.content
  };
}
