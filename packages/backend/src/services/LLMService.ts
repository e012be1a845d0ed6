import OpenAI from "openai";
import { z } from "zod";
import type { ChunkMetadataDescription } from "@docent/shared";
import { buildChunkMetadataInput, buildChunkMetadataPrompt } from "../prompts/index.js";
import { appConfig } from "../config.js";
import { DimensionMismatchError, RateLimitedError } from "../errors.js";
import { LLMRateLimiter, errorStatus } from "./LLMRateLimiter.js";
import type {
  CallOptions,
  CompletionMetadata,
  CompletionPrompt,
  LLMConfig,
  LLMServiceLike,
  OpenAICompatibleClient,
  TokenUsage,
  TokenUsagePhase,
  TokenUsageRecord
} from "./llmTypes.js";

const chunkMetadataSchema = z.object({
  category: z.string().trim().min(1).catch("Documentation"),
  features: z.array(z.string()).catch([]),
  file_formats: z.array(z.string()).catch([]),
  version_info: z
    .string()
    .nullable()
    .catch(null)
    .transform((value) => (value && value.trim().length > 0 ? value.trim() : null))
});

const modelCostPerThousandTokens: Record<TokenUsagePhase, { input: number; output: number }> = {
  answer: { input: 0.00015, output: 0.0006 },
  describe_chunk: { input: 0.00015, output: 0.0006 },
  embedding: { input: 0.00002, output: 0 }
};

type NormalizedLLMConfig = LLMConfig & {
  baseURL: string;
  productName: string;
  temperature: number;
  maxTokens: number;
  maxConcurrent: number;
  maxRetries: number;
  retryDelayMs: number;
  requestsPerMinute: number;
  timeoutMs: number;
};

export class LLMService implements LLMServiceLike {
  private readonly client: OpenAICompatibleClient;
  private readonly embeddingClient: OpenAICompatibleClient;
  private readonly rateLimiter: LLMRateLimiter;
  private readonly usageRecords: TokenUsageRecord[] = [];
  private readonly config: NormalizedLLMConfig;

  constructor(
    config: LLMConfig,
    deps?: {
      client?: OpenAICompatibleClient;
      embeddingClient?: OpenAICompatibleClient;
      rateLimiter?: LLMRateLimiter;
    }
  ) {
    this.config = {
      ...config,
      baseURL: config.baseURL ?? "https://api.openai.com/v1",
      productName: config.productName ?? "the documented software",
      temperature: config.temperature ?? 0.1,
      maxTokens: config.maxTokens ?? 4096,
      maxConcurrent: config.maxConcurrent ?? 5,
      maxRetries: config.maxRetries ?? 3,
      retryDelayMs: config.retryDelayMs ?? 1000,
      requestsPerMinute: config.requestsPerMinute ?? 60,
      timeoutMs: config.timeoutMs ?? 60_000
    };

    this.client =
      deps?.client ??
      createOpenAIClient(
        new OpenAI({
          apiKey: this.config.apiKey,
          baseURL: this.config.baseURL,
          maxRetries: 0
        })
      );

    // Use a separate client for embeddings if configured
    if (deps?.embeddingClient) {
      this.embeddingClient = deps.embeddingClient;
    } else if (config.embeddingApiKey && config.embeddingBaseURL) {
      this.embeddingClient = createOpenAIClient(
        new OpenAI({
          apiKey: config.embeddingApiKey,
          baseURL: config.embeddingBaseURL,
          maxRetries: 0
        })
      );
    } else {
      this.embeddingClient = this.client;
    }

    this.rateLimiter =
      deps?.rateLimiter ??
      new LLMRateLimiter({
        maxConcurrent: this.config.maxConcurrent,
        maxRetries: this.config.maxRetries,
        retryDelayMs: this.config.retryDelayMs,
        requestsPerMinute: this.config.requestsPerMinute,
        timeoutMs: this.config.timeoutMs
      });
  }

  static fromEnv(): LLMService {
    const provider = appConfig.LLM_PROVIDER;

    const config: LLMConfig = {
      apiKey:
        provider === "gemini"
          ? appConfig.GEMINI_API_KEY
          : provider === "openai"
          ? appConfig.OPENAI_API_KEY
          : appConfig.QWEN_API_KEY,
      baseURL:
        provider === "gemini"
          ? appConfig.GEMINI_BASE_URL
          : provider === "openai"
          ? appConfig.OPENAI_BASE_URL
          : appConfig.QWEN_BASE_URL,
      chatModel:
        provider === "gemini"
          ? appConfig.GEMINI_CHAT_MODEL
          : provider === "openai"
          ? appConfig.OPENAI_CHAT_MODEL
          : appConfig.QWEN_CHAT_MODEL,
      embeddingModel:
        provider === "gemini"
          ? appConfig.GEMINI_EMBEDDING_MODEL
          : provider === "openai"
          ? appConfig.OPENAI_EMBEDDING_MODEL
          : appConfig.QWEN_EMBEDDING_MODEL,
      productName: appConfig.DOCS_PRODUCT_NAME,
      maxConcurrent: appConfig.LLM_MAX_CONCURRENT,
      maxRetries: appConfig.LLM_MAX_RETRIES,
      retryDelayMs: appConfig.LLM_RETRY_DELAY_MS,
      requestsPerMinute: appConfig.LLM_REQUESTS_PER_MINUTE,
      timeoutMs: appConfig.LLM_TIMEOUT_MS,
      temperature: 0.1,
      maxTokens: 4096
    };

    // Only OpenAI's text-embedding-3 models accept a requested dimension.
    if (provider === "openai") {
      config.embeddingDimensions = appConfig.EMBEDDING_DIMENSIONS;
    }
    if (appConfig.EMBEDDING_API_KEY) {
      config.embeddingApiKey = appConfig.EMBEDDING_API_KEY;
    }
    if (appConfig.EMBEDDING_BASE_URL) {
      config.embeddingBaseURL = appConfig.EMBEDDING_BASE_URL;
    }

    return new LLMService(config);
  }

  /**
   * One completion attempt. The limiter runs it with no retries of its own:
   * the interactive path decides how often to try again.
   */
  async complete(
    prompt: CompletionPrompt,
    metadata: CompletionMetadata,
    options: CallOptions = {}
  ): Promise<string> {
    const body: Parameters<OpenAICompatibleClient["chat"]["completions"]["create"]>[0] = {
      model: this.config.chatModel,
      temperature: this.config.temperature,
      max_tokens: this.config.maxTokens,
      messages: [{ role: "system", content: prompt.system }, ...prompt.messages]
    };
    if (metadata.userId) {
      body.user = metadata.userId;
    }

    const response = await this.call(
      (signal) => this.client.chat.completions.create(body, { signal }),
      { maxRetries: 0, signal: options.signal }
    );

    this.recordUsage(metadata.purpose, this.config.chatModel, response.usage, metadata);
    return response.choices[0]?.message.content ?? "";
  }

  async embed(text: string, options: CallOptions = {}): Promise<number[]> {
    const dimensions = this.config.embeddingDimensions;
    const response = await this.call(
      (signal) =>
        this.embeddingClient.embeddings.create(
          {
            model: this.config.embeddingModel,
            input: text,
            ...(dimensions ? { dimensions } : {})
          },
          { signal }
        ),
      { signal: options.signal }
    );

    this.recordUsage("embedding", this.config.embeddingModel, response.usage);

    const embedding = response.data[0]?.embedding ?? [];
    if (dimensions && embedding.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, embedding.length);
    }
    return embedding;
  }

  async describeChunk(
    content: string,
    sourceUrl: string,
    options: CallOptions = {}
  ): Promise<ChunkMetadataDescription> {
    const response = await this.call(
      (signal) =>
        this.client.chat.completions.create(
          {
            model: this.config.chatModel,
            temperature: 0.3,
            max_tokens: 800,
            response_format: { type: "json_object" },
            messages: [
              { role: "system", content: buildChunkMetadataPrompt(this.config.productName) },
              { role: "user", content: buildChunkMetadataInput(sourceUrl, content) }
            ]
          },
          { signal }
        ),
      { signal: options.signal }
    );

    this.recordUsage("describe_chunk", this.config.chatModel, response.usage, { sourceUrl });

    const parsed = chunkMetadataSchema.parse(safeJsonParse(response.choices[0]?.message.content ?? "{}"));
    return {
      category: parsed.category,
      features: parsed.features,
      fileFormats: parsed.file_formats,
      versionInfo: parsed.version_info
    };
  }

  getUsageRecords(limit = 200): TokenUsageRecord[] {
    const safeLimit = Math.max(1, limit);
    return this.usageRecords.slice(-safeLimit);
  }

  private async call<T>(
    task: (signal: AbortSignal) => Promise<T>,
    options: { maxRetries?: number; signal?: AbortSignal | undefined }
  ): Promise<T> {
    try {
      return await this.rateLimiter.run(task, {
        ...(options.maxRetries === undefined ? {} : { maxRetries: options.maxRetries }),
        ...(options.signal ? { signal: options.signal } : {})
      });
    } catch (error) {
      if (errorStatus(error) === 429 && error instanceof Error) {
        throw new RateLimitedError(error.message);
      }
      throw error;
    }
  }

  private recordUsage(
    phase: TokenUsagePhase,
    model: string,
    usage: TokenUsage | undefined,
    context: { conversationId?: string; sourceUrl?: string } = {}
  ): void {
    const promptTokens = usage?.prompt_tokens ?? 0;
    const completionTokens = usage?.completion_tokens ?? 0;

    const costSpec = modelCostPerThousandTokens[phase];
    const estimatedCost =
      (promptTokens / 1000) * costSpec.input + (completionTokens / 1000) * costSpec.output;

    const record: TokenUsageRecord = {
      phase,
      model,
      promptTokens,
      completionTokens,
      estimatedCost,
      timestamp: new Date()
    };
    if (context.conversationId !== undefined) {
      record.conversationId = context.conversationId;
    }
    if (context.sourceUrl !== undefined) {
      record.sourceUrl = context.sourceUrl;
    }
    this.usageRecords.push(record);
  }
}

export function createOpenAIClient(openai: OpenAI): OpenAICompatibleClient {
  return {
    chat: {
      completions: {
        create: (body, options) => openai.chat.completions.create(body, options)
      }
    },
    embeddings: {
      create: (body, options) => openai.embeddings.create(body, options)
    }
  };
}

function safeJsonParse(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    const match = input.match(/\{[\s\S]*\}/);
    if (!match) {
      return {};
    }
    try {
      return JSON.parse(match[0]);
    } catch {
      return {};
    }
  }
}
