import type { EmbeddingIndex, MetadataMap, RetrievalResult } from "@docent/shared";
import { EmbeddingServiceError, InvalidArgumentError, isAbortError } from "../errors.js";
import type { CallOptions, EmbeddingService } from "../services/llmTypes.js";
import { logger } from "../utils/logger.js";
import { assertTopK } from "../store/indexGuards.js";

/**
 * Embeds a query and ranks indexed chunks against it. Stateless: every call
 * embeds afresh.
 */
export class Retriever {
  constructor(
    private readonly embeddings: EmbeddingService,
    private readonly index: EmbeddingIndex
  ) {}

  async retrieve(
    queryText: string,
    k: number,
    filter: MetadataMap = {},
    options: CallOptions = {}
  ): Promise<RetrievalResult> {
    if (queryText.trim().length === 0) {
      throw new InvalidArgumentError("Query text must not be empty");
    }
    assertTopK(k);

    let queryVector: number[];
    try {
      queryVector = await this.embeddings.embed(queryText, options);
    } catch (error) {
      if (isAbortError(error) || error instanceof EmbeddingServiceError) {
        throw error;
      }
      throw new EmbeddingServiceError(error);
    }

    const results = await this.index.search(queryVector, k, filter);
    logger.debug({ k, resultCount: results.length }, "Retrieved documentation chunks");
    return results;
  }
}
