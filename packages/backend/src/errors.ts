export type DocentErrorCode =
  | "EMPTY_DOCUMENT"
  | "DIMENSION_MISMATCH"
  | "INVALID_ARGUMENT"
  | "EMBEDDING_SERVICE"
  | "SYNTHESIS_FAILED"
  | "RATE_LIMITED"
  | "LLM_TIMEOUT"
  | "TURN_NOT_FOUND";

/**
 * Base class for every error the pipeline raises on purpose.
 *
 * `message` may carry internal detail for logs; `userMessage` is what an
 * HTTP caller is allowed to see.
 */
export class DocentError extends Error {
  readonly code: DocentErrorCode;
  readonly userMessage: string;

  constructor(
    code: DocentErrorCode,
    message: string,
    options: { userMessage?: string; cause?: unknown } = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DocentError";
    this.code = code;
    this.userMessage = options.userMessage ?? message;
  }
}

export class EmptyDocumentError extends DocentError {
  constructor(sourceUrl: string) {
    super("EMPTY_DOCUMENT", `Document has no extractable text: ${sourceUrl}`);
    this.name = "EmptyDocumentError";
  }
}

export class DimensionMismatchError extends DocentError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(
      "DIMENSION_MISMATCH",
      `Vector dimension mismatch: expected ${expected}, received ${actual}`
    );
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidArgumentError extends DocentError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

export class EmbeddingServiceError extends DocentError {
  constructor(cause: unknown) {
    super("EMBEDDING_SERVICE", `Embedding service failed: ${describeCause(cause)}`, {
      userMessage: "The documentation search is temporarily unavailable. Please try again.",
      cause
    });
    this.name = "EmbeddingServiceError";
  }
}

export class SynthesisFailedError extends DocentError {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(
      "SYNTHESIS_FAILED",
      `Answer synthesis failed after ${attempts} attempt(s): ${describeCause(cause)}`,
      {
        userMessage: "The answer could not be generated right now. Please try again.",
        cause
      }
    );
    this.name = "SynthesisFailedError";
    this.attempts = attempts;
  }
}

export class RateLimitedError extends DocentError {
  constructor(message = "Language model provider rate limit reached") {
    super("RATE_LIMITED", message, {
      userMessage: "Too many requests to the language model. Please try again shortly."
    });
    this.name = "RateLimitedError";
  }
}

export class LLMTimeoutError extends DocentError {
  constructor(timeoutMs: number) {
    super("LLM_TIMEOUT", `LLM request timeout after ${timeoutMs}ms`, {
      userMessage: "The language model took too long to respond."
    });
    this.name = "LLMTimeoutError";
  }
}

export class ConversationTurnNotFoundError extends DocentError {
  constructor(turnId: string) {
    super("TURN_NOT_FOUND", `Conversation turn does not exist: ${turnId}`);
    this.name = "ConversationTurnNotFoundError";
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
