import type { ErrorRequestHandler } from "express";
import multer from "multer";
import type { AgentResponse } from "@docent/shared";
import { DocentError, type DocentErrorCode, isAbortError } from "../errors.js";
import { logger } from "../utils/logger.js";

const statusByCode: Record<DocentErrorCode, number> = {
  EMPTY_DOCUMENT: 400,
  DIMENSION_MISMATCH: 400,
  INVALID_ARGUMENT: 400,
  TURN_NOT_FOUND: 404,
  RATE_LIMITED: 429,
  EMBEDDING_SERVICE: 502,
  SYNTHESIS_FAILED: 502,
  LLM_TIMEOUT: 504
};

export function statusForError(error: unknown): number {
  if (error instanceof DocentError) {
    return statusByCode[error.code];
  }
  if (error instanceof multer.MulterError) {
    return error.code === "LIMIT_FILE_SIZE" ? 413 : 400;
  }
  return 500;
}

export const errorHandler: ErrorRequestHandler = (err: unknown, req, res, _next) => {
  const status = statusForError(err);
  if (isAbortError(err)) {
    logger.warn({ method: req.method, url: req.originalUrl }, "Request aborted by client");
  } else if (status >= 500) {
    logger.error({ err, method: req.method, url: req.originalUrl }, "Request failed");
  } else {
    logger.debug({ err, url: req.originalUrl }, "Request rejected");
  }

  if (res.headersSent) {
    return;
  }

  const body: AgentResponse = {
    success: false,
    message: userMessageFor(err)
  };
  res.status(status).json(body);
};

function userMessageFor(error: unknown): string {
  if (error instanceof DocentError) {
    return error.userMessage;
  }
  if (error instanceof multer.MulterError) {
    return error.message;
  }
  return "Internal server error";
}
