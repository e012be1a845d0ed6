import rateLimit from "express-rate-limit";
import type { AgentResponse } from "@docent/shared";
import { appConfig } from "../config.js";

export function createApiRateLimiter(
  options: { windowMs?: number; max?: number } = {}
): ReturnType<typeof rateLimit> {
  const body: AgentResponse = {
    success: false,
    message: "Too many requests, please try again later."
  };

  return rateLimit({
    windowMs: options.windowMs ?? appConfig.RATE_LIMIT_WINDOW_MS,
    max: options.max ?? appConfig.RATE_LIMIT_MAX,
    standardHeaders: true,
    legacyHeaders: false,
    message: body
  });
}
