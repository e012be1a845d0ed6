import cors from "cors";
import express, { type RequestHandler, type Router } from "express";
import type { AgentResponse } from "@docent/shared";
import { appConfig } from "./config.js";
import { createBearerAuth } from "./middleware/auth.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { requestLogger } from "./middleware/logger.js";
import { createApiRateLimiter } from "./middleware/rateLimiter.js";
import { createAskRouter } from "./routes/ask.js";
import { createConversationsRouter } from "./routes/conversations.js";
import { createDocumentsRouter } from "./routes/documents.js";

export interface CreateAppOptions {
  bearerToken?: string;
  corsOrigin?: string;
  rateLimiter?: RequestHandler;
  askRouter?: Router;
  conversationsRouter?: Router;
  documentsRouter?: Router;
}

export function createApp(options: CreateAppOptions = {}): express.Express {
  const app = express();

  app.use(requestLogger);
  app.use(
    cors({
      origin: options.corsOrigin ?? appConfig.CORS_ORIGIN
    })
  );
  app.use(express.json({ limit: "2mb" }));
  app.use(express.urlencoded({ extended: true }));
  app.use(options.rateLimiter ?? createApiRateLimiter());

  const api = express.Router();
  api.use(createBearerAuth(options.bearerToken ?? appConfig.API_BEARER_TOKEN));
  api.use("/ask", options.askRouter ?? createAskRouter());
  api.use("/conversations", options.conversationsRouter ?? createConversationsRouter());
  api.use("/documents", options.documentsRouter ?? createDocumentsRouter());
  app.use("/api/v1", api);

  app.use((_req, res) => {
    const body: AgentResponse = { success: false, message: "Route not found" };
    res.status(404).json(body);
  });

  app.use(errorHandler);
  return app;
}
