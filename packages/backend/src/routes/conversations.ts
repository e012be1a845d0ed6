import { Router } from "express";
import { z } from "zod";
import type {
  AgentResponse,
  ConversationHistoryData,
  ConversationStore,
  ConversationTurn,
  ConversationTurnPayload
} from "@docent/shared";
import { appConfig } from "../config.js";
import { validate } from "../middleware/validator.js";
import { getConversationStoreSingleton } from "../runtime/docentRuntime.js";

const conversationParamsSchema = z.object({
  conversationId: z.string().min(1).max(200)
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional()
});

const userTurnsQuerySchema = z.object({
  user_id: z.string().trim().min(1).max(200),
  limit: z.coerce.number().int().min(1).max(100).optional()
});

const turnParamsSchema = z.object({
  turnId: z.string().min(1).max(200)
});

const correctTurnBodySchema = z.object({
  response: z.string().trim().min(1)
});

interface CreateConversationsRouterOptions {
  store?: ConversationStore;
  defaultLimit?: number;
}

export function toTurnPayload(turn: ConversationTurn): ConversationTurnPayload {
  return {
    id: turn.turnId,
    conversation_id: turn.conversationId,
    user_id: turn.userId,
    query: turn.query,
    response: turn.response,
    metadata: turn.metadata,
    created_at: turn.createdAt.toISOString(),
    updated_at: turn.updatedAt.toISOString()
  };
}

export function createConversationsRouter(options: CreateConversationsRouterOptions = {}): Router {
  const store = options.store ?? getConversationStoreSingleton();
  const defaultLimit = options.defaultLimit ?? appConfig.HISTORY_TURN_LIMIT;
  const conversationsRouter = Router();

  // Most recent first, across all of the user's conversations.
  conversationsRouter.get("/", validate({ query: userTurnsQuerySchema }), async (req, res, next) => {
    try {
      const query = userTurnsQuerySchema.parse(req.query);
      const turns = await store.listByUser(query.user_id, query.limit ?? defaultLimit);
      const response: AgentResponse<ConversationHistoryData> = {
        success: true,
        message: "User turns retrieved successfully",
        data: { history: turns.map(toTurnPayload) }
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  conversationsRouter.get(
    "/:conversationId",
    validate({ params: conversationParamsSchema, query: historyQuerySchema }),
    async (req, res, next) => {
      try {
        const { limit } = historyQuerySchema.parse(req.query);
        const turns = await store.history(req.params.conversationId, limit ?? defaultLimit);
        const response: AgentResponse<ConversationHistoryData> = {
          success: true,
          message: "Conversation history retrieved successfully",
          data: { history: turns.map(toTurnPayload) }
        };
        res.json(response);
      } catch (error) {
        next(error);
      }
    }
  );

  conversationsRouter.patch(
    "/turns/:turnId",
    validate({ params: turnParamsSchema, body: correctTurnBodySchema }),
    async (req, res, next) => {
      try {
        const body: z.infer<typeof correctTurnBodySchema> = req.body;
        const turn = await store.correct(req.params.turnId, { response: body.response });
        const response: AgentResponse<ConversationTurnPayload> = {
          success: true,
          message: "Conversation turn corrected",
          data: toTurnPayload(turn)
        };
        res.json(response);
      } catch (error) {
        next(error);
      }
    }
  );

  return conversationsRouter;
}
