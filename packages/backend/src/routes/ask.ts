import { randomUUID } from "node:crypto";
import { Router } from "express";
import { z } from "zod";
import type { AgentResponse, AskResponseData } from "@docent/shared";
import { validate } from "../middleware/validator.js";
import { getAnswerSynthesizerSingleton } from "../runtime/docentRuntime.js";
import type { AnswerSynthesizer } from "../synthesis/AnswerSynthesizer.js";

const askBodySchema = z.object({
  query: z.string().trim().min(1).max(10_000),
  user_id: z.string().trim().min(1).max(200),
  conversation_id: z.string().trim().min(1).max(200).optional(),
  perspective: z.enum(["agent", "developer"]).optional()
});

interface CreateAskRouterOptions {
  synthesizer?: AnswerSynthesizer;
  recentTurnLimit?: number;
}

export function createAskRouter(options: CreateAskRouterOptions = {}): Router {
  const synthesizer = options.synthesizer ?? getAnswerSynthesizerSingleton();
  const askRouter = Router();

  askRouter.post("/", validate({ body: askBodySchema }), async (req, res, next) => {
    const body: z.infer<typeof askBodySchema> = req.body;
    const conversationId = body.conversation_id ?? randomUUID();

    // Stop the model call when the client goes away before the answer is sent.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableFinished) {
        controller.abort();
      }
    });

    try {
      const result = await synthesizer.answer({
        query: body.query,
        userId: body.user_id,
        conversationId,
        signal: controller.signal,
        ...(body.perspective ? { perspective: body.perspective } : {}),
        ...(options.recentTurnLimit ? { recentTurnLimit: options.recentTurnLimit } : {})
      });

      const response: AgentResponse<AskResponseData> = {
        success: true,
        message:
          result.status === "answered"
            ? "Query processed successfully"
            : "Query processed, but the conversation history could not be saved",
        data: {
          response: result.response,
          conversation_id: result.conversationId,
          status: result.status,
          coverage: result.coverage,
          sources: result.sources
        }
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  });

  return askRouter;
}
