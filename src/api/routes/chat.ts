import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z } from "zod";
import { InvalidQueryError } from "../../modules/legal/query.js";
import { logError, logInfo } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { resolveRequestId, toValidationError, type AssistantGetter } from "./request-helpers.js";

const chatBodySchema = z.object({
  conversation_id: z.string().trim().min(1, "conversation_id is required"),
  message: z.string({ required_error: "message is required" }),
  language: z.string().nullable().optional()
});

export interface ChatRoutesDependencies {
  getAssistant: AssistantGetter;
}

const buildChatHandler = (dependencies: ChatRoutesDependencies) =>
  async (request: FastifyRequest, reply: FastifyReply) => {
    const requestId = resolveRequestId(request);
    const parsed = chatBodySchema.safeParse(request.body);
    if (!parsed.success) {
      recordErrorRate("validation_422");
      reply.code(422);
      return toValidationError(parsed.error, "body");
    }

    const correlation = { requestId, conversationId: parsed.data.conversation_id };
    try {
      const { router } = await dependencies.getAssistant();
      const answer = await router.handle(
        {
          text: parsed.data.message,
          language: parsed.data.language,
          conversationId: parsed.data.conversation_id
        },
        { requestId }
      );

      logInfo("chat.answer.sent", correlation, {
        source: answer.source,
        confidence: answer.confidence,
        citation_count: answer.citations.length
      });

      return {
        conversation_id: parsed.data.conversation_id,
        ...answer
      };
    } catch (error) {
      if (error instanceof InvalidQueryError) {
        recordErrorRate("invalid_query_400");
        reply.code(400);
        return { detail: error.message };
      }
      logError("chat.answer.failed", correlation, {
        error: error instanceof Error ? error.message : String(error)
      });
      throw error;
    }
  };

export async function registerChatRoutes(app: FastifyInstance, dependencies: ChatRoutesDependencies): Promise<void> {
  app.post("/chat", buildChatHandler(dependencies));
}
