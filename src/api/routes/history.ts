import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { logInfo } from "../../observability/logger.js";
import { resolveRequestId, toValidationError, type AssistantGetter } from "./request-helpers.js";

const historyParamsSchema = z.object({
  conversationId: z.string().trim().min(1, "conversationId is required")
});

export interface HistoryRoutesDependencies {
  getAssistant: AssistantGetter;
}

export async function registerHistoryRoutes(app: FastifyInstance, dependencies: HistoryRoutesDependencies): Promise<void> {
  app.get("/conversations/:conversationId/history", async (request, reply) => {
    const parsed = historyParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      reply.code(422);
      return toValidationError(parsed.error, "params");
    }

    const { router } = await dependencies.getAssistant();
    const turns = await router.getHistory(parsed.data.conversationId);
    return {
      conversation_id: parsed.data.conversationId,
      turns: turns.map((turn) => ({
        role: turn.role,
        text: turn.text,
        timestamp: turn.timestamp.toISOString()
      }))
    };
  });

  app.delete("/conversations/:conversationId/history", async (request, reply) => {
    const parsed = historyParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      reply.code(422);
      return toValidationError(parsed.error, "params");
    }

    const { router } = await dependencies.getAssistant();
    await router.clearHistory(parsed.data.conversationId);
    logInfo("history.cleared", { requestId: resolveRequestId(request), conversationId: parsed.data.conversationId });
    reply.code(204);
    return reply.send();
  });
}
