import type { FastifyInstance } from "fastify";
import { createDefaultAssistant } from "../../modules/legal/default-dependencies.js";
import { registerChatRoutes } from "./chat.js";
import { registerDocumentRoutes } from "./documents.js";
import { registerHistoryRoutes } from "./history.js";
import type { AssistantGetter } from "./request-helpers.js";

export interface ApiRoutesDependencies {
  getAssistant?: AssistantGetter;
}

/** Builds the assistant on first use and shares it across requests. */
export const memoizeAssistant = (factory: AssistantGetter): AssistantGetter => {
  let pending: ReturnType<AssistantGetter> | null = null;
  return () => {
    if (!pending) {
      pending = factory().catch((error: unknown) => {
        pending = null;
        throw error;
      });
    }
    return pending;
  };
};

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  const getAssistant = memoizeAssistant(dependencies?.getAssistant ?? (() => createDefaultAssistant()));
  await registerChatRoutes(app, { getAssistant });
  await registerHistoryRoutes(app, { getAssistant });
  await registerDocumentRoutes(app, { getAssistant });
}
