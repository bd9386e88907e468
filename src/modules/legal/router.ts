import type { AssistantSettings } from "../../config/index.js";
import { logError, logInfo, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordRouteDecision } from "../../observability/metrics.js";
import { ConversationLock } from "../history/conversation-lock.js";
import type { ConversationTurn, HistoryStore } from "../history/types.js";
import type { VectorIndex } from "../rag/types.js";
import { errorFallbackAnswer } from "./answers.js";
import type { Classifier } from "./classifier.js";
import { parseQuery } from "./query.js";
import type { Answer, ClassificationResult, HandlerName, LegalHandler, Query } from "./types.js";

export interface RouterHandlers {
  sectionExpert: LegalHandler;
  documentQuery: LegalHandler;
  general: LegalHandler;
}

export interface LegalQueryRouterDependencies {
  classifier: Classifier;
  handlers: RouterHandlers;
  historyStore: HistoryStore;
  vectorIndex: Pick<VectorIndex, "count">;
  settings: Pick<AssistantSettings, "routingConfidenceThreshold">;
  lock?: ConversationLock;
  now?: () => Date;
  logInfo?: typeof logInfo;
  logError?: typeof logError;
}

export interface RouteOptions {
  requestId?: string;
  /** Overrides the stored history for this call; the store is still appended to. */
  history?: ConversationTurn[];
}

export interface RouteDecision {
  handler: HandlerName;
  reason: "low_confidence" | "degraded" | "category" | "no_uploads";
}

/**
 * Pure category → handler mapping. `hasUploads` is only consulted for
 * DOCUMENT_QUERY.
 */
export const selectHandler = (
  classification: ClassificationResult,
  threshold: number,
  hasUploads: boolean
): RouteDecision => {
  if (classification.degraded) {
    return { handler: "general", reason: "degraded" };
  }
  if (classification.confidence < threshold) {
    return { handler: "general", reason: "low_confidence" };
  }
  switch (classification.category) {
    case "SECTION_QUERY":
    case "LAW_QUERY":
      return { handler: "section_expert", reason: "category" };
    case "DOCUMENT_QUERY":
      return hasUploads
        ? { handler: "document_query", reason: "category" }
        : { handler: "section_expert", reason: "no_uploads" };
    case "LEGAL_ADVICE":
    case "GENERAL":
    case "OUT_OF_SCOPE":
      return { handler: "general", reason: "category" };
  }
};

export class LegalQueryRouter {
  private readonly classifier: Classifier;
  private readonly handlers: Record<HandlerName, LegalHandler>;
  private readonly historyStore: HistoryStore;
  private readonly vectorIndex: Pick<VectorIndex, "count">;
  private readonly threshold: number;
  private readonly lock: ConversationLock;
  private readonly now: () => Date;
  private readonly logInfo: typeof logInfo;
  private readonly logError: typeof logError;

  constructor(dependencies: LegalQueryRouterDependencies) {
    this.classifier = dependencies.classifier;
    this.handlers = {
      section_expert: dependencies.handlers.sectionExpert,
      document_query: dependencies.handlers.documentQuery,
      general: dependencies.handlers.general
    };
    this.historyStore = dependencies.historyStore;
    this.vectorIndex = dependencies.vectorIndex;
    this.threshold = dependencies.settings.routingConfidenceThreshold;
    this.lock = dependencies.lock ?? new ConversationLock();
    this.now = dependencies.now ?? (() => new Date());
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logError = dependencies.logError ?? logError;
  }

  /** Validates raw input and routes it. Throws InvalidQueryError for blank text. */
  async handle(
    input: { text: string; language?: string | null; conversationId: string },
    options: RouteOptions = {}
  ): Promise<Answer> {
    return this.route(parseQuery(input), options);
  }

  /**
   * Classifies, answers and records the exchange. Same-conversation calls are
   * serialized; the returned Answer is always well formed.
   */
  async route(query: Query, options: RouteOptions = {}): Promise<Answer> {
    return this.lock.runExclusive(query.conversationId, async () => {
      const correlation = { requestId: options.requestId ?? null, conversationId: query.conversationId };
      const receivedAt = this.now();
      let answer: Answer;
      let history: ConversationTurn[] = options.history ?? [];

      try {
        if (!options.history) {
          history = await this.historyStore.get(query.conversationId);
        }
        const classification = await this.classifier.classify(query, history, options.requestId);
        const decision = selectHandler(classification, this.threshold, await this.hasUploads(classification));
        recordRouteDecision(decision.handler);
        this.logInfo("legal.route.decision", correlation, {
          category: classification.category,
          confidence: classification.confidence,
          degraded: classification.degraded,
          handler: decision.handler,
          reason: decision.reason
        });

        answer = await this.handlers[decision.handler].answer({
          query,
          extracted: classification.extracted,
          history,
          category: classification.category,
          requestId: options.requestId
        });
      } catch (error) {
        recordErrorRate("route_unhandled");
        this.logError("legal.route.failed", correlation, serializeError(error));
        answer = errorFallbackAnswer(query.language, null);
      }

      await this.recordExchange(query, answer, receivedAt, correlation);
      return answer;
    });
  }

  async getHistory(conversationId: string): Promise<ConversationTurn[]> {
    return this.historyStore.get(conversationId);
  }

  async clearHistory(conversationId: string): Promise<void> {
    await this.lock.runExclusive(conversationId, () => this.historyStore.clear(conversationId));
  }

  private async hasUploads(classification: ClassificationResult): Promise<boolean> {
    if (classification.category !== "DOCUMENT_QUERY") {
      return false;
    }
    try {
      return (await this.vectorIndex.count("upload")) > 0;
    } catch (error) {
      this.logError("legal.route.upload_count_failed", {}, serializeError(error));
      return false;
    }
  }

  private async recordExchange(
    query: Query,
    answer: Answer,
    receivedAt: Date,
    correlation: { requestId: string | null; conversationId: string }
  ): Promise<void> {
    try {
      await this.historyStore.append(query.conversationId, [
        { role: "user", text: query.text, timestamp: receivedAt },
        { role: "assistant", text: answer.response, timestamp: this.now() }
      ]);
    } catch (error) {
      recordErrorRate("history_append_failed");
      this.logError("legal.history.append_failed", correlation, serializeError(error));
    }
  }
}
