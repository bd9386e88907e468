import type { AssistantSettings } from "../../../config/index.js";
import { logInfo, logWarn, serializeError } from "../../../observability/logger.js";
import { recordErrorRate } from "../../../observability/metrics.js";
import { buildGroundedUserPrompt, withResponseLanguage } from "../../../prompts/index.js";
import { callWithPolicy, type CallPolicy } from "../../providers/call-policy.js";
import { GenerationFailure, toGenerationFailure } from "../../providers/errors.js";
import type { GenerationProvider } from "../../providers/types.js";
import type { Retriever } from "../../rag/retriever.js";
import type { RetrievalResult, RetrievalScope } from "../../rag/types.js";
import { buildAnswer, generationFailureAnswer } from "../answers.js";
import type { Answer, AnswerSource, HandlerInput, HandlerName, LegalHandler } from "../types.js";

export const GROUNDED_BASE_CONFIDENCE = 0.7;
export const GROUNDED_SCORE_WEIGHT = 0.2;
export const FALLBACK_CONFIDENCE = 0.5;
export const RETRIEVAL_UNAVAILABLE_CONFIDENCE = 0.4;
export const TRUNCATION_PENALTY = 0.1;

export interface RetrievalHandlerDependencies {
  retriever: Retriever;
  generationProvider: GenerationProvider;
  settings: Pick<AssistantSettings, "providerTimeoutMs" | "transientRetryDelayMs">;
  model?: string;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

type RetrievalHandlerName = Exclude<HandlerName, "general">;

const sourceFor = (name: RetrievalHandlerName, retrieval: RetrievalResult): AnswerSource => {
  if (retrieval.status === "grounded") {
    return `${name}:grounded`;
  }
  if (retrieval.status === "unavailable") {
    return `${name}:retrieval-unavailable`;
  }
  return `${name}:fallback`;
};

export const confidenceFor = (retrieval: RetrievalResult, truncated: boolean): number => {
  const base =
    retrieval.status === "grounded"
      ? GROUNDED_BASE_CONFIDENCE + GROUNDED_SCORE_WEIGHT * retrieval.bestScore
      : retrieval.status === "unavailable"
        ? RETRIEVAL_UNAVAILABLE_CONFIDENCE
        : FALLBACK_CONFIDENCE;
  return truncated ? base - TRUNCATION_PENALTY : base;
};

/**
 * Retrieve → prompt → generate. Retrieval problems degrade to an ungrounded
 * answer; generation problems become an error-fallback Answer.
 */
export abstract class RetrievalBackedHandler implements LegalHandler {
  abstract readonly name: RetrievalHandlerName;
  protected abstract readonly scope: RetrievalScope;
  protected abstract readonly systemPrompt: string;

  protected readonly retriever: Retriever;
  protected readonly generationProvider: GenerationProvider;
  protected readonly policy: CallPolicy;
  protected readonly model?: string;
  protected readonly logInfo: typeof logInfo;
  protected readonly logWarn: typeof logWarn;

  constructor(dependencies: RetrievalHandlerDependencies) {
    this.retriever = dependencies.retriever;
    this.generationProvider = dependencies.generationProvider;
    this.policy = {
      timeoutMs: dependencies.settings.providerTimeoutMs,
      retryDelayMs: dependencies.settings.transientRetryDelayMs
    };
    this.model = dependencies.model;
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logWarn = dependencies.logWarn ?? logWarn;
  }

  async answer(input: HandlerInput): Promise<Answer> {
    const { query } = input;
    const correlation = { requestId: input.requestId ?? null, conversationId: query.conversationId };

    const retrieval = await this.retriever({
      query: query.text,
      scope: this.scope,
      requestId: input.requestId,
      conversationId: query.conversationId
    });

    try {
      const generation = await callWithPolicy(
        (signal) =>
          this.generationProvider.generateText({
            systemInstruction: withResponseLanguage(this.systemPrompt, query.language),
            userContent: buildGroundedUserPrompt({
              query: query.text,
              extracted: input.extracted,
              retrieval
            }),
            history: input.history,
            model: this.model,
            signal
          }),
        this.policy,
        `${this.name} generation`
      );

      if (generation.text.length === 0) {
        throw new GenerationFailure("transient", "Model returned an empty reply.");
      }

      const answer = buildAnswer({
        response: generation.text,
        confidence: confidenceFor(retrieval, generation.truncated),
        source: sourceFor(this.name, retrieval),
        language: query.language,
        category: input.category,
        citations: retrieval.status === "grounded" ? retrieval.citations : []
      });

      this.logInfo("legal.handler.complete", correlation, {
        handler: this.name,
        source: answer.source,
        confidence: answer.confidence,
        citation_count: answer.citations.length,
        retrieval_status: retrieval.status,
        best_score: retrieval.bestScore,
        truncated: generation.truncated
      });
      return answer;
    } catch (error) {
      const failure = toGenerationFailure(error);
      recordErrorRate(`generation_${failure.kind}`);
      this.logWarn("legal.handler.generation_failed", correlation, {
        handler: this.name,
        failure_kind: failure.kind,
        ...serializeError(failure)
      });
      return generationFailureAnswer(failure, query.language, input.category);
    }
  }
}
