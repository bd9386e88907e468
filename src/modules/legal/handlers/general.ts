import type { AssistantSettings } from "../../../config/index.js";
import { logInfo, logWarn, serializeError } from "../../../observability/logger.js";
import { recordErrorRate } from "../../../observability/metrics.js";
import { GENERAL_ASSISTANT_SYSTEM_PROMPT, withResponseLanguage } from "../../../prompts/index.js";
import { callWithPolicy, type CallPolicy } from "../../providers/call-policy.js";
import { GenerationFailure, toGenerationFailure } from "../../providers/errors.js";
import type { GenerationProvider } from "../../providers/types.js";
import { buildAnswer, generationFailureAnswer } from "../answers.js";
import type { Answer, HandlerInput, LegalHandler } from "../types.js";

export const GENERAL_CONFIDENCE = 0.6;
export const GENERAL_TRUNCATED_CONFIDENCE = 0.5;

export interface GeneralHandlerDependencies {
  generationProvider: GenerationProvider;
  settings: Pick<AssistantSettings, "providerTimeoutMs" | "transientRetryDelayMs">;
  model?: string;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

export class GeneralHandler implements LegalHandler {
  readonly name = "general";
  private readonly generationProvider: GenerationProvider;
  private readonly policy: CallPolicy;
  private readonly model?: string;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(dependencies: GeneralHandlerDependencies) {
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

    try {
      const generation = await callWithPolicy(
        (signal) =>
          this.generationProvider.generateText({
            systemInstruction: withResponseLanguage(GENERAL_ASSISTANT_SYSTEM_PROMPT, query.language),
            userContent: query.text,
            history: input.history,
            model: this.model,
            signal
          }),
        this.policy,
        "general generation"
      );

      if (generation.text.length === 0) {
        throw new GenerationFailure("transient", "Model returned an empty reply.");
      }

      const answer = buildAnswer({
        response: generation.text,
        confidence: generation.truncated ? GENERAL_TRUNCATED_CONFIDENCE : GENERAL_CONFIDENCE,
        source: "general",
        language: query.language,
        category: input.category
      });
      this.logInfo("legal.handler.complete", correlation, {
        handler: this.name,
        source: answer.source,
        confidence: answer.confidence,
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
