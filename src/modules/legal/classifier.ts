import { z } from "zod";
import type { AssistantSettings } from "../../config/index.js";
import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate } from "../../observability/metrics.js";
import { buildClassifierUserPrompt, CLASSIFIER_SYSTEM_PROMPT } from "../../prompts/index.js";
import type { ConversationTurn } from "../history/types.js";
import { callWithPolicy } from "../providers/call-policy.js";
import type { GenerationProvider } from "../providers/types.js";
import { extractEntities, mergeEntities } from "./entity-extractor.js";
import { QUERY_CATEGORIES, type ClassificationResult, type Query } from "./types.js";

const stringList = z
  .array(z.union([z.string(), z.number()]))
  .nullish()
  .transform((values) => (values ?? []).map((value) => String(value)));

const classificationResponseSchema = z.object({
  category: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(QUERY_CATEGORIES)),
  confidence: z.coerce.number().finite(),
  section_numbers: stringList,
  law_names: stringList,
  rationale: z.string().nullish()
});

export type ClassificationResponse = z.output<typeof classificationResponseSchema>;

export interface ClassifierDependencies {
  generationProvider: GenerationProvider;
  settings: Pick<AssistantSettings, "providerTimeoutMs" | "transientRetryDelayMs">;
  model?: string;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

export interface Classifier {
  classify(query: Query, history: ConversationTurn[], requestId?: string): Promise<ClassificationResult>;
}

const clampConfidence = (value: number): number => Math.min(1, Math.max(0, value));

export const degradedClassification = (): ClassificationResult => ({
  category: "GENERAL",
  confidence: 0,
  extracted: { sectionNumbers: [], lawNames: [] },
  degraded: true
});

/**
 * Model-backed classifier. The model's JSON is untrusted: anything that fails
 * validation against the closed category set degrades to GENERAL with zero
 * confidence rather than throwing.
 */
export class LlmClassifier implements Classifier {
  private readonly generationProvider: GenerationProvider;
  private readonly policy: { timeoutMs: number; retryDelayMs: number };
  private readonly model?: string;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(dependencies: ClassifierDependencies) {
    this.generationProvider = dependencies.generationProvider;
    this.policy = {
      timeoutMs: dependencies.settings.providerTimeoutMs,
      retryDelayMs: dependencies.settings.transientRetryDelayMs
    };
    this.model = dependencies.model;
    this.logInfo = dependencies.logInfo ?? logInfo;
    this.logWarn = dependencies.logWarn ?? logWarn;
  }

  async classify(query: Query, history: ConversationTurn[], requestId?: string): Promise<ClassificationResult> {
    const correlation = { requestId: requestId ?? null, conversationId: query.conversationId };
    const hints = extractEntities(query.text);

    let response: ClassificationResponse;
    try {
      response = await callWithPolicy(
        (signal) =>
          this.generationProvider.generateStructured({
            systemInstruction: CLASSIFIER_SYSTEM_PROMPT,
            userContent: buildClassifierUserPrompt({ query: query.text, history, hints }),
            model: this.model,
            temperature: 0,
            maxTokens: 300,
            schema: classificationResponseSchema,
            schemaName: "classification",
            signal
          }),
        this.policy,
        "classification"
      );
    } catch (error) {
      recordErrorRate("classification_degraded");
      this.logWarn("legal.classify.degraded", correlation, serializeError(error));
      return degradedClassification();
    }

    const result: ClassificationResult = {
      category: response.category,
      confidence: clampConfidence(response.confidence),
      extracted: mergeEntities(hints, {
        sectionNumbers: response.section_numbers.map((value) => value.toUpperCase()),
        lawNames: response.law_names
      }),
      rationale: response.rationale ?? undefined,
      degraded: false
    };

    this.logInfo("legal.classify.complete", correlation, {
      category: result.category,
      confidence: result.confidence,
      section_numbers: result.extracted.sectionNumbers,
      law_names: result.extracted.lawNames
    });

    return result;
  }
}
