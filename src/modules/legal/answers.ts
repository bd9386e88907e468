import type { Citation } from "../rag/types.js";
import type { GenerationFailure, GenerationFailureKind } from "../providers/errors.js";
import type { Answer, AnswerSource, Language, QueryCategory } from "./types.js";

export const SAFE_USER_ERROR = "I could not complete this response right now. Please try again.";

export const GENERATION_FAILURE_MESSAGES: Record<GenerationFailureKind, string> = {
  auth: "The legal assistant is not configured correctly right now. Please contact support.",
  quota: "The legal assistant has reached its usage quota. Please try again later.",
  refused: "I could not answer that request safely. Please rephrase your question.",
  transient: "The legal assistant is temporarily unavailable. Please try again shortly."
};

const roundConfidence = (value: number): number =>
  Math.round(Math.min(1, Math.max(0, value)) * 100) / 100;

export const buildAnswer = (input: {
  response: string;
  confidence: number;
  source: AnswerSource;
  language: Language;
  category: QueryCategory | null;
  citations?: Citation[];
}): Answer =>
  Object.freeze({
    response: input.response,
    confidence: roundConfidence(input.confidence),
    source: input.source,
    language: input.language,
    category: input.category,
    citations: Object.freeze((input.citations ?? []).map((citation) => Object.freeze({ ...citation })))
  });

export const generationFailureAnswer = (
  failure: GenerationFailure,
  language: Language,
  category: QueryCategory | null
): Answer =>
  buildAnswer({
    response: GENERATION_FAILURE_MESSAGES[failure.kind],
    confidence: 0,
    source: "error-fallback",
    language,
    category
  });

export const errorFallbackAnswer = (language: Language, category: QueryCategory | null): Answer =>
  buildAnswer({
    response: SAFE_USER_ERROR,
    confidence: 0,
    source: "error-fallback",
    language,
    category
  });
