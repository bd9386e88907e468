import type { Citation } from "../rag/types.js";
import type { ConversationTurn } from "../history/types.js";

export const LANGUAGES = [
  "English",
  "Hindi",
  "Tamil",
  "Telugu",
  "Bengali",
  "Marathi",
  "Gujarati",
  "Kannada",
  "Malayalam",
  "Punjabi",
  "Urdu"
] as const;

export type Language = (typeof LANGUAGES)[number];

export const QUERY_CATEGORIES = [
  "LAW_QUERY",
  "SECTION_QUERY",
  "LEGAL_ADVICE",
  "DOCUMENT_QUERY",
  "GENERAL",
  "OUT_OF_SCOPE"
] as const;

export type QueryCategory = (typeof QUERY_CATEGORIES)[number];

export interface Query {
  readonly text: string;
  readonly language: Language;
  readonly conversationId: string;
}

export interface ExtractedEntities {
  sectionNumbers: string[];
  lawNames: string[];
}

export interface ClassificationResult {
  category: QueryCategory;
  confidence: number;
  extracted: ExtractedEntities;
  rationale?: string;
  /** True when the classifier could not reach or parse the model and fell back. */
  degraded: boolean;
}

export type HandlerName = "section_expert" | "document_query" | "general";

export type AnswerSource =
  | `${Exclude<HandlerName, "general">}:grounded`
  | `${Exclude<HandlerName, "general">}:fallback`
  | `${Exclude<HandlerName, "general">}:retrieval-unavailable`
  | "general"
  | "error-fallback";

export interface Answer {
  readonly response: string;
  readonly confidence: number;
  readonly source: AnswerSource;
  readonly language: Language;
  readonly category: QueryCategory | null;
  readonly citations: readonly Citation[];
}

export interface HandlerInput {
  query: Query;
  extracted: ExtractedEntities;
  history: ConversationTurn[];
  category: QueryCategory | null;
  requestId?: string;
}

export interface LegalHandler {
  readonly name: HandlerName;
  answer(input: HandlerInput): Promise<Answer>;
}
