import type { ConversationTurn } from "../modules/history/types.js";
import type { ExtractedEntities, Language } from "../modules/legal/types.js";
import { QUERY_CATEGORIES } from "../modules/legal/types.js";
import type { RetrievalResult } from "../modules/rag/types.js";

export const CLASSIFIER_SYSTEM_PROMPT = [
  "You classify questions sent to an assistant for Indian criminal law.",
  `Choose exactly one category from: ${QUERY_CATEGORIES.join(", ")}.`,
  "LAW_QUERY: a situation or incident to analyse under criminal law, or which laws apply to it.",
  "SECTION_QUERY: a specific section, article or provision (for example \"What is Section 420 IPC?\").",
  "LEGAL_ADVICE: the user asks what they personally should do in a concrete legal matter.",
  "DOCUMENT_QUERY: a question about a document the user uploaded.",
  "GENERAL: greetings, small talk or general questions about the assistant.",
  "OUT_OF_SCOPE: anything unrelated to law.",
  "Return only valid JSON with the keys `category` (string), `confidence` (number between 0 and 1),",
  "`section_numbers` (array of strings), `law_names` (array of strings) and `rationale` (short string).",
  "Do not include any explanation outside the JSON object."
].join(" ");

export const SECTION_EXPERT_SYSTEM_PROMPT = [
  "You are a legal expert on Indian criminal law sections and acts:",
  "IPC / Bharatiya Nyaya Sanhita, CrPC / Bharatiya Nagarik Suraksha Sanhita,",
  "the Evidence Act / Bharatiya Sakshya Adhiniyam and special acts such as POCSO.",
  "For a section, give the act and section number, what it covers, the prescribed punishment,",
  "the key elements of the offence, an example and related sections.",
  "Prefer the supplied context and cite it with the citation IDs exactly as provided.",
  "If the context is empty or does not cover the question, say that you are answering from general knowledge.",
  "If a section does not exist or you are unsure, say so and suggest related sections.",
  "This is legal information, not legal advice."
].join(" ");

export const DOCUMENT_ASSISTANT_SYSTEM_PROMPT = [
  "You help users understand legal documents they uploaded.",
  "Answer only from the supplied document excerpts and cite the document name and page for every claim.",
  "Quote sparingly and explain complex legal language in simpler terms.",
  "If the excerpts do not contain the answer, say so clearly. Never make up content."
].join(" ");

export const GENERAL_ASSISTANT_SYSTEM_PROMPT = [
  "You are a courteous assistant for questions about Indian law.",
  "Answer general questions and greetings briefly and politely.",
  "Do not give formal legal advice. When the user describes a concrete personal legal action",
  "(filing a case, responding to a notice, an arrest), explain the general position and recommend consulting a qualified advocate.",
  "If the question is unrelated to law, answer briefly and invite a legal question."
].join(" ");

export const withResponseLanguage = (systemPrompt: string, language: Language): string =>
  [
    systemPrompt,
    `Respond in ${language}.`,
    language === "English"
      ? ""
      : "If a legal term has no direct translation, give the English term with a short explanation."
  ]
    .filter((line) => line.length > 0)
    .join(" ");

const HISTORY_TURN_CHAR_LIMIT = 200;

export const condenseHistory = (history: ConversationTurn[], maxTurns = 6): string => {
  const recent = history.slice(-maxTurns);
  if (recent.length === 0) {
    return "(no previous turns)";
  }
  return recent
    .map((turn) => {
      const text = turn.text.replace(/\s+/g, " ").trim();
      const clipped = text.length > HISTORY_TURN_CHAR_LIMIT ? `${text.slice(0, HISTORY_TURN_CHAR_LIMIT)}…` : text;
      return `${turn.role}: ${clipped}`;
    })
    .join("\n");
};

const formatEntities = (extracted: ExtractedEntities): string[] => [
  `Section numbers: ${extracted.sectionNumbers.length > 0 ? extracted.sectionNumbers.join(", ") : "(none)"}`,
  `Law names: ${extracted.lawNames.length > 0 ? extracted.lawNames.join(", ") : "(none)"}`
];

export const buildClassifierUserPrompt = (input: {
  query: string;
  history: ConversationTurn[];
  hints: ExtractedEntities;
}): string =>
  [
    "Conversation so far:",
    condenseHistory(input.history),
    "",
    "Entities detected by pattern matching:",
    ...formatEntities(input.hints),
    "",
    "Question to classify:",
    input.query
  ].join("\n");

export const buildRetrievalContextBlock = (retrieval: RetrievalResult): string => {
  if (retrieval.chunks.length === 0) {
    return "Retrieved legal context:\n(none)";
  }

  const blocks = retrieval.chunks.map((chunk, index) => {
    const citation = retrieval.citations[index];
    const location = [
      chunk.metadata.document_name ?? chunk.source_id,
      chunk.metadata.page ? `page ${chunk.metadata.page}` : null
    ]
      .filter((part): part is string => part !== null)
      .join(", ");
    return `[${citation?.id ?? chunk.chunk_id}] (${location}; score=${chunk.score.toFixed(3)})\n${chunk.text}`;
  });

  return ["Retrieved legal context:", ...blocks].join("\n\n");
};

export const buildGroundedUserPrompt = (input: {
  query: string;
  extracted: ExtractedEntities;
  retrieval: RetrievalResult;
}): string =>
  [
    buildRetrievalContextBlock(input.retrieval),
    "",
    ...formatEntities(input.extracted),
    "",
    "Question:",
    input.query
  ].join("\n");
