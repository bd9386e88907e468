import { LANGUAGES, type Language, type Query } from "./types.js";

export class InvalidQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidQueryError";
  }
}

export const DEFAULT_LANGUAGE: Language = "English";

/** Accepts language names case-insensitively ("hindi" → "Hindi"). */
export const normalizeLanguage = (value: string | null | undefined): Language | null => {
  const trimmed = value?.trim().toLowerCase();
  if (!trimmed) {
    return DEFAULT_LANGUAGE;
  }
  return LANGUAGES.find((language) => language.toLowerCase() === trimmed) ?? null;
};

export const parseQuery = (input: {
  text: string;
  language?: string | null;
  conversationId: string;
}): Query => {
  const text = input.text.trim();
  if (text.length === 0) {
    throw new InvalidQueryError("Query text must not be empty.");
  }
  const conversationId = input.conversationId.trim();
  if (conversationId.length === 0) {
    throw new InvalidQueryError("Conversation id must not be empty.");
  }
  const language = normalizeLanguage(input.language);
  if (!language) {
    throw new InvalidQueryError(`Unsupported language: ${input.language ?? ""}`);
  }

  return Object.freeze({ text, language, conversationId });
};
