import type { ExtractedEntities } from "./types.js";

const SECTION_PATTERNS: RegExp[] = [
  /\b(?:section|sec\.?|s\.|article|art\.?)\s*(\d{1,4}[A-Z]?)\b/gi,
  /\b(?:BNSS|BNS|BSA|IPC|CrPC)\s+(?:section\s+)?(\d{1,4}[A-Z]?)\b/gi,
  /\b(\d{1,4}[A-Z]?)\s+(?:of\s+(?:the\s+)?)?(?:IPC|BNSS|BNS|CrPC|BSA)\b/gi
];

const LAW_NAME_PATTERNS: Array<{ name: string; pattern: RegExp }> = [
  { name: "IPC", pattern: /\b(?:IPC|Indian Penal Code)\b/i },
  { name: "BNS", pattern: /\b(?:BNS|Bharatiya Nyaya Sanhita)\b/i },
  { name: "CrPC", pattern: /\b(?:CrPC|Cr\.P\.C\.?|Code of Criminal Procedure)\b/i },
  { name: "BNSS", pattern: /\b(?:BNSS|Bharatiya Nagarik Suraksha Sanhita)\b/i },
  { name: "Evidence Act", pattern: /\b(?:Indian )?Evidence Act\b/i },
  { name: "BSA", pattern: /\b(?:BSA|Bharatiya Sakshya Adhiniyam)\b/i },
  { name: "POCSO", pattern: /\bPOCSO\b/i },
  { name: "Constitution", pattern: /\bConstitution\b|\bArticle\s+\d/i },
  { name: "IT Act", pattern: /\b(?:IT Act|Information Technology Act)\b/i },
  { name: "NDPS Act", pattern: /\bNDPS\b/i }
];

export const dedupe = (values: string[]): string[] => {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of values) {
    const key = value.toUpperCase();
    if (seen.has(key)) {
      continue;
    }
    seen.add(key);
    result.push(value);
  }
  return result;
};

export const extractEntities = (text: string): ExtractedEntities => {
  const sectionNumbers: string[] = [];
  for (const pattern of SECTION_PATTERNS) {
    for (const match of text.matchAll(pattern)) {
      sectionNumbers.push(match[1].toUpperCase());
    }
  }

  const lawNames = LAW_NAME_PATTERNS
    .filter(({ pattern }) => pattern.test(text))
    .map(({ name }) => name);

  return {
    sectionNumbers: dedupe(sectionNumbers),
    lawNames
  };
};

export const mergeEntities = (...sources: ExtractedEntities[]): ExtractedEntities => ({
  sectionNumbers: dedupe(sources.flatMap((source) => source.sectionNumbers.map((value) => value.trim())).filter(Boolean)),
  lawNames: dedupe(sources.flatMap((source) => source.lawNames.map((value) => value.trim())).filter(Boolean))
});
