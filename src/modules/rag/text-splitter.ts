export interface TextSplitterOptions {
  chunkSize: number;
  chunkOverlap: number;
  /** Tried in order; "" splits between characters. */
  separators: string[];
}

export const DEFAULT_SPLITTER_OPTIONS: TextSplitterOptions = {
  chunkSize: 1000,
  chunkOverlap: 200,
  separators: ["\n\n", "\n", ". ", " ", ""]
};

const mergeSplits = (splits: string[], separator: string, options: TextSplitterOptions): string[] => {
  const chunks: string[] = [];
  let current: string[] = [];
  let total = 0;

  const dropFirst = (): void => {
    const removed = current.shift();
    if (removed !== undefined) {
      total -= removed.length + (current.length > 0 ? separator.length : 0);
    }
  };

  for (const split of splits) {
    const joinCost = current.length > 0 ? separator.length : 0;
    if (current.length > 0 && total + joinCost + split.length > options.chunkSize) {
      chunks.push(current.join(separator));
      while (
        current.length > 0 &&
        (total > options.chunkOverlap || total + separator.length + split.length > options.chunkSize)
      ) {
        dropFirst();
      }
    }
    total += split.length + (current.length > 0 ? separator.length : 0);
    current.push(split);
  }

  if (current.length > 0) {
    chunks.push(current.join(separator));
  }

  return chunks.map((chunk) => chunk.trim()).filter((chunk) => chunk.length > 0);
};

const splitRecursive = (text: string, separators: string[], options: TextSplitterOptions): string[] => {
  const separatorIndex = separators.findIndex((candidate) => candidate === "" || text.includes(candidate));
  const separator = separatorIndex === -1 ? "" : separators[separatorIndex];
  const remaining = separatorIndex === -1 ? [] : separators.slice(separatorIndex + 1);
  const pieces = separator === "" ? Array.from(text) : text.split(separator);

  const result: string[] = [];
  let fitting: string[] = [];

  for (const piece of pieces) {
    if (piece.length <= options.chunkSize) {
      fitting.push(piece);
      continue;
    }
    if (fitting.length > 0) {
      result.push(...mergeSplits(fitting, separator, options));
      fitting = [];
    }
    result.push(...splitRecursive(piece, remaining.length > 0 ? remaining : [""], options));
  }

  if (fitting.length > 0) {
    result.push(...mergeSplits(fitting, separator, options));
  }

  return result;
};

/**
 * Recursive character splitter: prefers paragraph breaks, then lines, then
 * sentences, then words. Consecutive chunks share up to `chunkOverlap`
 * characters of trailing context.
 */
export const splitText = (text: string, options: TextSplitterOptions = DEFAULT_SPLITTER_OPTIONS): string[] => {
  if (options.chunkOverlap >= options.chunkSize) {
    throw new Error(`chunkOverlap (${options.chunkOverlap}) must be smaller than chunkSize (${options.chunkSize})`);
  }
  const normalized = text.replace(/\r\n/g, "\n").trim();
  if (normalized.length === 0) {
    return [];
  }
  return splitRecursive(normalized, options.separators, options);
};
