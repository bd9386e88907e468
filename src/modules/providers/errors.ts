import OpenAI from "openai";

export type GenerationFailureKind = "auth" | "quota" | "refused" | "transient";

export class GenerationFailure extends Error {
  readonly kind: GenerationFailureKind;
  readonly retryable: boolean;

  constructor(kind: GenerationFailureKind, message: string, options?: { retryable?: boolean; cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "GenerationFailure";
    this.kind = kind;
    this.retryable = options?.retryable ?? false;
  }
}

export class ProviderTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "ProviderTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class StructuredOutputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuredOutputError";
  }
}

export class RetrievalUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "RetrievalUnavailableError";
  }
}

export class DimensionMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number, context: string) {
    super(`${context}: expected vector dimension ${expected}, received ${actual}`);
    this.name = "DimensionMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

const REFUSAL_CODES = new Set(["content_filter", "content_policy_violation", "invalid_prompt"]);

const readStatus = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null || !("status" in error)) {
    return undefined;
  }
  return typeof error.status === "number" ? error.status : undefined;
};

const readCode = (error: unknown): string | undefined => {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
};

const describe = (error: unknown): string =>
  error instanceof Error && error.message.trim().length > 0 ? error.message : String(error);

/**
 * Maps anything thrown by a provider call onto the four reportable failure
 * kinds. Only connection-level errors and 5xx responses are marked retryable.
 */
export const toGenerationFailure = (error: unknown): GenerationFailure => {
  if (error instanceof GenerationFailure) {
    return error;
  }

  if (error instanceof ProviderTimeoutError || error instanceof OpenAI.APIConnectionTimeoutError) {
    return new GenerationFailure("transient", describe(error), { cause: error });
  }

  if (error instanceof OpenAI.APIConnectionError) {
    return new GenerationFailure("transient", describe(error), { retryable: true, cause: error });
  }

  if (error instanceof StructuredOutputError) {
    return new GenerationFailure("refused", describe(error), { cause: error });
  }

  const status = readStatus(error);
  const code = readCode(error);

  if (status === 401 || status === 403 || status === 404) {
    return new GenerationFailure("auth", describe(error), { cause: error });
  }
  if (status === 429 || code === "insufficient_quota" || code === "rate_limit_exceeded") {
    return new GenerationFailure("quota", describe(error), { cause: error });
  }
  if ((code && REFUSAL_CODES.has(code)) || status === 400 || status === 422) {
    return new GenerationFailure("refused", describe(error), { cause: error });
  }
  if (status !== undefined && status >= 500) {
    return new GenerationFailure("transient", describe(error), { retryable: true, cause: error });
  }

  return new GenerationFailure("transient", describe(error), { cause: error });
};
