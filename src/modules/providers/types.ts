import type { z } from "zod";
import type { ConversationTurn } from "../history/types.js";

export interface EmbeddingProvider {
  readonly dimensions: number;
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
  embedMany(texts: string[], signal?: AbortSignal): Promise<number[][]>;
}

export interface GenerationRequest {
  systemInstruction: string;
  userContent: string;
  history?: ConversationTurn[];
  model?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface GenerationUsage {
  promptTokens?: number;
  completionTokens?: number;
  totalTokens?: number;
}

export interface GenerationResult {
  text: string;
  /** The provider stopped because of its output token limit. */
  truncated: boolean;
  usage?: GenerationUsage;
}

export interface StructuredGenerationRequest<T> extends GenerationRequest {
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
  schemaName: string;
}

export interface GenerationProvider {
  generateText(request: GenerationRequest): Promise<GenerationResult>;
  generateStructured<T>(request: StructuredGenerationRequest<T>): Promise<T>;
}
