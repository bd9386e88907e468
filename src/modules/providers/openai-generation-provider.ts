import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam
} from "openai/resources/chat/completions";
import { recordGenerationLatency, recordGenerationUsage } from "../../observability/metrics.js";
import type { ConversationTurn } from "../history/types.js";
import { GenerationFailure, StructuredOutputError } from "./errors.js";
import type {
  GenerationProvider,
  GenerationRequest,
  GenerationResult,
  StructuredGenerationRequest
} from "./types.js";

/** The part of the OpenAI client this provider calls. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming, options?: { signal?: AbortSignal }): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIGenerationProviderOptions {
  client: ChatCompletionsClient;
  model: string;
  temperature?: number;
  maxTokens?: number;
  now?: () => number;
}

const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_MAX_TOKENS = 1024;

const normalizeCompletionContent = (value: unknown): string => {
  if (typeof value === "string") {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .map((part: unknown) => {
        if (typeof part === "string") {
          return part;
        }
        if (part && typeof part === "object" && "text" in part && typeof part.text === "string") {
          return part.text;
        }
        return "";
      })
      .join("");
  }

  return "";
};

const stripJsonFence = (content: string): string => {
  const trimmed = content.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/i.exec(trimmed);
  return fenced ? fenced[1] : trimmed;
};

const toHistoryMessages = (history: ConversationTurn[] | undefined): ChatCompletionMessageParam[] =>
  (history ?? []).map((turn) => ({ role: turn.role, content: turn.text }));

export class OpenAIGenerationProvider implements GenerationProvider {
  private readonly client: ChatCompletionsClient;
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly now: () => number;

  constructor(options: OpenAIGenerationProviderOptions) {
    this.client = options.client;
    this.model = options.model;
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.now = options.now ?? Date.now;
  }

  async generateText(request: GenerationRequest): Promise<GenerationResult> {
    return this.complete(request, false);
  }

  async generateStructured<T>(request: StructuredGenerationRequest<T>): Promise<T> {
    const result = await this.complete({ ...request, temperature: request.temperature ?? 0 }, true);

    let parsedJson: unknown;
    try {
      parsedJson = JSON.parse(stripJsonFence(result.text));
    } catch (error) {
      const message = error instanceof Error ? error.message : "invalid json";
      throw new StructuredOutputError(`${request.schemaName} returned invalid JSON: ${message}`);
    }

    const parsed = request.schema.safeParse(parsedJson);
    if (!parsed.success) {
      throw new StructuredOutputError(`${request.schemaName} JSON schema validation failed.`);
    }
    return parsed.data;
  }

  private async complete(request: GenerationRequest, jsonMode: boolean): Promise<GenerationResult> {
    const startedAt = this.now();
    const messages: ChatCompletionMessageParam[] = [
      { role: "system", content: request.systemInstruction },
      ...toHistoryMessages(request.history),
      { role: "user", content: request.userContent }
    ];

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: request.model ?? this.model,
      temperature: request.temperature ?? this.temperature,
      max_tokens: request.maxTokens ?? this.maxTokens,
      messages,
      response_format: jsonMode ? { type: "json_object" } : undefined
    };

    const response = await this.client.chat.completions.create(body, { signal: request.signal });
    recordGenerationLatency(this.now() - startedAt);

    const usage = response.usage
      ? {
          promptTokens: response.usage.prompt_tokens,
          completionTokens: response.usage.completion_tokens,
          totalTokens: response.usage.total_tokens
        }
      : undefined;
    if (usage) {
      recordGenerationUsage(usage);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw new GenerationFailure("transient", "Completion returned no choices.");
    }
    if (choice.message.refusal) {
      throw new GenerationFailure("refused", choice.message.refusal);
    }
    if (choice.finish_reason === "content_filter") {
      throw new GenerationFailure("refused", "Completion was blocked by the content filter.");
    }

    return {
      text: normalizeCompletionContent(choice.message.content).trim(),
      truncated: choice.finish_reason === "length",
      usage
    };
  }
}
