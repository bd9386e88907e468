import { DOCUMENT_ASSISTANT_SYSTEM_PROMPT } from "../../../prompts/index.js";
import type { VectorIndex } from "../../rag/types.js";
import type { Answer, HandlerInput, LegalHandler } from "../types.js";
import { RetrievalBackedHandler, type RetrievalHandlerDependencies } from "./retrieval-backed-handler.js";

export interface DocumentQueryHandlerDependencies extends RetrievalHandlerDependencies {
  vectorIndex: Pick<VectorIndex, "count">;
  sectionExpert: LegalHandler;
}

/**
 * Answers from user-uploaded documents only. With nothing uploaded, the
 * question goes to the section expert instead.
 */
export class DocumentQueryHandler extends RetrievalBackedHandler {
  readonly name = "document_query";
  protected readonly scope = "uploads";
  protected readonly systemPrompt = DOCUMENT_ASSISTANT_SYSTEM_PROMPT;

  private readonly vectorIndex: Pick<VectorIndex, "count">;
  private readonly sectionExpert: LegalHandler;

  constructor(dependencies: DocumentQueryHandlerDependencies) {
    super(dependencies);
    this.vectorIndex = dependencies.vectorIndex;
    this.sectionExpert = dependencies.sectionExpert;
  }

  async answer(input: HandlerInput): Promise<Answer> {
    let uploadedChunks: number;
    try {
      uploadedChunks = await this.vectorIndex.count("upload");
    } catch (error) {
      this.logWarn(
        "legal.document_query.count_failed",
        { requestId: input.requestId ?? null, conversationId: input.query.conversationId },
        { error: error instanceof Error ? error.message : String(error) }
      );
      uploadedChunks = 0;
    }

    if (uploadedChunks === 0) {
      return this.sectionExpert.answer(input);
    }
    return super.answer(input);
  }
}
