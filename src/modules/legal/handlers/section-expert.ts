import { SECTION_EXPERT_SYSTEM_PROMPT } from "../../../prompts/index.js";
import { RetrievalBackedHandler } from "./retrieval-backed-handler.js";

/** Answers about statutes and sections using the whole index (seed and uploads). */
export class SectionExpertHandler extends RetrievalBackedHandler {
  readonly name = "section_expert";
  protected readonly scope = "all";
  protected readonly systemPrompt = SECTION_EXPERT_SYSTEM_PROMPT;
}
