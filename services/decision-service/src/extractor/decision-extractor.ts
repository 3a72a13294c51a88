import { z } from "zod";
import { MAX_OPTIONS, MIN_OPTIONS } from "../decision/decision-types";
import type { DecisionInput } from "../decision/decision-types";
import { LlmConfigurationError, RetryExhaustedError } from "../errors";
import { logger } from "../logger";
import type { ChatClient } from "../llm/chat-client";
import { extractJsonObject } from "../llm/json";
import { buildExtractionPrompt, EXTRACTION_SYSTEM_PROMPT } from "./prompts";

const extractionSchema = z.object({
  scenario: z.string().trim().min(1),
  options: z
    .array(z.string())
    .transform((options) => [...new Set(options.map((option) => option.trim()).filter((option) => option.length > 0))])
    .pipe(z.array(z.string()).min(MIN_OPTIONS))
});

export type ExtractedDecision = DecisionInput;

/**
 * Validates raw model output. Anything short of a scenario plus two distinct
 * options yields null; repeats and options past the fourth are dropped.
 */
export function parseExtraction(content: string): ExtractedDecision | null {
  const candidate = extractJsonObject(content);
  if (!candidate) {
    return null;
  }
  const parsed = extractionSchema.safeParse(candidate);
  if (!parsed.success) {
    return null;
  }
  return {
    scenario: parsed.data.scenario,
    options: parsed.data.options.slice(0, MAX_OPTIONS)
  };
}

export class DecisionExtractor {
  constructor(private readonly chat: ChatClient) {}

  async extract(text: string): Promise<ExtractedDecision | null> {
    if (!text.trim()) {
      return null;
    }
    let content: string;
    try {
      content = await this.chat.complete({
        system: EXTRACTION_SYSTEM_PROMPT,
        user: buildExtractionPrompt(text),
        json: true
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError || error instanceof LlmConfigurationError) {
        throw error;
      }
      logger.error({ error, model: this.chat.model }, "Error parsing chat message");
      return null;
    }
    const result = parseExtraction(content);
    if (!result) {
      logger.info({ model: this.chat.model, chars: content.length }, "Model response held no usable decision");
    }
    return result;
  }
}
