import type { ChatClient } from "../llm/chat-client";
import { extractJsonObject } from "../llm/json";
import type { Classifier, LabelScore } from "./classifier";
import { ClassifierResponseError, normalizeScores } from "./classifier";

const SYSTEM_PROMPT = `You are a decision analyst. Given a decision scenario and a list of candidate options, rate how well each option answers the scenario.

Return ONLY a JSON object with this exact structure:
{
    "scores": { "<option text exactly as given>": <number between 0 and 1>, ... }
}`;

export function buildClassifierPrompt(text: string, candidateLabels: readonly string[]): string {
  const options = candidateLabels.map((label, index) => `${index + 1}. ${label}`).join("\n");
  return `Scenario:\n${text}\n\nOptions:\n${options}\n\nScore every option.`;
}

/** Zero-shot ranking through the chat model. */
export class LlmClassifier implements Classifier {
  readonly name = "llm";

  constructor(private readonly chat: ChatClient) {}

  async classify(text: string, candidateLabels: readonly string[]): Promise<LabelScore[]> {
    const content = await this.chat.complete({
      system: SYSTEM_PROMPT,
      user: buildClassifierPrompt(text, candidateLabels),
      json: true
    });
    const parsed = extractJsonObject(content);
    const scores = parsed?.scores;
    if (typeof scores !== "object" || scores === null || Array.isArray(scores)) {
      throw new ClassifierResponseError("Classifier response did not contain a scores object");
    }
    const byLabel = new Map<string, unknown>(Object.entries(scores));
    const raw = candidateLabels.map((label) => {
      const value = byLabel.get(label);
      return typeof value === "number" ? value : 0;
    });
    return normalizeScores(candidateLabels, raw);
  }
}
