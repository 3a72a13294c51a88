import stopWordList from "./stop-words.json";
import type { Classifier, LabelScore } from "./classifier";
import { normalizeScores } from "./classifier";

const stopWords = new Set<string>(stopWordList);
const wordPattern = /[a-z0-9]+/g;

export function tokenize(text: string): Set<string> {
  const tokens = new Set<string>();
  for (const match of text.toLowerCase().matchAll(wordPattern)) {
    const word = match[0];
    if (word.length >= 3 && !stopWords.has(word)) {
      tokens.add(word);
    }
  }
  return tokens;
}

/**
 * Offline ranker: an option scores higher the more of its words appear in
 * the scenario. Scores are add-one smoothed and sum to 1 across options.
 */
export class KeywordClassifier implements Classifier {
  readonly name = "keyword";

  async classify(text: string, candidateLabels: readonly string[]): Promise<LabelScore[]> {
    const scenarioTokens = tokenize(text);
    const raw = candidateLabels.map((label) => {
      let overlap = 0;
      for (const token of tokenize(label)) {
        if (scenarioTokens.has(token)) {
          overlap += 1;
        }
      }
      return overlap + 1;
    });
    return normalizeScores(candidateLabels, raw);
  }
}
