export type LabelScore = {
  label: string;
  score: number;
};

/** Ranks candidate labels against a text; results are sorted best first. */
export interface Classifier {
  readonly name: string;
  classify(text: string, candidateLabels: readonly string[]): Promise<LabelScore[]>;
}

export class ClassifierResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ClassifierResponseError";
  }
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}

export function sortByScore(scores: LabelScore[]): LabelScore[] {
  // Array.prototype.sort is stable, so ties keep the caller's option order
  return [...scores].sort((a, b) => b.score - a.score);
}

export function normalizeScores(labels: readonly string[], raw: readonly number[]): LabelScore[] {
  const clamped = raw.map(clampScore);
  const total = clamped.reduce((sum, value) => sum + value, 0);
  const scores = labels.map((label, index) => ({
    label,
    score: total > 0 ? (clamped[index] ?? 0) / total : 1 / labels.length
  }));
  return sortByScore(scores);
}
