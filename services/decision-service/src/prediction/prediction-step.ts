import type { Logger } from "pino";
import { NO_MODEL_AVAILABLE, PREDICTION_FAILED } from "../decision/decision-types";
import type { Classifier } from "./classifier";
import { clampScore } from "./classifier";

export type PredictionOutcome =
  | { ok: true; prediction: string; confidence: number }
  | { ok: false; prediction: string; confidence: 0; reason: "no_model" | "classifier_failed" };

/**
 * Ranks the options against the scenario and keeps the best one. Failures
 * are reported in the outcome, never thrown.
 */
export async function predict(
  classifier: Classifier | null,
  scenario: string,
  options: readonly string[],
  log: Logger
): Promise<PredictionOutcome> {
  if (!classifier || options.length === 0) {
    return { ok: false, prediction: NO_MODEL_AVAILABLE, confidence: 0, reason: "no_model" };
  }

  try {
    const ranked = await classifier.classify(scenario, options);
    const top = ranked[0];
    if (!top || !options.includes(top.label)) {
      log.warn({ classifier: classifier.name, top: top?.label ?? null }, "Classifier returned no usable label");
      return { ok: false, prediction: PREDICTION_FAILED, confidence: 0, reason: "classifier_failed" };
    }
    return { ok: true, prediction: top.label, confidence: clampScore(top.score) };
  } catch (error) {
    log.error({ error, classifier: classifier.name }, "Prediction failed");
    return { ok: false, prediction: PREDICTION_FAILED, confidence: 0, reason: "classifier_failed" };
  }
}
