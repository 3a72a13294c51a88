import { DecisionAlreadyResolvedError, ReviewGateError } from "../errors";
import type { DecisionRecord, DecisionReview, DecisionRun, ReviewResolution } from "./decision-types";

function predictionFailed(run: DecisionRun): boolean {
  return run.transitions.some((entry) => entry.to === "prediction_error");
}

export function toReview(run: DecisionRun): DecisionReview {
  const failed = predictionFailed(run);
  return {
    threadId: run.threadId,
    scenario: run.record.scenario,
    options: [...run.record.options],
    modelPrediction: run.record.modelPrediction,
    confidence: run.record.confidence,
    status: run.record.status,
    predictionFailed: failed,
    canApprove: run.record.status === "awaiting_human_review" && !failed
  };
}

/**
 * Writes the human's answer into a suspended record. Status is left alone;
 * finalization happens in the workflow.
 */
export function applyResolution(run: DecisionRun, resolution: ReviewResolution): DecisionRecord {
  const { record } = run;
  if (record.status === "completed") {
    throw new DecisionAlreadyResolvedError(run.threadId);
  }
  if (record.status !== "awaiting_human_review") {
    throw new ReviewGateError(`Decision ${run.threadId} is not awaiting review (status ${record.status})`);
  }

  if (resolution.kind === "approve") {
    if (predictionFailed(run)) {
      throw new ReviewGateError("There is no model prediction to approve; choose one of the options instead");
    }
    return { ...record, humanApproved: true, humanDecision: record.modelPrediction };
  }

  if (!record.options.includes(resolution.option)) {
    throw new ReviewGateError(`Override "${resolution.option}" is not one of the presented options`);
  }
  return { ...record, humanApproved: false, humanDecision: resolution.option };
}
