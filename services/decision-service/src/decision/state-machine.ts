import { InvalidTransitionError } from "../errors";
import type { DecisionRecord, DecisionStatus, StatusTransition } from "./decision-types";

const allowedTransitions: Record<DecisionStatus, readonly DecisionStatus[]> = {
  initialized: ["scenario_collected"],
  scenario_collected: ["prediction_made", "prediction_error"],
  prediction_made: ["awaiting_human_review"],
  prediction_error: ["awaiting_human_review"],
  awaiting_human_review: ["completed"],
  completed: []
};

export function canTransition(from: DecisionStatus, to: DecisionStatus): boolean {
  return allowedTransitions[from].includes(to);
}

export function isTerminal(status: DecisionStatus): boolean {
  return allowedTransitions[status].length === 0;
}

/**
 * Moves a record to `to`, returning the new record and the transition entry.
 * The input record is never mutated.
 */
export function transition(
  record: DecisionRecord,
  to: DecisionStatus,
  at: Date,
  changes: Partial<Omit<DecisionRecord, "status">> = {}
): { record: DecisionRecord; entry: StatusTransition } {
  if (!canTransition(record.status, to)) {
    throw new InvalidTransitionError(record.status, to);
  }
  return {
    record: { ...record, ...changes, status: to },
    entry: { from: record.status, to, at: at.toISOString() }
  };
}
