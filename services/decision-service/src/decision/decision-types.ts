import { z } from "zod";

export const MIN_OPTIONS = 2;
export const MAX_OPTIONS = 4;
export const HISTORY_DISPLAY_LIMIT = 5;

export const NO_MODEL_AVAILABLE = "No model available";
export const PREDICTION_FAILED = "Error in prediction";

export const decisionStatusSchema = z.enum([
  "initialized",
  "scenario_collected",
  "prediction_made",
  "prediction_error",
  "awaiting_human_review",
  "completed"
]);

export type DecisionStatus = z.infer<typeof decisionStatusSchema>;

export const decisionRecordSchema = z.object({
  scenario: z.string(),
  options: z.array(z.string()),
  modelPrediction: z.string(),
  confidence: z.number().min(0).max(1),
  humanDecision: z.string(),
  humanApproved: z.boolean(),
  timestamp: z.string(),
  status: decisionStatusSchema
});

export type DecisionRecord = z.infer<typeof decisionRecordSchema>;

export const statusTransitionSchema = z.object({
  from: decisionStatusSchema,
  to: decisionStatusSchema,
  at: z.string()
});

export type StatusTransition = z.infer<typeof statusTransitionSchema>;

export type DecisionRun = {
  threadId: string;
  sessionId: string;
  record: DecisionRecord;
  transitions: StatusTransition[];
  createdAt: Date;
  updatedAt: Date;
};

export type DecisionInput = {
  scenario: string;
  options: string[];
};

export type ReviewResolution = { kind: "approve" } | { kind: "override"; option: string };

export type DecisionReview = {
  threadId: string;
  scenario: string;
  options: readonly string[];
  modelPrediction: string;
  confidence: number;
  status: DecisionStatus;
  predictionFailed: boolean;
  canApprove: boolean;
};

export type HistoryEntry = {
  sessionId: string;
  threadId: string;
  record: DecisionRecord;
  recordedAt: Date;
};

export type SessionSummary = {
  sessionId: string;
  active: DecisionRun | null;
  historyCount: number;
  recentHistory: HistoryEntry[];
};

export function createInitialRecord(input: DecisionInput): DecisionRecord {
  return {
    scenario: input.scenario,
    options: [...input.options],
    modelPrediction: "",
    confidence: 0,
    humanDecision: "",
    humanApproved: false,
    timestamp: "",
    status: "initialized"
  };
}
