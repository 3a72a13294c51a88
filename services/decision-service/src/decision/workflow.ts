import type { Logger } from "pino";
import { DecisionAlreadyResolvedError, DecisionNotFoundError, DecisionValidationError } from "../errors";
import { logger as rootLogger } from "../logger";
import type { Classifier } from "../prediction/classifier";
import { predict } from "../prediction/prediction-step";
import {
  createInitialRecord,
  HISTORY_DISPLAY_LIMIT,
  MAX_OPTIONS,
  MIN_OPTIONS
} from "./decision-types";
import type {
  DecisionInput,
  DecisionRecord,
  DecisionReview,
  DecisionRun,
  DecisionStatus,
  HistoryEntry,
  ReviewResolution,
  SessionSummary,
  StatusTransition
} from "./decision-types";
import { applyResolution, toReview } from "./review-gate";
import type { DecisionRunStore } from "./run-store";
import { transition } from "./state-machine";
import { buildThreadId } from "./thread-id";

export type DecisionWorkflowDeps = {
  store: DecisionRunStore;
  classifier: Classifier | null;
  logger?: Logger;
  now?: () => Date;
  newThreadId?: (startedAt: Date) => string;
};

export function validateDecisionInput(input: DecisionInput): DecisionInput {
  const issues: string[] = [];
  const scenario = input.scenario.trim();
  if (!scenario) {
    issues.push("Please provide a scenario description");
  }
  const options = input.options.map((option) => option.trim()).filter((option) => option.length > 0);
  if (options.length < MIN_OPTIONS) {
    issues.push(`Please provide at least ${MIN_OPTIONS} options`);
  }
  if (options.length > MAX_OPTIONS) {
    issues.push(`Please provide at most ${MAX_OPTIONS} options`);
  }
  if (new Set(options).size !== options.length) {
    issues.push("Options must be distinct");
  }
  if (issues.length > 0) {
    throw new DecisionValidationError("Invalid decision input", issues);
  }
  return { scenario, options };
}

/** An approved record always carries the model's prediction as the decision. */
export function finalizeRecord(record: DecisionRecord): Pick<DecisionRecord, "humanDecision"> {
  return { humanDecision: record.humanApproved ? record.modelPrediction : record.humanDecision };
}

/**
 * Runs a decision from submission to the review gate, then waits for the
 * human. Suspended runs live only in the store, so a resolution can arrive
 * from any process, any time later.
 */
export class DecisionWorkflow {
  private readonly store: DecisionRunStore;
  private readonly classifier: Classifier | null;
  private readonly log: Logger;
  private readonly now: () => Date;
  private readonly newThreadId: (startedAt: Date) => string;

  constructor(deps: DecisionWorkflowDeps) {
    this.store = deps.store;
    this.classifier = deps.classifier;
    this.log = deps.logger ?? rootLogger;
    this.now = deps.now ?? (() => new Date());
    this.newThreadId = deps.newThreadId ?? ((startedAt) => buildThreadId(startedAt));
  }

  async start(sessionId: string, input: DecisionInput, log: Logger = this.log): Promise<DecisionRun> {
    const valid = validateDecisionInput(input);
    const startedAt = this.now();
    const transitions: StatusTransition[] = [];
    let record = createInitialRecord(valid);

    const advance = (to: DecisionStatus, changes: Partial<Omit<DecisionRecord, "status">> = {}) => {
      const next = transition(record, to, this.now(), changes);
      record = next.record;
      transitions.push(next.entry);
    };

    advance("scenario_collected", { timestamp: startedAt.toISOString() });

    const outcome = await predict(this.classifier, record.scenario, record.options, log);
    advance(outcome.ok ? "prediction_made" : "prediction_error", {
      modelPrediction: outcome.prediction,
      confidence: outcome.confidence
    });

    advance("awaiting_human_review");

    const threadId = this.newThreadId(startedAt);
    const saved = await this.store.saveRun({
      threadId,
      sessionId,
      record,
      transitions,
      createdAt: startedAt,
      updatedAt: this.now()
    });
    await this.store.setActiveRun(sessionId, threadId);

    log.info(
      {
        threadId,
        predicted: outcome.ok,
        confidence: record.confidence,
        classifier: this.classifier?.name ?? null
      },
      "Decision awaiting human review"
    );
    return saved;
  }

  async get(threadId: string): Promise<DecisionRun> {
    const run = await this.store.getRun(threadId);
    if (!run) {
      throw new DecisionNotFoundError(threadId);
    }
    return run;
  }

  async review(threadId: string): Promise<DecisionReview> {
    const run = await this.get(threadId);
    if (run.record.status === "completed") {
      throw new DecisionAlreadyResolvedError(threadId);
    }
    return toReview(run);
  }

  async resolve(threadId: string, resolution: ReviewResolution, log: Logger = this.log): Promise<DecisionRun> {
    const run = await this.get(threadId);
    const answered = applyResolution(run, resolution);
    const completedAt = this.now();
    const { record, entry } = transition(answered, "completed", completedAt, finalizeRecord(answered));

    const stored = await this.store.completeRun({
      ...run,
      record,
      transitions: [...run.transitions, entry],
      updatedAt: completedAt
    });
    if (!stored) {
      throw new DecisionAlreadyResolvedError(threadId);
    }

    await this.store.appendHistory({
      sessionId: stored.sessionId,
      threadId,
      record: stored.record,
      recordedAt: completedAt
    });
    await this.store.clearActiveRun(stored.sessionId, threadId);

    log.info(
      { threadId, approved: record.humanApproved, decision: record.humanDecision },
      resolution.kind === "approve" ? "Decision approved and recorded" : "Override decision recorded"
    );
    return stored;
  }

  async getSession(sessionId: string): Promise<SessionSummary> {
    const activeThreadId = await this.store.getActiveThreadId(sessionId);
    const activeRun = activeThreadId ? await this.store.getRun(activeThreadId) : null;
    const history = await this.store.listHistory(sessionId);
    return {
      sessionId,
      active: activeRun && activeRun.record.status !== "completed" ? activeRun : null,
      historyCount: history.length,
      recentHistory: history.slice(-HISTORY_DISPLAY_LIMIT).reverse()
    };
  }

  async listHistory(sessionId: string, limit?: number): Promise<HistoryEntry[]> {
    const history = await this.store.listHistory(sessionId);
    if (limit === undefined) {
      return history;
    }
    return limit > 0 ? history.slice(-limit) : [];
  }
}
