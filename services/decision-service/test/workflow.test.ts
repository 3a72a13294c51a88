import { beforeEach, describe, expect, test } from "vitest";
import { NO_MODEL_AVAILABLE, PREDICTION_FAILED } from "../src/decision/decision-types";
import type { DecisionRecord } from "../src/decision/decision-types";
import { InMemoryDecisionRunStore } from "../src/decision/run-store.memory";
import { buildThreadId } from "../src/decision/thread-id";
import { DecisionWorkflow, finalizeRecord, validateDecisionInput } from "../src/decision/workflow";
import {
  DecisionAlreadyResolvedError,
  DecisionNotFoundError,
  DecisionValidationError,
  ReviewGateError
} from "../src/errors";
import type { Classifier } from "../src/prediction/classifier";
import { FixedClassifier, steppingClock, ThrowingClassifier } from "./fakes";

let store: InMemoryDecisionRunStore;

function buildWorkflow(classifier: Classifier | null) {
  let counter = 0;
  return new DecisionWorkflow({
    store,
    classifier,
    now: steppingClock("2026-03-01T09:30:00.000Z"),
    newThreadId: () => `thread-${++counter}`
  });
}

const preferB = () =>
  new FixedClassifier([
    { label: "B", score: 0.8 },
    { label: "A", score: 0.2 }
  ]);

beforeEach(() => {
  store = new InMemoryDecisionRunStore();
});

describe("starting a decision", () => {
  test("suspends at human review after a successful prediction", async () => {
    const workflow = buildWorkflow(preferB());
    const run = await workflow.start("session-1", { scenario: "Pick a launch quarter", options: ["A", "B"] });

    expect(run.threadId).toBe("thread-1");
    expect(run.record).toEqual({
      scenario: "Pick a launch quarter",
      options: ["A", "B"],
      modelPrediction: "B",
      confidence: 0.8,
      humanDecision: "",
      humanApproved: false,
      timestamp: "2026-03-01T09:30:00.000Z",
      status: "awaiting_human_review"
    });
    expect(run.transitions).toEqual([
      { from: "initialized", to: "scenario_collected", at: "2026-03-01T09:30:01.000Z" },
      { from: "scenario_collected", to: "prediction_made", at: "2026-03-01T09:30:02.000Z" },
      { from: "prediction_made", to: "awaiting_human_review", at: "2026-03-01T09:30:03.000Z" }
    ]);
    expect(await store.getActiveThreadId("session-1")).toBe("thread-1");
  });

  test("a failing classifier still reaches human review with the error sentinel", async () => {
    const workflow = buildWorkflow(new ThrowingClassifier());
    const run = await workflow.start("session-1", { scenario: "Pick a vendor", options: ["A", "B"] });

    expect(run.record.status).toBe("awaiting_human_review");
    expect(run.record.modelPrediction).toBe(PREDICTION_FAILED);
    expect(run.record.confidence).toBe(0);
    expect(run.transitions.map((entry) => entry.to)).toEqual([
      "scenario_collected",
      "prediction_error",
      "awaiting_human_review"
    ]);
  });

  test("without a classifier the prediction reports no model", async () => {
    const workflow = buildWorkflow(null);
    const run = await workflow.start("session-1", { scenario: "Pick a vendor", options: ["A", "B"] });

    expect(run.record.status).toBe("awaiting_human_review");
    expect(run.record.modelPrediction).toBe(NO_MODEL_AVAILABLE);
    expect(run.record.confidence).toBe(0);
  });

  test("rejects invalid input without creating a record", async () => {
    const workflow = buildWorkflow(preferB());

    await expect(workflow.start("session-1", { scenario: "   ", options: ["A", "B"] })).rejects.toBeInstanceOf(
      DecisionValidationError
    );
    await expect(workflow.start("session-1", { scenario: "Pick", options: ["A", "  "] })).rejects.toBeInstanceOf(
      DecisionValidationError
    );
    expect(await store.getActiveThreadId("session-1")).toBeNull();
    expect(await store.getRun("thread-1")).toBeNull();
  });

  test("a new submission replaces the active run but keeps the old one addressable", async () => {
    const workflow = buildWorkflow(preferB());
    await workflow.start("session-1", { scenario: "First", options: ["A", "B"] });
    await workflow.start("session-1", { scenario: "Second", options: ["A", "B"] });

    const summary = await workflow.getSession("session-1");
    expect(summary.active?.threadId).toBe("thread-2");
    expect((await workflow.get("thread-1")).record.status).toBe("awaiting_human_review");
  });
});

describe("input validation", () => {
  test("trims the scenario and drops blank options", () => {
    expect(validateDecisionInput({ scenario: "  Where to expand?  ", options: [" Europe ", "", "Asia"] })).toEqual({
      scenario: "Where to expand?",
      options: ["Europe", "Asia"]
    });
  });

  test("collects every problem", () => {
    try {
      validateDecisionInput({ scenario: "", options: ["A", "A", "B", "C", "D"] });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DecisionValidationError);
      if (error instanceof DecisionValidationError) {
        expect(error.issues).toEqual([
          "Please provide a scenario description",
          "Please provide at most 4 options",
          "Options must be distinct"
        ]);
      }
    }
  });
});

describe("resolving a decision", () => {
  test("approval records the model prediction", async () => {
    const workflow = buildWorkflow(preferB());
    const started = await workflow.start("session-1", { scenario: "Pick", options: ["A", "B"] });
    const done = await workflow.resolve(started.threadId, { kind: "approve" });

    expect(done.record.status).toBe("completed");
    expect(done.record.humanDecision).toBe("B");
    expect(done.record.humanApproved).toBe(true);
    expect(done.transitions.at(-1)).toEqual({
      from: "awaiting_human_review",
      to: "completed",
      at: "2026-03-01T09:30:05.000Z"
    });
  });

  test("override records the human choice regardless of the prediction", async () => {
    const workflow = buildWorkflow(preferB());
    const started = await workflow.start("session-1", { scenario: "Pick", options: ["A", "B"] });
    const done = await workflow.resolve(started.threadId, { kind: "override", option: "A" });

    expect(done.record.status).toBe("completed");
    expect(done.record.humanDecision).toBe("A");
    expect(done.record.humanApproved).toBe(false);
    expect(done.record.modelPrediction).toBe("B");
  });

  test("a completed record is never changed by a second resolution", async () => {
    const workflow = buildWorkflow(preferB());
    const started = await workflow.start("session-1", { scenario: "Pick", options: ["A", "B"] });
    const done = await workflow.resolve(started.threadId, { kind: "approve" });

    await expect(workflow.resolve(started.threadId, { kind: "override", option: "A" })).rejects.toBeInstanceOf(
      DecisionAlreadyResolvedError
    );
    await expect(workflow.resolve(started.threadId, { kind: "approve" })).rejects.toBeInstanceOf(
      DecisionAlreadyResolvedError
    );

    const reloaded = await workflow.get(started.threadId);
    expect(reloaded.record).toEqual(done.record);
    expect(await workflow.listHistory("session-1")).toHaveLength(1);
  });

  test("concurrent resolutions finalize exactly once", async () => {
    const workflow = buildWorkflow(preferB());
    const started = await workflow.start("session-1", { scenario: "Pick", options: ["A", "B"] });

    const results = await Promise.allSettled([
      workflow.resolve(started.threadId, { kind: "approve" }),
      workflow.resolve(started.threadId, { kind: "override", option: "A" })
    ]);

    expect(results.map((result) => result.status)).toEqual(["fulfilled", "rejected"]);
    const rejected = results[1];
    if (rejected?.status === "rejected") {
      expect(rejected.reason).toBeInstanceOf(DecisionAlreadyResolvedError);
    }
    const history = await workflow.listHistory("session-1");
    expect(history).toHaveLength(1);
    expect(history[0]?.record.humanDecision).toBe("B");
  });

  test("an override outside the presented options is refused", async () => {
    const workflow = buildWorkflow(preferB());
    const started = await workflow.start("session-1", { scenario: "Pick", options: ["A", "B"] });

    await expect(workflow.resolve(started.threadId, { kind: "override", option: "C" })).rejects.toBeInstanceOf(
      ReviewGateError
    );
    expect((await workflow.get(started.threadId)).record.status).toBe("awaiting_human_review");
  });

  test("a failed prediction cannot be approved but can be overridden", async () => {
    const workflow = buildWorkflow(new ThrowingClassifier());
    const started = await workflow.start("session-1", { scenario: "Pick", options: ["A", "B"] });

    await expect(workflow.resolve(started.threadId, { kind: "approve" })).rejects.toBeInstanceOf(ReviewGateError);
    const done = await workflow.resolve(started.threadId, { kind: "override", option: "B" });
    expect(done.record.humanDecision).toBe("B");
    expect(done.record.humanApproved).toBe(false);
  });

  test("unknown thread ids are reported as not found", async () => {
    const workflow = buildWorkflow(preferB());
    await expect(workflow.resolve("missing", { kind: "approve" })).rejects.toBeInstanceOf(DecisionNotFoundError);
  });

  test("approval overwrites a stale override value", () => {
    const record: DecisionRecord = {
      scenario: "Pick",
      options: ["A", "B"],
      modelPrediction: "B",
      confidence: 0.8,
      humanDecision: "A",
      humanApproved: true,
      timestamp: "2026-03-01T09:30:00.000Z",
      status: "awaiting_human_review"
    };
    expect(finalizeRecord(record)).toEqual({ humanDecision: "B" });
    expect(finalizeRecord({ ...record, humanApproved: false })).toEqual({ humanDecision: "A" });
  });
});

describe("session history", () => {
  test("keeps every completed decision and shows the five most recent first", async () => {
    const workflow = buildWorkflow(preferB());
    for (let index = 1; index <= 6; index++) {
      const run = await workflow.start("session-1", { scenario: `Decision ${index}`, options: ["A", "B"] });
      await workflow.resolve(run.threadId, { kind: "approve" });
    }

    const summary = await workflow.getSession("session-1");
    expect(summary.active).toBeNull();
    expect(summary.historyCount).toBe(6);
    expect(summary.recentHistory.map((entry) => entry.record.scenario)).toEqual([
      "Decision 6",
      "Decision 5",
      "Decision 4",
      "Decision 3",
      "Decision 2"
    ]);

    const full = await workflow.listHistory("session-1");
    expect(full.map((entry) => entry.threadId)).toEqual([
      "thread-1",
      "thread-2",
      "thread-3",
      "thread-4",
      "thread-5",
      "thread-6"
    ]);
    expect((await workflow.listHistory("session-1", 2)).map((entry) => entry.threadId)).toEqual([
      "thread-5",
      "thread-6"
    ]);
  });

  test("sessions do not see each other's decisions", async () => {
    const workflow = buildWorkflow(preferB());
    const run = await workflow.start("session-1", { scenario: "Pick", options: ["A", "B"] });
    await workflow.resolve(run.threadId, { kind: "approve" });

    const other = await workflow.getSession("session-2");
    expect(other.active).toBeNull();
    expect(other.historyCount).toBe(0);
  });
});

describe("thread ids", () => {
  test("encode the UTC start time", () => {
    expect(buildThreadId(new Date("2026-03-01T09:05:07.000Z"), "0a1b2c3d")).toBe("decision_20260301_090507_0a1b2c3d");
  });

  test("differ within the same second", () => {
    const startedAt = new Date("2026-03-01T09:05:07.000Z");
    expect(buildThreadId(startedAt)).toMatch(/^decision_20260301_090507_[0-9a-f]{8}$/);
    expect(buildThreadId(startedAt)).not.toBe(buildThreadId(startedAt));
  });
});
