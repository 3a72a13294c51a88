import type { DecisionRun, HistoryEntry } from "./decision-types";
import type { DecisionRunStore, NewHistoryEntry } from "./run-store";

export class InMemoryDecisionRunStore implements DecisionRunStore {
  private readonly runs = new Map<string, DecisionRun>();
  private readonly activeRuns = new Map<string, string>();
  private readonly history: HistoryEntry[] = [];

  async saveRun(run: DecisionRun): Promise<DecisionRun> {
    this.runs.set(run.threadId, structuredClone(run));
    return structuredClone(run);
  }

  async getRun(threadId: string): Promise<DecisionRun | null> {
    const run = this.runs.get(threadId);
    return run ? structuredClone(run) : null;
  }

  async completeRun(run: DecisionRun): Promise<DecisionRun | null> {
    const existing = this.runs.get(run.threadId);
    if (!existing || existing.record.status !== "awaiting_human_review") {
      return null;
    }
    this.runs.set(run.threadId, structuredClone(run));
    return structuredClone(run);
  }

  async setActiveRun(sessionId: string, threadId: string): Promise<void> {
    this.activeRuns.set(sessionId, threadId);
  }

  async clearActiveRun(sessionId: string, threadId: string): Promise<void> {
    if (this.activeRuns.get(sessionId) === threadId) {
      this.activeRuns.delete(sessionId);
    }
  }

  async getActiveThreadId(sessionId: string): Promise<string | null> {
    return this.activeRuns.get(sessionId) ?? null;
  }

  async appendHistory(entry: NewHistoryEntry): Promise<HistoryEntry> {
    const alreadyRecorded = this.history.find((existing) => existing.threadId === entry.threadId);
    if (alreadyRecorded) {
      return structuredClone(alreadyRecorded);
    }
    const stored: HistoryEntry = {
      sessionId: entry.sessionId,
      threadId: entry.threadId,
      record: structuredClone(entry.record),
      recordedAt: entry.recordedAt ?? new Date()
    };
    this.history.push(stored);
    return structuredClone(stored);
  }

  async listHistory(sessionId: string): Promise<HistoryEntry[]> {
    return this.history.filter((entry) => entry.sessionId === sessionId).map((entry) => structuredClone(entry));
  }
}
