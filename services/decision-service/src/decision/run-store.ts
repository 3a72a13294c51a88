import { config } from "../config";
import type { ServiceConfig } from "../config";
import { getDb } from "../db";
import { StoreUnavailableError } from "../errors";
import { logger } from "../logger";
import type { DecisionRecord, DecisionRun, HistoryEntry } from "./decision-types";
import { InMemoryDecisionRunStore } from "./run-store.memory";
import { PostgresDecisionRunStore } from "./run-store.pg";

export type NewHistoryEntry = {
  sessionId: string;
  threadId: string;
  record: DecisionRecord;
  recordedAt?: Date;
};

export interface DecisionRunStore {
  saveRun(run: DecisionRun): Promise<DecisionRun>;
  getRun(threadId: string): Promise<DecisionRun | null>;
  /** Persists a finalized run only while the stored copy is still awaiting review. */
  completeRun(run: DecisionRun): Promise<DecisionRun | null>;
  setActiveRun(sessionId: string, threadId: string): Promise<void>;
  clearActiveRun(sessionId: string, threadId: string): Promise<void>;
  getActiveThreadId(sessionId: string): Promise<string | null>;
  appendHistory(entry: NewHistoryEntry): Promise<HistoryEntry>;
  listHistory(sessionId: string): Promise<HistoryEntry[]>;
}

/**
 * Run reads and writes go to the primary only and fail with
 * StoreUnavailableError; session pointers and history fall back to memory.
 */
export class FallbackDecisionRunStore implements DecisionRunStore {
  constructor(
    private readonly primary: DecisionRunStore,
    private readonly fallback: DecisionRunStore
  ) {}

  private async durable<T>(operation: string, run: (store: DecisionRunStore) => Promise<T>): Promise<T> {
    try {
      return await run(this.primary);
    } catch (error) {
      logger.error({ error, operation }, "Primary decision store failed");
      throw new StoreUnavailableError(operation, error);
    }
  }

  private async attempt<T>(operation: string, run: (store: DecisionRunStore) => Promise<T>): Promise<T> {
    try {
      return await run(this.primary);
    } catch (error) {
      logger.warn({ error, operation }, "Primary decision store failed; using in-memory fallback");
      return run(this.fallback);
    }
  }

  saveRun(run: DecisionRun): Promise<DecisionRun> {
    return this.durable("saveRun", (store) => store.saveRun(run));
  }

  getRun(threadId: string): Promise<DecisionRun | null> {
    return this.durable("getRun", (store) => store.getRun(threadId));
  }

  completeRun(run: DecisionRun): Promise<DecisionRun | null> {
    return this.durable("completeRun", (store) => store.completeRun(run));
  }

  setActiveRun(sessionId: string, threadId: string): Promise<void> {
    return this.attempt("setActiveRun", (store) => store.setActiveRun(sessionId, threadId));
  }

  clearActiveRun(sessionId: string, threadId: string): Promise<void> {
    return this.attempt("clearActiveRun", (store) => store.clearActiveRun(sessionId, threadId));
  }

  getActiveThreadId(sessionId: string): Promise<string | null> {
    return this.attempt("getActiveThreadId", (store) => store.getActiveThreadId(sessionId));
  }

  appendHistory(entry: NewHistoryEntry): Promise<HistoryEntry> {
    return this.attempt("appendHistory", (store) => store.appendHistory(entry));
  }

  listHistory(sessionId: string): Promise<HistoryEntry[]> {
    return this.attempt("listHistory", (store) => store.listHistory(sessionId));
  }
}

export function createDecisionRunStore(settings: ServiceConfig = config): DecisionRunStore {
  const db = getDb(settings);
  if (!db) {
    return new InMemoryDecisionRunStore();
  }
  return new FallbackDecisionRunStore(new PostgresDecisionRunStore(db), new InMemoryDecisionRunStore());
}
