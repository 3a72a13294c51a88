import type { DecisionRun } from "../src/decision/decision-types";
import type { DecisionRunStore, NewHistoryEntry } from "../src/decision/run-store";
import { InMemoryDecisionRunStore } from "../src/decision/run-store.memory";
import type { ChatClient, ChatRequest } from "../src/llm/chat-client";
import type { Classifier, LabelScore } from "../src/prediction/classifier";

type ScriptedReply = string | Error;

export class ScriptedChatClient implements ChatClient {
  readonly model = "test-model";
  readonly requests: ChatRequest[] = [];

  constructor(private readonly replies: ScriptedReply[]) {}

  async complete(request: ChatRequest): Promise<string> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new Error("No scripted reply left");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

export class FixedClassifier implements Classifier {
  readonly name = "fixed";
  readonly calls: Array<{ text: string; labels: readonly string[] }> = [];

  constructor(private readonly scores: LabelScore[]) {}

  async classify(text: string, candidateLabels: readonly string[]): Promise<LabelScore[]> {
    this.calls.push({ text, labels: candidateLabels });
    return this.scores;
  }
}

export class ThrowingClassifier implements Classifier {
  readonly name = "throwing";

  async classify(): Promise<LabelScore[]> {
    throw new Error("classifier exploded");
  }
}

export function httpError(status: number, message = `HTTP ${status}`): Error {
  return Object.assign(new Error(message), { status });
}

export function steppingClock(start: string, stepMs = 1000): () => Date {
  let current = new Date(start).getTime();
  return () => {
    const value = new Date(current);
    current += stepMs;
    return value;
  };
}

/** Stands in for a database that can be switched off per operation. */
export class FlakyRunStore implements DecisionRunStore {
  readonly failing = new Set<keyof DecisionRunStore>();

  constructor(readonly inner: DecisionRunStore = new InMemoryDecisionRunStore()) {}

  private guard(operation: keyof DecisionRunStore): void {
    if (this.failing.has(operation)) {
      throw new Error("connection reset");
    }
  }

  async saveRun(run: DecisionRun) {
    this.guard("saveRun");
    return this.inner.saveRun(run);
  }

  async getRun(threadId: string) {
    this.guard("getRun");
    return this.inner.getRun(threadId);
  }

  async completeRun(run: DecisionRun) {
    this.guard("completeRun");
    return this.inner.completeRun(run);
  }

  async setActiveRun(sessionId: string, threadId: string) {
    this.guard("setActiveRun");
    return this.inner.setActiveRun(sessionId, threadId);
  }

  async clearActiveRun(sessionId: string, threadId: string) {
    this.guard("clearActiveRun");
    return this.inner.clearActiveRun(sessionId, threadId);
  }

  async getActiveThreadId(sessionId: string) {
    this.guard("getActiveThreadId");
    return this.inner.getActiveThreadId(sessionId);
  }

  async appendHistory(entry: NewHistoryEntry) {
    this.guard("appendHistory");
    return this.inner.appendHistory(entry);
  }

  async listHistory(sessionId: string) {
    this.guard("listHistory");
    return this.inner.listHistory(sessionId);
  }
}
