import { z } from "zod";
import type { Queryable } from "../db";
import { decisionRecordSchema, statusTransitionSchema } from "./decision-types";
import type { DecisionRun, HistoryEntry } from "./decision-types";
import type { DecisionRunStore, NewHistoryEntry } from "./run-store";

const RUN_COLUMNS = "thread_id, session_id, record, transitions, created_at, updated_at";

const runRowSchema = z.object({
  thread_id: z.string(),
  session_id: z.string(),
  record: decisionRecordSchema,
  transitions: z.array(statusTransitionSchema),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date()
});

const historyRowSchema = z.object({
  session_id: z.string(),
  thread_id: z.string(),
  record: decisionRecordSchema,
  recorded_at: z.coerce.date()
});

const sessionRowSchema = z.object({
  active_thread_id: z.string().nullable()
});

function mapRun(row: unknown): DecisionRun {
  const parsed = runRowSchema.parse(row);
  return {
    threadId: parsed.thread_id,
    sessionId: parsed.session_id,
    record: parsed.record,
    transitions: parsed.transitions,
    createdAt: parsed.created_at,
    updatedAt: parsed.updated_at
  };
}

function mapHistory(row: unknown): HistoryEntry {
  const parsed = historyRowSchema.parse(row);
  return {
    sessionId: parsed.session_id,
    threadId: parsed.thread_id,
    record: parsed.record,
    recordedAt: parsed.recorded_at
  };
}

export class PostgresDecisionRunStore implements DecisionRunStore {
  constructor(private readonly db: Queryable) {}

  async saveRun(run: DecisionRun): Promise<DecisionRun> {
    const result = await this.db.query(
      `INSERT INTO decision_runs (thread_id, session_id, status, record, transitions, created_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (thread_id) DO UPDATE SET status = EXCLUDED.status, record = EXCLUDED.record,
         transitions = EXCLUDED.transitions, updated_at = EXCLUDED.updated_at
       RETURNING ${RUN_COLUMNS}`,
      [
        run.threadId,
        run.sessionId,
        run.record.status,
        JSON.stringify(run.record),
        JSON.stringify(run.transitions),
        run.createdAt,
        run.updatedAt
      ]
    );
    return mapRun(result.rows[0]);
  }

  async getRun(threadId: string): Promise<DecisionRun | null> {
    const result = await this.db.query(`SELECT ${RUN_COLUMNS} FROM decision_runs WHERE thread_id = $1`, [threadId]);
    if (result.rows.length === 0) {
      return null;
    }
    return mapRun(result.rows[0]);
  }

  async completeRun(run: DecisionRun): Promise<DecisionRun | null> {
    const result = await this.db.query(
      `UPDATE decision_runs SET status = $2, record = $3, transitions = $4, updated_at = $5
       WHERE thread_id = $1 AND status = 'awaiting_human_review'
       RETURNING ${RUN_COLUMNS}`,
      [run.threadId, run.record.status, JSON.stringify(run.record), JSON.stringify(run.transitions), run.updatedAt]
    );
    if (result.rows.length === 0) {
      return null;
    }
    return mapRun(result.rows[0]);
  }

  async setActiveRun(sessionId: string, threadId: string): Promise<void> {
    await this.db.query(
      `INSERT INTO decision_sessions (session_id, active_thread_id, updated_at) VALUES ($1, $2, NOW())
       ON CONFLICT (session_id) DO UPDATE SET active_thread_id = EXCLUDED.active_thread_id, updated_at = NOW()`,
      [sessionId, threadId]
    );
  }

  async clearActiveRun(sessionId: string, threadId: string): Promise<void> {
    await this.db.query(
      "UPDATE decision_sessions SET active_thread_id = NULL, updated_at = NOW() WHERE session_id = $1 AND active_thread_id = $2",
      [sessionId, threadId]
    );
  }

  async getActiveThreadId(sessionId: string): Promise<string | null> {
    const result = await this.db.query("SELECT active_thread_id FROM decision_sessions WHERE session_id = $1", [
      sessionId
    ]);
    if (result.rows.length === 0) {
      return null;
    }
    return sessionRowSchema.parse(result.rows[0]).active_thread_id;
  }

  async appendHistory(entry: NewHistoryEntry): Promise<HistoryEntry> {
    const inserted = await this.db.query(
      `INSERT INTO decision_history (session_id, thread_id, record, recorded_at) VALUES ($1, $2, $3, $4)
       ON CONFLICT (thread_id) DO NOTHING
       RETURNING session_id, thread_id, record, recorded_at`,
      [entry.sessionId, entry.threadId, JSON.stringify(entry.record), entry.recordedAt ?? new Date()]
    );
    if (inserted.rows.length > 0) {
      return mapHistory(inserted.rows[0]);
    }
    const existing = await this.db.query(
      "SELECT session_id, thread_id, record, recorded_at FROM decision_history WHERE thread_id = $1",
      [entry.threadId]
    );
    return mapHistory(existing.rows[0]);
  }

  async listHistory(sessionId: string): Promise<HistoryEntry[]> {
    const result = await this.db.query(
      "SELECT session_id, thread_id, record, recorded_at FROM decision_history WHERE session_id = $1 ORDER BY id ASC",
      [sessionId]
    );
    return result.rows.map((row) => mapHistory(row));
  }
}
