import Database from 'better-sqlite3';

import { JobRecord, JobResult, JobStatus, JobStore, NewJob, TERMINAL_STATUSES, TransitionChanges, isTerminal } from './types.js';

interface JobRow {
  job_id: string;
  task: string;
  code_ref: string;
  status: JobStatus;
  sandbox_ref: string | null;
  result: string | null;
  last_event_seq: number;
  callback_token: string;
  max_runtime_seconds: number;
  created_at: string;
  updated_at: string;
  deadline_at: string;
  expires_at: string;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    job_id TEXT PRIMARY KEY,
    task TEXT NOT NULL,
    code_ref TEXT NOT NULL,
    status TEXT NOT NULL,
    sandbox_ref TEXT,
    result TEXT,
    last_event_seq INTEGER NOT NULL DEFAULT 0,
    callback_token TEXT NOT NULL,
    max_runtime_seconds REAL NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    deadline_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  );
  CREATE INDEX IF NOT EXISTS jobs_status_idx ON jobs(status);
`;

function rowToRecord(row: JobRow): JobRecord {
  return {
    jobId: row.job_id,
    task: row.task,
    codeRef: row.code_ref,
    status: row.status,
    sandboxRef: row.sandbox_ref,
    result: row.result === null ? null : parseResult(row.result),
    lastEventSeq: row.last_event_seq,
    callbackToken: row.callback_token,
    maxRuntimeSeconds: row.max_runtime_seconds,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    deadlineAt: row.deadline_at,
    expiresAt: row.expires_at,
  };
}

function parseResult(raw: string): JobResult {
  const parsed: unknown = JSON.parse(raw);
  if (typeof parsed !== 'object' || parsed === null) {
    return { output: parsed };
  }
  const result: JobResult = {};
  if ('output' in parsed) {
    result.output = parsed.output;
  }
  if ('error' in parsed && typeof parsed.error === 'string') {
    result.error = parsed.error;
  }
  return result;
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}

/**
 * SQLite-backed store so job state survives a restart. Status changes are a
 * single `UPDATE ... WHERE status IN (...)`; `changes` tells whether the swap
 * happened.
 */
export class SqliteJobStore implements JobStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('busy_timeout = 5000');
    this.db.exec(SCHEMA);
  }

  create(job: NewJob): JobRecord {
    this.db
      .prepare(
        `INSERT INTO jobs(
          job_id, task, code_ref, status, sandbox_ref, result, last_event_seq,
          callback_token, max_runtime_seconds, created_at, updated_at, deadline_at, expires_at
        ) VALUES (
          @jobId, @task, @codeRef, 'PENDING', NULL, NULL, 0,
          @callbackToken, @maxRuntimeSeconds, @createdAt, @createdAt, @deadlineAt, @deadlineAt
        )`,
      )
      .run(job);
    const created = this.get(job.jobId);
    if (!created) {
      throw new Error(`job ${job.jobId} was not persisted`);
    }
    return created;
  }

  get(jobId: string): JobRecord | undefined {
    const row = this.db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE job_id = ?').get(jobId);
    return row ? rowToRecord(row) : undefined;
  }

  transition(jobId: string, from: readonly JobStatus[], to: JobStatus, changes: TransitionChanges = {}): boolean {
    if (from.length === 0) {
      return false;
    }
    const sets = ['status = ?', 'updated_at = ?'];
    const params: (string | number | null)[] = [to, new Date().toISOString()];

    if (changes.sandboxRef !== undefined) {
      sets.push('sandbox_ref = ?');
      params.push(changes.sandboxRef);
    }
    if (changes.result !== undefined && isTerminal(to)) {
      sets.push('result = COALESCE(result, ?)');
      params.push(JSON.stringify(changes.result));
    }
    if (changes.eventSeq !== undefined) {
      sets.push('last_event_seq = MAX(last_event_seq, ?)');
      params.push(changes.eventSeq);
    }

    const sql = `UPDATE jobs SET ${sets.join(', ')} WHERE job_id = ? AND status IN (${placeholders(from)})`;
    const res = this.db.prepare(sql).run(...params, jobId, ...from);
    return res.changes === 1;
  }

  claimTeardown(jobId: string): string | null {
    const claim = this.db.transaction((id: string): string | null => {
      const row = this.db
        .prepare<[string], Pick<JobRow, 'sandbox_ref'>>('SELECT sandbox_ref FROM jobs WHERE job_id = ?')
        .get(id);
      if (!row?.sandbox_ref) {
        return null;
      }
      const res = this.db
        .prepare('UPDATE jobs SET sandbox_ref = NULL, updated_at = ? WHERE job_id = ? AND sandbox_ref = ?')
        .run(new Date().toISOString(), id, row.sandbox_ref);
      return res.changes === 1 ? row.sandbox_ref : null;
    });
    return claim(jobId);
  }

  recordEventSeq(jobId: string, seq: number): boolean {
    const res = this.db
      .prepare('UPDATE jobs SET last_event_seq = ? WHERE job_id = ? AND last_event_seq < ?')
      .run(seq, jobId, seq);
    return res.changes === 1;
  }

  extendExpiry(jobId: string, expiresAt: string): boolean {
    const res = this.db
      .prepare(`UPDATE jobs SET expires_at = ? WHERE job_id = ? AND status NOT IN (${placeholders(TERMINAL_STATUSES)})`)
      .run(expiresAt, jobId, ...TERMINAL_STATUSES);
    return res.changes === 1;
  }

  listActive(): JobRecord[] {
    const rows = this.db
      .prepare<JobStatus[], JobRow>(
        `SELECT * FROM jobs WHERE status NOT IN (${placeholders(TERMINAL_STATUSES)}) ORDER BY created_at`,
      )
      .all(...TERMINAL_STATUSES);
    return rows.map(rowToRecord);
  }

  purgeFinishedBefore(cutoff: string): number {
    const res = this.db
      .prepare(`DELETE FROM jobs WHERE status IN (${placeholders(TERMINAL_STATUSES)}) AND updated_at < ?`)
      .run(...TERMINAL_STATUSES, cutoff);
    return res.changes;
  }

  close(): void {
    this.db.close();
  }
}
