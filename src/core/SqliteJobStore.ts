import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import Database from 'better-sqlite3';
import { createLogger } from '../lib/logger';
import { JobFilter, JobStore, RecordFilter, TransitionGuard } from './JobStore';
import {
  ExecutionOutcome,
  ExecutionRecord,
  Job,
  JOB_STATES,
  JobState,
  WorkerInfo,
  WorkerStatus
} from './types';

interface JobRow {
  id: string;
  payload_json: string;
  state: string;
  attempts: number;
  max_attempts: number;
  enqueued_at: number;
  available_at: number;
  updated_at: number;
  lease_worker_id: string | null;
  lease_claimed_at: number | null;
  lease_expires_at: number | null;
  last_error: string | null;
}

interface RecordRow {
  job_id: string;
  attempt: number;
  worker_id: string;
  started_at: number;
  finished_at: number;
  outcome: string;
  result_json: string | null;
  error: string | null;
}

interface WorkerRow {
  id: string;
  status: string;
  registered_at: number;
  last_heartbeat_at: number;
}

type SqlParams = Record<string, string | number | null>;

const log = createLogger('store');

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS jobs (
    id TEXT PRIMARY KEY,
    payload_json TEXT NOT NULL,
    state TEXT NOT NULL,
    attempts INTEGER NOT NULL DEFAULT 0,
    max_attempts INTEGER NOT NULL,
    enqueued_at INTEGER NOT NULL,
    available_at INTEGER NOT NULL,
    updated_at INTEGER NOT NULL,
    lease_worker_id TEXT,
    lease_claimed_at INTEGER,
    lease_expires_at INTEGER,
    last_error TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_jobs_state_available ON jobs (state, available_at);
  CREATE INDEX IF NOT EXISTS idx_jobs_lease ON jobs (state, lease_expires_at);
  CREATE INDEX IF NOT EXISTS idx_jobs_enqueued ON jobs (enqueued_at);

  CREATE TABLE IF NOT EXISTS execution_records (
    job_id TEXT NOT NULL,
    attempt INTEGER NOT NULL,
    worker_id TEXT NOT NULL,
    started_at INTEGER NOT NULL,
    finished_at INTEGER NOT NULL,
    outcome TEXT NOT NULL,
    result_json TEXT,
    error TEXT,
    PRIMARY KEY (job_id, attempt)
  );

  CREATE INDEX IF NOT EXISTS idx_records_finished ON execution_records (finished_at);

  CREATE TABLE IF NOT EXISTS workers (
    id TEXT PRIMARY KEY,
    status TEXT NOT NULL,
    registered_at INTEGER NOT NULL,
    last_heartbeat_at INTEGER NOT NULL
  );
`;

function isJobState(value: string): value is JobState {
  return JOB_STATES.some((state) => state === value);
}

function parseState(value: string): JobState {
  if (!isJobState(value)) {
    throw new Error(`Unknown job state in store: ${value}`);
  }
  return value;
}

function parseOutcome(value: string): ExecutionOutcome {
  if (value === 'success' || value === 'failure' || value === 'timeout') return value;
  throw new Error(`Unknown execution outcome in store: ${value}`);
}

function parseWorkerStatus(value: string): WorkerStatus {
  if (value === 'idle' || value === 'busy' || value === 'dead') return value;
  throw new Error(`Unknown worker status in store: ${value}`);
}

function rowToJob<T>(row: JobRow): Job<T> {
  const payload: T = JSON.parse(row.payload_json);
  const job: Job<T> = {
    id: row.id,
    payload,
    state: parseState(row.state),
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    enqueuedAt: row.enqueued_at,
    availableAt: row.available_at,
    updatedAt: row.updated_at,
  };
  if (row.lease_worker_id !== null && row.lease_claimed_at !== null && row.lease_expires_at !== null) {
    job.lease = {
      jobId: row.id,
      workerId: row.lease_worker_id,
      claimedAt: row.lease_claimed_at,
      expiresAt: row.lease_expires_at,
    };
  }
  if (row.last_error !== null) {
    job.lastError = row.last_error;
  }
  return job;
}

function jobToParams<T>(job: Job<T>): SqlParams {
  return {
    id: job.id,
    payload_json: JSON.stringify(job.payload ?? null),
    state: job.state,
    attempts: job.attempts,
    max_attempts: job.maxAttempts,
    enqueued_at: job.enqueuedAt,
    available_at: job.availableAt,
    updated_at: job.updatedAt,
    lease_worker_id: job.lease?.workerId ?? null,
    lease_claimed_at: job.lease?.claimedAt ?? null,
    lease_expires_at: job.lease?.expiresAt ?? null,
    last_error: job.lastError ?? null,
  };
}

function rowToRecord(row: RecordRow): ExecutionRecord {
  const record: ExecutionRecord = {
    jobId: row.job_id,
    attempt: row.attempt,
    workerId: row.worker_id,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    outcome: parseOutcome(row.outcome),
  };
  if (row.result_json !== null) record.result = JSON.parse(row.result_json);
  if (row.error !== null) record.error = row.error;
  return record;
}

function rowToWorker(row: WorkerRow): WorkerInfo {
  return {
    id: row.id,
    status: parseWorkerStatus(row.status),
    registeredAt: row.registered_at,
    lastHeartbeatAt: row.last_heartbeat_at,
  };
}

function prepareStatements(db: Database.Database) {
  return {
    upsertJob: db.prepare<SqlParams>(`
      INSERT INTO jobs (id, payload_json, state, attempts, max_attempts, enqueued_at, available_at,
                        updated_at, lease_worker_id, lease_claimed_at, lease_expires_at, last_error)
      VALUES (@id, @payload_json, @state, @attempts, @max_attempts, @enqueued_at, @available_at,
              @updated_at, @lease_worker_id, @lease_claimed_at, @lease_expires_at, @last_error)
      ON CONFLICT (id) DO UPDATE SET
        payload_json = excluded.payload_json,
        state = excluded.state,
        attempts = excluded.attempts,
        max_attempts = excluded.max_attempts,
        available_at = excluded.available_at,
        updated_at = excluded.updated_at,
        lease_worker_id = excluded.lease_worker_id,
        lease_claimed_at = excluded.lease_claimed_at,
        lease_expires_at = excluded.lease_expires_at,
        last_error = excluded.last_error
    `),
    loadJob: db.prepare<[string], JobRow>('SELECT * FROM jobs WHERE id = ?'),
    countByState: db.prepare<[], { state: string; count: number }>(
      'SELECT state, COUNT(*) AS count FROM jobs GROUP BY state'
    ),
    // Single statement: the sub-select and the state check run under the same write lock.
    claimNext: db.prepare<SqlParams, JobRow>(`
      UPDATE jobs
         SET state = 'active',
             lease_worker_id = @worker_id,
             lease_claimed_at = @now,
             lease_expires_at = @expires_at,
             updated_at = @now
       WHERE id = (
               SELECT id FROM jobs
                WHERE state = 'waiting' AND available_at <= @now
                ORDER BY available_at ASC, enqueued_at ASC, rowid ASC
                LIMIT 1
             )
         AND state = 'waiting'
      RETURNING *
    `),
    promoteDue: db.prepare<SqlParams, { id: string }>(`
      UPDATE jobs SET state = 'waiting', updated_at = @now
       WHERE state = 'delayed' AND available_at <= @now
      RETURNING id
    `),
    transition: db.prepare<SqlParams, JobRow>(`
      UPDATE jobs
         SET state = @state,
             attempts = @attempts,
             available_at = @available_at,
             updated_at = @updated_at,
             lease_worker_id = @lease_worker_id,
             lease_claimed_at = @lease_claimed_at,
             lease_expires_at = @lease_expires_at,
             last_error = @last_error
       WHERE id = @id
         AND state = @guard_state
         AND (@guard_worker_id IS NULL OR lease_worker_id = @guard_worker_id)
      RETURNING *
    `),
    expiredLeases: db.prepare<[number], JobRow>(
      "SELECT * FROM jobs WHERE state = 'active' AND lease_expires_at <= ? ORDER BY lease_expires_at ASC"
    ),
    activeByWorker: db.prepare<[string], JobRow>(
      "SELECT * FROM jobs WHERE state = 'active' AND lease_worker_id = ?"
    ),
    insertRecord: db.prepare<SqlParams>(`
      INSERT INTO execution_records (job_id, attempt, worker_id, started_at, finished_at, outcome, result_json, error)
      VALUES (@job_id, @attempt, @worker_id, @started_at, @finished_at, @outcome, @result_json, @error)
    `),
    deleteFinishedRecords: db.prepare<[number]>(`
      DELETE FROM execution_records WHERE job_id IN (
        SELECT id FROM jobs WHERE state IN ('completed', 'failed') AND updated_at < ?
      )
    `),
    deleteFinishedJobs: db.prepare<[number]>(
      "DELETE FROM jobs WHERE state IN ('completed', 'failed') AND updated_at < ?"
    ),
    upsertWorker: db.prepare<SqlParams>(`
      INSERT INTO workers (id, status, registered_at, last_heartbeat_at)
      VALUES (@id, @status, @registered_at, @last_heartbeat_at)
      ON CONFLICT (id) DO UPDATE SET
        status = excluded.status,
        registered_at = excluded.registered_at,
        last_heartbeat_at = excluded.last_heartbeat_at
    `),
    loadWorker: db.prepare<[string], WorkerRow>('SELECT * FROM workers WHERE id = ?'),
    listWorkers: db.prepare<[], WorkerRow>('SELECT * FROM workers ORDER BY registered_at ASC, id ASC'),
    deleteWorker: db.prepare<[string]>('DELETE FROM workers WHERE id = ?'),
    ping: db.prepare<[], { ok: number }>('SELECT 1 AS ok'),
  };
}

export interface SqliteJobStoreOptions {
  /** Database file, or ':memory:' (the default) for a throwaway store */
  path?: string;
  busyTimeoutMs?: number;
}

/**
 * JobStore backed by a single SQLite database.
 * Several processes may share the same file; SQLite's write lock makes
 * every conditional update atomic across them.
 */
export class SqliteJobStore implements JobStore {
  readonly path: string;
  private readonly db: Database.Database;
  private readonly statements: ReturnType<typeof prepareStatements>;

  constructor(options: SqliteJobStoreOptions = {}) {
    this.path = options.path ?? ':memory:';
    if (this.path !== ':memory:') {
      mkdirSync(dirname(resolve(this.path)), { recursive: true });
    }

    this.db = new Database(this.path);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma(`busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
    this.db.exec(SCHEMA);
    this.statements = prepareStatements(this.db);
  }

  persistJob<T>(job: Job<T>): void {
    this.statements.upsertJob.run(jobToParams(job));
  }

  loadJob<T = unknown>(id: string): Job<T> | undefined {
    const row = this.statements.loadJob.get(id);
    return row ? rowToJob<T>(row) : undefined;
  }

  listJobs(filter: JobFilter = {}): Job[] {
    const conditions: string[] = [];
    const params: SqlParams = { limit: filter.limit ?? -1 };

    if (filter.state) {
      conditions.push('state = @state');
      params.state = filter.state;
    }
    if (filter.from !== undefined) {
      conditions.push('enqueued_at >= @from');
      params.from = filter.from;
    }
    if (filter.to !== undefined) {
      conditions.push('enqueued_at < @to');
      params.to = filter.to;
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<SqlParams, JobRow>(`SELECT * FROM jobs ${where} ORDER BY enqueued_at ASC, rowid ASC LIMIT @limit`)
      .all(params);
    return rows.map((row) => rowToJob(row));
  }

  countByState(): Record<JobState, number> {
    const counts: Record<JobState, number> = { waiting: 0, active: 0, completed: 0, failed: 0, delayed: 0 };
    for (const row of this.statements.countByState.all()) {
      counts[parseState(row.state)] = row.count;
    }
    return counts;
  }

  claimNext<T = unknown>(workerId: string, now: number, leaseExpiresAt: number): Job<T> | undefined {
    const row = this.statements.claimNext.get({ worker_id: workerId, expires_at: leaseExpiresAt, now });
    return row ? rowToJob<T>(row) : undefined;
  }

  promoteDue(now: number): string[] {
    return this.statements.promoteDue.all({ now }).map((row) => row.id);
  }

  transition<T>(next: Job<T>, guard: TransitionGuard): Job<T> | undefined {
    const params = jobToParams(next);
    const row = this.statements.transition.get({
      id: params.id,
      state: params.state,
      attempts: params.attempts,
      available_at: params.available_at,
      updated_at: params.updated_at,
      lease_worker_id: params.lease_worker_id,
      lease_claimed_at: params.lease_claimed_at,
      lease_expires_at: params.lease_expires_at,
      last_error: params.last_error,
      guard_state: guard.state,
      guard_worker_id: guard.workerId ?? null,
    });
    return row ? rowToJob<T>(row) : undefined;
  }

  listExpiredLeases<T = unknown>(now: number): Job<T>[] {
    return this.statements.expiredLeases.all(now).map((row) => rowToJob<T>(row));
  }

  listActiveByWorker<T = unknown>(workerId: string): Job<T>[] {
    return this.statements.activeByWorker.all(workerId).map((row) => rowToJob<T>(row));
  }

  appendRecord(record: ExecutionRecord): void {
    this.statements.insertRecord.run({
      job_id: record.jobId,
      attempt: record.attempt,
      worker_id: record.workerId,
      started_at: record.startedAt,
      finished_at: record.finishedAt,
      outcome: record.outcome,
      result_json: record.result === undefined ? null : JSON.stringify(record.result),
      error: record.error ?? null,
    });
  }

  listRecords(filter: RecordFilter = {}): ExecutionRecord[] {
    const conditions: string[] = [];
    const params: SqlParams = { limit: filter.limit ?? -1 };

    if (filter.jobId) {
      conditions.push('job_id = @job_id');
      params.job_id = filter.jobId;
    }
    if (filter.from !== undefined) {
      conditions.push('finished_at >= @from');
      params.from = filter.from;
    }
    if (filter.to !== undefined) {
      conditions.push('finished_at < @to');
      params.to = filter.to;
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const rows = this.db
      .prepare<SqlParams, RecordRow>(
        `SELECT * FROM execution_records ${where} ORDER BY finished_at DESC, attempt DESC LIMIT @limit`
      )
      .all(params);
    return rows.map(rowToRecord);
  }

  deleteFinishedBefore(cutoff: number): number {
    return this.transaction(() => {
      this.statements.deleteFinishedRecords.run(cutoff);
      return this.statements.deleteFinishedJobs.run(cutoff).changes;
    });
  }

  saveWorker(worker: WorkerInfo): void {
    this.statements.upsertWorker.run({
      id: worker.id,
      status: worker.status,
      registered_at: worker.registeredAt,
      last_heartbeat_at: worker.lastHeartbeatAt,
    });
  }

  loadWorker(id: string): WorkerInfo | undefined {
    const row = this.statements.loadWorker.get(id);
    return row ? rowToWorker(row) : undefined;
  }

  listWorkers(): WorkerInfo[] {
    return this.statements.listWorkers.all().map(rowToWorker);
  }

  deleteWorker(id: string): boolean {
    return this.statements.deleteWorker.run(id).changes > 0;
  }

  transaction<R>(fn: () => R): R {
    return this.db.transaction(fn).immediate();
  }

  ping(): boolean {
    try {
      return this.statements.ping.get()?.ok === 1;
    } catch (error) {
      log.error('Ping failed:', error);
      return false;
    }
  }

  close(): void {
    this.db.close();
  }
}
