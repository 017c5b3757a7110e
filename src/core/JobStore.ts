import { ExecutionRecord, Job, JobState, WorkerInfo } from './types';

export interface JobFilter {
  state?: JobState;
  /** Inclusive lower bound on enqueuedAt */
  from?: number;
  /** Exclusive upper bound on enqueuedAt */
  to?: number;
  limit?: number;
}

export interface RecordFilter {
  jobId?: string;
  /** Inclusive lower bound on finishedAt */
  from?: number;
  /** Exclusive upper bound on finishedAt */
  to?: number;
  limit?: number;
}

/**
 * Precondition for a conditional update. The write only happens while the
 * stored row is still in `state` (and, when given, leased by `workerId`).
 */
export interface TransitionGuard {
  state: JobState;
  workerId?: string;
}

/**
 * Durable source of truth for jobs, execution history and workers.
 *
 * Every mutating primitive is a single statement or runs inside
 * `transaction`, so two callers racing for the same row can never both win.
 */
export interface JobStore {
  persistJob<T>(job: Job<T>): void;
  loadJob<T = unknown>(id: string): Job<T> | undefined;
  listJobs(filter?: JobFilter): Job[];
  countByState(): Record<JobState, number>;

  /**
   * Atomically leases the oldest waiting job to `workerId`.
   */
  claimNext<T = unknown>(workerId: string, now: number, leaseExpiresAt: number): Job<T> | undefined;

  /** Moves due delayed jobs to waiting; returns the ids that moved. */
  promoteDue(now: number): string[];

  /**
   * Writes `next` only if the stored row still satisfies `guard`.
   * Returns the stored job, or undefined if the guard no longer holds.
   */
  transition<T>(next: Job<T>, guard: TransitionGuard): Job<T> | undefined;

  listExpiredLeases<T = unknown>(now: number): Job<T>[];
  listActiveByWorker<T = unknown>(workerId: string): Job<T>[];

  /** Throws if a record for the same (jobId, attempt) already exists. */
  appendRecord(record: ExecutionRecord): void;
  listRecords(filter?: RecordFilter): ExecutionRecord[];

  /** Removes completed/failed jobs last updated before `cutoff`, with their records. */
  deleteFinishedBefore(cutoff: number): number;

  saveWorker(worker: WorkerInfo): void;
  loadWorker(id: string): WorkerInfo | undefined;
  listWorkers(): WorkerInfo[];
  deleteWorker(id: string): boolean;

  /** Runs `fn` while holding the store's write lock. */
  transaction<R>(fn: () => R): R;
  ping(): boolean;
  close(): void;
}
