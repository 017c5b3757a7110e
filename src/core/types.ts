export type JobState = 'waiting' | 'active' | 'completed' | 'failed' | 'delayed';

export const JOB_STATES: readonly JobState[] = ['waiting', 'active', 'completed', 'failed', 'delayed'];

export type ExecutionOutcome = 'success' | 'failure' | 'timeout';

export type WorkerStatus = 'idle' | 'busy' | 'dead';

export interface Lease {
  jobId: string;
  workerId: string;
  claimedAt: number;
  expiresAt: number;
}

export interface Job<T = unknown> {
  id: string;
  payload: T;
  state: JobState;
  attempts: number;
  maxAttempts: number;
  enqueuedAt: number;
  availableAt: number;
  updatedAt: number;
  lease?: Lease;
  lastError?: string;
}

export interface ExecutionRecord {
  jobId: string;
  attempt: number;
  workerId: string;
  startedAt: number;
  finishedAt: number;
  outcome: ExecutionOutcome;
  result?: unknown;
  error?: string;
}

export interface WorkerInfo {
  id: string;
  status: WorkerStatus;
  registeredAt: number;
  lastHeartbeatAt: number;
}

export interface EnqueueOptions {
  maxAttempts?: number;
  delayMs?: number;
}

export interface BackoffOptions {
  baseMs: number;
  maxMs: number;
  jitter?: number; // fraction, default = 0.2
}

export interface QueueOptions {
  defaultMaxAttempts?: number;
  defaultLeaseMs?: number;
  backoff?: BackoffOptions;
  sweepIntervalMs?: number;
  reaperIntervalMs?: number;
  cleanupAfterMs?: number; // 0 disables
  cleanupIntervalMs?: number;
  now?: () => number;
  random?: () => number;
}

export interface CoordinatorOptions {
  heartbeatIntervalMs: number;
  livenessFactor?: number; // default = 3
  checkIntervalMs?: number;
  now?: () => number;
}

export interface SupervisorOptions {
  timeoutMs: number;
  graceMs?: number;
  leaseMs: number;
  now?: () => number;
}

export interface WorkerOptions {
  id: string;
  concurrency?: number; // default = 1
  leaseMs: number;
  pollIntervalMs?: number;
  heartbeatIntervalMs: number;
}

/**
 * Context handed to a job handler. The signal is aborted when the deadline
 * passes or the lease is lost; handlers are expected to stop soon after.
 */
export interface JobContext {
  signal: AbortSignal;
  attempt: number;
  workerId: string;
}

export type JobHandler<T = unknown, R = unknown> = (payload: T, context: JobContext) => Promise<R>;
