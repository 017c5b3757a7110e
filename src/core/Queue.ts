import { EventEmitter } from 'eventemitter3';
import { v4 as uuid } from 'uuid';
import { computeBackoff } from './backoff';
import {
  InvalidStateError,
  JobNotFoundError,
  LeaseError,
  LeaseExpiredError,
  NotOwnerError,
  TerminalFailureError,
  ValidationError
} from './errors';
import { JobStore } from './JobStore';
import { createLogger, Logger } from '../lib/logger';
import {
  BackoffOptions,
  EnqueueOptions,
  ExecutionOutcome,
  ExecutionRecord,
  Job,
  QueueOptions
} from './types';

export type AckResult<T = unknown> =
  | { ok: true; job: Job<T>; record: ExecutionRecord }
  | { ok: false; error: LeaseError };

export type NackDecision<T = unknown> =
  | { kind: 'retry'; job: Job<T>; delayMs: number }
  | { kind: 'failed'; job: Job<T>; error: TerminalFailureError };

export type NackResult<T = unknown> =
  | { ok: true; decision: NackDecision<T>; record: ExecutionRecord }
  | { ok: false; error: LeaseError };

export type ExtendResult<T = unknown> =
  | { ok: true; job: Job<T> }
  | { ok: false; error: LeaseError };

export interface QueueEvents<T> {
  'job:queued': (job: Job<T>) => void;
  'job:promoted': (jobId: string) => void;
  'job:claimed': (job: Job<T>) => void;
  'job:completed': (job: Job<T>, record: ExecutionRecord) => void;
  'job:retrying': (job: Job<T>, delayMs: number) => void;
  'job:failed': (job: Job<T>, error: TerminalFailureError) => void;
  'job:reclaimed': (job: Job<T>, reason: string, previousWorkerId: string) => void;
  'queue:started': () => void;
  'queue:shutdown': () => void;
}

export const DEFAULT_BACKOFF: BackoffOptions = { baseMs: 1000, maxMs: 60_000 };

type LeaseCheck<T> = { ok: true; job: Job<T> } | { ok: false; error: LeaseError };

export class Queue<T = unknown> extends EventEmitter<QueueEvents<T>> {
  private readonly defaultMaxAttempts: number;
  private readonly defaultLeaseMs: number;
  private readonly backoff: BackoffOptions;
  private readonly now: () => number;
  private readonly random: () => number;
  private timers: NodeJS.Timeout[] = [];
  private running = false;

  constructor(
    private readonly store: JobStore,
    private readonly options: QueueOptions = {},
    private readonly log: Logger = createLogger('queue')
  ) {
    super();
    this.defaultMaxAttempts = options.defaultMaxAttempts ?? 3;
    this.defaultLeaseMs = options.defaultLeaseMs ?? 30_000;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF;
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
  }

  enqueue(payload: T, options: EnqueueOptions = {}): Job<T> {
    const maxAttempts = options.maxAttempts ?? this.defaultMaxAttempts;
    const delayMs = options.delayMs ?? 0;

    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ValidationError('maxAttempts must be a positive integer');
    }
    if (!Number.isFinite(delayMs) || delayMs < 0) {
      throw new ValidationError('delayMs must be a non-negative number');
    }

    const now = this.now();
    const job: Job<T> = {
      id: uuid(),
      payload,
      state: delayMs > 0 ? 'delayed' : 'waiting',
      attempts: 0,
      maxAttempts,
      enqueuedAt: now,
      availableAt: now + delayMs,
      updatedAt: now,
    };

    this.store.persistJob(job);
    this.log.debug(`Job ${job.id} queued (${job.state}, maxAttempts=${maxAttempts})`);
    this.emit('job:queued', job);
    return job;
  }

  /**
   * Leases the oldest eligible job to `workerId`, or returns null when none is
   * eligible. Due delayed jobs are promoted in the same transaction.
   */
  claim(workerId: string, leaseMs: number = this.defaultLeaseMs): Job<T> | null {
    if (!Number.isFinite(leaseMs) || leaseMs <= 0) {
      throw new ValidationError('leaseMs must be a positive number');
    }

    const now = this.now();
    const { promoted, job } = this.store.transaction(() => ({
      promoted: this.store.promoteDue(now),
      job: this.store.claimNext<T>(workerId, now, now + leaseMs),
    }));

    promoted.forEach((id) => this.emit('job:promoted', id));
    if (!job) return null;

    this.log.debug(`Job ${job.id} leased to ${workerId} until ${job.lease?.expiresAt}`);
    this.emit('job:claimed', job);
    return job;
  }

  ack(jobId: string, workerId: string, result?: unknown): AckResult<T> {
    const now = this.now();
    const outcome = this.store.transaction((): AckResult<T> => {
      const check = this.checkLease(jobId, workerId, now);
      if (!check.ok) return check;

      const { job } = check;
      const attempts = job.attempts + 1;
      const stored = this.store.transition<T>(
        { ...job, state: 'completed', attempts, lease: undefined, updatedAt: now },
        { state: 'active', workerId }
      );
      if (!stored) return { ok: false, error: new NotOwnerError(jobId, workerId) };

      const record: ExecutionRecord = {
        jobId,
        attempt: attempts,
        workerId,
        startedAt: job.lease?.claimedAt ?? now,
        finishedAt: now,
        outcome: 'success',
        result,
      };
      this.store.appendRecord(record);
      return { ok: true, job: stored, record };
    });

    if (!outcome.ok) {
      this.log.warn(`Ack for job ${jobId} from ${workerId} rejected: ${outcome.error.message}`);
      return outcome;
    }

    this.log.debug(`Job ${jobId} completed by ${workerId}`);
    this.emit('job:completed', outcome.job, outcome.record);
    return outcome;
  }

  /**
   * Reports a failed attempt. The attempt is consumed; the job is either
   * delayed by the backoff policy or, once attempts are exhausted, failed.
   */
  nack(jobId: string, workerId: string, error: string, outcome: Exclude<ExecutionOutcome, 'success'> = 'failure'): NackResult<T> {
    const now = this.now();
    const result = this.store.transaction((): NackResult<T> => {
      const check = this.checkLease(jobId, workerId, now);
      if (!check.ok) return check;

      const { job } = check;
      const record: ExecutionRecord = {
        jobId,
        attempt: job.attempts + 1,
        workerId,
        startedAt: job.lease?.claimedAt ?? now,
        finishedAt: now,
        outcome,
        error,
      };

      const decision = this.decideAfterFailure(job, error, now);
      if (!this.store.transition<T>(decision.job, { state: 'active', workerId })) {
        return { ok: false, error: new NotOwnerError(jobId, workerId) };
      }
      this.store.appendRecord(record);
      return { ok: true, decision, record };
    });

    if (!result.ok) {
      this.log.warn(`Nack for job ${jobId} from ${workerId} rejected: ${result.error.message}`);
      return result;
    }

    this.announce(result.decision);
    return result;
  }

  extendLease(jobId: string, workerId: string, leaseMs: number = this.defaultLeaseMs): ExtendResult<T> {
    const now = this.now();
    return this.store.transaction((): ExtendResult<T> => {
      const check = this.checkLease(jobId, workerId, now);
      if (!check.ok) return check;

      const { job } = check;
      const claimedAt = job.lease?.claimedAt ?? now;
      const stored = this.store.transition<T>(
        { ...job, lease: { jobId, workerId, claimedAt, expiresAt: now + leaseMs }, updatedAt: now },
        { state: 'active', workerId }
      );
      return stored ? { ok: true, job: stored } : { ok: false, error: new NotOwnerError(jobId, workerId) };
    });
  }

  /** Sweep: delayed jobs whose delay has elapsed become waiting. */
  promoteDelayed(): string[] {
    const promoted = this.store.promoteDue(this.now());
    promoted.forEach((id) => this.emit('job:promoted', id));
    if (promoted.length > 0) {
      this.log.debug(`Promoted ${promoted.length} delayed jobs`);
    }
    return promoted;
  }

  /** Reaper: reclaims every active job whose lease has expired. */
  reapExpired(): Job<T>[] {
    const now = this.now();
    return this.reclaim(this.store.listExpiredLeases<T>(now), 'lease expired', now);
  }

  /** Reclaims all jobs leased to `workerId`, expired or not. */
  revokeLeases(workerId: string): Job<T>[] {
    const now = this.now();
    return this.reclaim(this.store.listActiveByWorker<T>(workerId), `worker ${workerId} lost`, now);
  }

  /**
   * Jobs left active by a previous process whose lease has lapsed are
   * returned to the queue (or failed, if that was their last attempt).
   */
  recover(): Job<T>[] {
    const recovered = this.reapExpired();
    if (recovered.length > 0) {
      this.log.info(`Recovered ${recovered.length} jobs from expired leases`);
    }
    return recovered;
  }

  /**
   * Manual re-enqueue of a failed job. The failed job stays as it is; a new
   * job with the same payload and attempt budget is created.
   */
  retry(jobId: string): Job<T> {
    const job = this.store.loadJob<T>(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    if (job.state !== 'failed') {
      throw new InvalidStateError(`Job ${jobId} is ${job.state}; only failed jobs can be retried`);
    }
    return this.enqueue(job.payload, { maxAttempts: job.maxAttempts });
  }

  getJob(jobId: string): Job<T> | undefined {
    return this.store.loadJob<T>(jobId);
  }

  cleanup(olderThanMs: number): number {
    const removed = this.store.deleteFinishedBefore(this.now() - olderThanMs);
    if (removed > 0) {
      this.log.info(`Cleaned up ${removed} finished jobs`);
    }
    return removed;
  }

  start() {
    if (this.running) return;
    this.running = true;
    this.recover();

    this.every(this.options.sweepIntervalMs ?? 1000, 'sweep', () => this.promoteDelayed());
    this.every(this.options.reaperIntervalMs ?? Math.floor(this.defaultLeaseMs / 3), 'reaper', () => this.reapExpired());

    const cleanupAfterMs = this.options.cleanupAfterMs ?? 0;
    if (cleanupAfterMs > 0) {
      this.every(this.options.cleanupIntervalMs ?? 60 * 60 * 1000, 'cleanup', () => this.cleanup(cleanupAfterMs));
    }

    this.emit('queue:started');
  }

  shutdown() {
    this.timers.forEach((timer) => clearInterval(timer));
    this.timers = [];
    this.running = false;
    this.emit('queue:shutdown');
  }

  isRunning(): boolean {
    return this.running;
  }

  private every(intervalMs: number, name: string, task: () => unknown) {
    this.timers.push(
      setInterval(() => {
        try {
          task();
        } catch (error) {
          this.log.error(`Periodic ${name} failed:`, error);
        }
      }, intervalMs)
    );
  }

  private checkLease(jobId: string, workerId: string, now: number): LeaseCheck<T> {
    const job = this.store.loadJob<T>(jobId);
    if (!job) throw new JobNotFoundError(jobId);

    const lease = job.lease;
    if (job.state !== 'active' || !lease || lease.workerId !== workerId) {
      return { ok: false, error: new NotOwnerError(jobId, workerId) };
    }
    if (lease.expiresAt <= now) {
      return { ok: false, error: new LeaseExpiredError(jobId, workerId) };
    }
    return { ok: true, job };
  }

  private decideAfterFailure(job: Job<T>, error: string, now: number): NackDecision<T> {
    const attempts = job.attempts + 1;
    const base = { ...job, attempts, lease: undefined, lastError: error, updatedAt: now };

    if (attempts >= job.maxAttempts) {
      return {
        kind: 'failed',
        job: { ...base, state: 'failed' },
        error: new TerminalFailureError(job.id, attempts, error),
      };
    }

    const delayMs = computeBackoff(attempts, this.backoff, this.random);
    return {
      kind: 'retry',
      job: { ...base, state: delayMs > 0 ? 'delayed' : 'waiting', availableAt: now + delayMs },
      delayMs,
    };
  }

  /**
   * Returns leased jobs to the queue without backoff. Each reclaim consumes
   * an attempt and leaves a timeout record for the lost execution.
   */
  private reclaim(candidates: Job<T>[], reason: string, now: number): Job<T>[] {
    const reclaimed: Job<T>[] = [];

    for (const candidate of candidates) {
      const lease = candidate.lease;
      if (!lease) continue;

      const outcome = this.store.transaction(() => {
        const attempts = candidate.attempts + 1;
        const terminal = attempts >= candidate.maxAttempts;
        const next: Job<T> = {
          ...candidate,
          state: terminal ? 'failed' : 'waiting',
          attempts,
          availableAt: terminal ? candidate.availableAt : now,
          lease: undefined,
          lastError: reason,
          updatedAt: now,
        };

        const stored = this.store.transition<T>(next, { state: 'active', workerId: lease.workerId });
        if (!stored) return undefined;

        this.store.appendRecord({
          jobId: candidate.id,
          attempt: attempts,
          workerId: lease.workerId,
          startedAt: lease.claimedAt,
          finishedAt: now,
          outcome: 'timeout',
          error: reason,
        });
        return stored;
      });

      if (!outcome) continue;

      reclaimed.push(outcome);
      this.log.warn(`Job ${outcome.id} reclaimed from ${lease.workerId} (${reason}), attempt ${outcome.attempts}/${outcome.maxAttempts}`);
      this.emit('job:reclaimed', outcome, reason, lease.workerId);
      if (outcome.state === 'failed') {
        this.emit('job:failed', outcome, new TerminalFailureError(outcome.id, outcome.attempts, reason));
      }
    }

    return reclaimed;
  }

  private announce(decision: NackDecision<T>) {
    if (decision.kind === 'retry') {
      this.log.info(`Job ${decision.job.id} will retry in ${decision.delayMs}ms (attempt ${decision.job.attempts}/${decision.job.maxAttempts})`);
      this.emit('job:retrying', decision.job, decision.delayMs);
    } else {
      this.log.warn(decision.error.message);
      this.emit('job:failed', decision.job, decision.error);
    }
  }
}
