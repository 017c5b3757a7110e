import { EventEmitter } from 'eventemitter3';
import { errorMessage, ExecutionTimeoutError } from './errors';
import { createLogger, Logger } from '../lib/logger';
import { ExecutionOutcome, ExecutionRecord, Job, JobHandler, SupervisorOptions } from './types';
import { WorkerTransport } from './WorkerTransport';

export type AttemptState = 'start' | 'running' | 'success' | 'failure' | 'timed_out';

export interface SupervisorEvents {
  'attempt:state': (jobId: string, state: AttemptState) => void;
}

type Settled =
  | { kind: 'success'; value: unknown }
  | { kind: 'failure'; error: unknown }
  | { kind: 'timeout' }
  | { kind: 'lease-lost'; reason: string };

interface Timer {
  promise: Promise<void>;
  cancel: () => void;
}

function delay(ms: number): Timer {
  let handle: NodeJS.Timeout | undefined;
  const promise = new Promise<void>((resolve) => {
    handle = setTimeout(resolve, ms);
  });
  return { promise, cancel: () => clearTimeout(handle) };
}

/**
 * Runs one attempt of a job under a deadline and reports the outcome back
 * through the transport.
 *
 * Cancellation is cooperative: on timeout the handler's signal is aborted and
 * the supervisor waits up to `graceMs` for it to settle. After that the
 * attempt is written off as timed out whether or not the handler has stopped.
 */
export class ExecutionSupervisor<T = unknown> extends EventEmitter<SupervisorEvents> {
  private readonly graceMs: number;
  private readonly now: () => number;

  constructor(
    private readonly transport: WorkerTransport<T>,
    private readonly options: SupervisorOptions,
    private readonly log: Logger = createLogger('supervisor')
  ) {
    super();
    this.graceMs = options.graceMs ?? 2000;
    this.now = options.now ?? Date.now;
  }

  async run(job: Job<T>, workerId: string, handler: JobHandler<T>): Promise<ExecutionRecord> {
    const startedAt = this.now();
    const attempt = job.attempts + 1;
    const controller = new AbortController();

    this.transition(job.id, 'start');

    let resolveLeaseLost: (settled: Settled) => void = () => undefined;
    const leaseLost = new Promise<Settled>((resolve) => {
      resolveLeaseLost = resolve;
    });
    const renewTimer = setInterval(() => {
      this.transport
        .extendLease(job.id, workerId, this.options.leaseMs)
        .then((result) => {
          if (!result.ok) resolveLeaseLost({ kind: 'lease-lost', reason: result.error.message });
        })
        .catch((error) => {
          this.log.warn(`Could not renew lease on job ${job.id}: ${errorMessage(error)}`);
        });
    }, Math.max(1, Math.floor(this.options.leaseMs / 3)));

    const deadline = delay(this.options.timeoutMs);

    this.transition(job.id, 'running');
    const execution: Promise<Settled> = Promise.resolve()
      .then(() => handler(job.payload, { signal: controller.signal, attempt, workerId }))
      .then(
        (value): Settled => ({ kind: 'success', value }),
        (error: unknown): Settled => ({ kind: 'failure', error })
      );

    const settled = await Promise.race([
      execution,
      deadline.promise.then((): Settled => ({ kind: 'timeout' })),
      leaseLost,
    ])
      .then(async (first) => {
        if (first.kind === 'timeout' || first.kind === 'lease-lost') {
          controller.abort(
            first.kind === 'timeout' ? new ExecutionTimeoutError(this.options.timeoutMs) : new Error(first.reason)
          );
          const grace = delay(this.graceMs);
          await Promise.race([execution, grace.promise]);
          grace.cancel();
        }
        return first;
      })
      .finally(() => {
        clearInterval(renewTimer);
        deadline.cancel();
      });

    switch (settled.kind) {
      case 'success': {
        this.transition(job.id, 'success');
        const result = await this.transport.ack(job.id, workerId, settled.value);
        if (result.ok) return result.record;
        this.log.warn(`Job ${job.id}: result from ${workerId} not credited (${result.error.message})`);
        return this.unrecorded(job, attempt, workerId, startedAt, 'success', undefined, settled.value);
      }
      case 'failure': {
        this.transition(job.id, 'failure');
        const message = errorMessage(settled.error);
        this.log.info(`Job ${job.id} attempt ${attempt} failed: ${message}`);
        return this.report(job, attempt, workerId, startedAt, 'failure', message);
      }
      case 'timeout': {
        this.transition(job.id, 'timed_out');
        const message = new ExecutionTimeoutError(this.options.timeoutMs).message;
        this.log.warn(`Job ${job.id} attempt ${attempt} timed out after ${this.options.timeoutMs}ms`);
        return this.report(job, attempt, workerId, startedAt, 'timeout', message);
      }
      case 'lease-lost': {
        this.transition(job.id, 'timed_out');
        this.log.warn(`Job ${job.id}: lease lost while running (${settled.reason}); abandoning attempt ${attempt}`);
        return this.unrecorded(job, attempt, workerId, startedAt, 'timeout', settled.reason);
      }
    }
  }

  private async report(
    job: Job<T>,
    attempt: number,
    workerId: string,
    startedAt: number,
    outcome: Exclude<ExecutionOutcome, 'success'>,
    message: string
  ): Promise<ExecutionRecord> {
    const result = await this.transport.nack(job.id, workerId, message, outcome);
    if (result.ok) return result.record;
    this.log.warn(`Job ${job.id}: failure from ${workerId} not credited (${result.error.message})`);
    return this.unrecorded(job, attempt, workerId, startedAt, outcome, message);
  }

  // Returned when the queue refused the outcome; never persisted.
  private unrecorded(
    job: Job<T>,
    attempt: number,
    workerId: string,
    startedAt: number,
    outcome: ExecutionOutcome,
    error?: string,
    result?: unknown
  ): ExecutionRecord {
    return { jobId: job.id, attempt, workerId, startedAt, finishedAt: this.now(), outcome, error, result };
  }

  private transition(jobId: string, state: AttemptState) {
    this.log.debug(`Job ${jobId} -> ${state}`);
    this.emit('attempt:state', jobId, state);
  }
}
