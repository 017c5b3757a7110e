import { UnknownWorkerError } from './errors';
import { AckResult, ExtendResult, NackResult, Queue } from './Queue';
import { ExecutionOutcome, Job } from './types';
import { WorkerCoordinator } from './WorkerCoordinator';

export type HeartbeatAck = { ok: true } | { ok: false; error: UnknownWorkerError };

/**
 * The worker protocol. Workers talk to the queue only through this, either
 * in-process (`LocalTransport`) or over HTTP (`RemoteWorkerClient`).
 */
export interface WorkerTransport<T = unknown> {
  register(workerId: string): Promise<void>;
  heartbeat(workerId: string): Promise<HeartbeatAck>;
  /** Throws UnknownWorkerError when the worker is not registered or dead. */
  claim(workerId: string, leaseMs: number): Promise<Job<T> | null>;
  ack(jobId: string, workerId: string, result?: unknown): Promise<AckResult<T>>;
  nack(
    jobId: string,
    workerId: string,
    error: string,
    outcome?: Exclude<ExecutionOutcome, 'success'>
  ): Promise<NackResult<T>>;
  extendLease(jobId: string, workerId: string, leaseMs: number): Promise<ExtendResult<T>>;
  deregister(workerId: string): Promise<void>;
}

export class LocalTransport<T = unknown> implements WorkerTransport<T> {
  constructor(
    private readonly queue: Queue<T>,
    private readonly coordinator: WorkerCoordinator<T>
  ) {}

  async register(workerId: string): Promise<void> {
    this.coordinator.register(workerId);
  }

  async heartbeat(workerId: string): Promise<HeartbeatAck> {
    const result = this.coordinator.heartbeat(workerId);
    return result.ok ? { ok: true } : result;
  }

  async claim(workerId: string, leaseMs: number): Promise<Job<T> | null> {
    const result = this.coordinator.claim(workerId, leaseMs);
    if (!result.ok) throw result.error;
    return result.job;
  }

  async ack(jobId: string, workerId: string, result?: unknown): Promise<AckResult<T>> {
    const outcome = this.queue.ack(jobId, workerId, result);
    this.coordinator.markIdle(workerId);
    return outcome;
  }

  async nack(
    jobId: string,
    workerId: string,
    error: string,
    outcome: Exclude<ExecutionOutcome, 'success'> = 'failure'
  ): Promise<NackResult<T>> {
    const result = this.queue.nack(jobId, workerId, error, outcome);
    this.coordinator.markIdle(workerId);
    return result;
  }

  async extendLease(jobId: string, workerId: string, leaseMs: number): Promise<ExtendResult<T>> {
    return this.queue.extendLease(jobId, workerId, leaseMs);
  }

  async deregister(workerId: string): Promise<void> {
    this.coordinator.deregister(workerId);
  }
}
