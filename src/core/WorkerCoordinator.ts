import { EventEmitter } from 'eventemitter3';
import { UnknownWorkerError, ValidationError } from './errors';
import { JobStore } from './JobStore';
import { Queue } from './Queue';
import { createLogger, Logger } from '../lib/logger';
import { CoordinatorOptions, Job, WorkerInfo } from './types';

export type HeartbeatResult = { ok: true; worker: WorkerInfo } | { ok: false; error: UnknownWorkerError };

export type CoordinatedClaim<T> = { ok: true; job: Job<T> | null } | { ok: false; error: UnknownWorkerError };

export interface CoordinatorEvents<T> {
  'worker:registered': (worker: WorkerInfo) => void;
  'worker:dead': (worker: WorkerInfo, revoked: Job<T>[]) => void;
  'worker:deregistered': (workerId: string) => void;
}

/**
 * Tracks worker liveness. Each worker is a small state machine
 * (idle <-> busy, either -> dead) driven by heartbeats and a periodic check;
 * a worker that goes quiet for longer than the liveness window is marked dead
 * and its leases are revoked right away instead of waiting for them to expire.
 */
export class WorkerCoordinator<T = unknown> extends EventEmitter<CoordinatorEvents<T>> {
  private readonly livenessWindowMs: number;
  private readonly now: () => number;
  private checkTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly store: JobStore,
    private readonly queue: Queue<T>,
    private readonly options: CoordinatorOptions,
    private readonly log: Logger = createLogger('coordinator')
  ) {
    super();
    this.livenessWindowMs = options.heartbeatIntervalMs * (options.livenessFactor ?? 3);
    this.now = options.now ?? Date.now;

    // A reclaimed job never sees an ack or nack from its holder.
    queue.on('job:reclaimed', (_job, _reason, workerId) => {
      if (this.store.listActiveByWorker(workerId).length === 0) {
        this.markIdle(workerId);
      }
    });
  }

  register(workerId: string): WorkerInfo {
    if (!workerId || workerId.trim() === '') {
      throw new ValidationError('workerId is required');
    }

    const now = this.now();
    const existing = this.store.loadWorker(workerId);
    const worker: WorkerInfo = {
      id: workerId,
      status: 'idle',
      registeredAt: existing && existing.status !== 'dead' ? existing.registeredAt : now,
      lastHeartbeatAt: now,
    };

    this.store.saveWorker(worker);
    this.log.info(`Worker ${workerId} ${existing?.status === 'dead' ? 're-registered' : 'registered'}`);
    this.emit('worker:registered', worker);
    return worker;
  }

  heartbeat(workerId: string): HeartbeatResult {
    const worker = this.liveWorker(workerId);
    if (!worker) return { ok: false, error: new UnknownWorkerError(workerId) };

    const updated: WorkerInfo = { ...worker, lastHeartbeatAt: this.now() };
    this.store.saveWorker(updated);
    return { ok: true, worker: updated };
  }

  /**
   * Claim on behalf of a registered worker. A claim counts as a sign of life.
   */
  claim(workerId: string, leaseMs?: number): CoordinatedClaim<T> {
    const worker = this.liveWorker(workerId);
    if (!worker) return { ok: false, error: new UnknownWorkerError(workerId) };

    const job = this.queue.claim(workerId, leaseMs);
    this.store.saveWorker({ ...worker, status: job ? 'busy' : 'idle', lastHeartbeatAt: this.now() });
    return { ok: true, job };
  }

  markIdle(workerId: string) {
    const worker = this.liveWorker(workerId);
    if (worker && worker.status !== 'idle') {
      this.store.saveWorker({ ...worker, status: 'idle' });
    }
  }

  deregister(workerId: string): boolean {
    const removed = this.store.deleteWorker(workerId);
    if (removed) {
      this.log.info(`Worker ${workerId} deregistered`);
      this.emit('worker:deregistered', workerId);
    }
    return removed;
  }

  listLiveWorkers(): Set<string> {
    return new Set(
      this.store
        .listWorkers()
        .filter((worker) => worker.status !== 'dead')
        .map((worker) => worker.id)
    );
  }

  listWorkers(): WorkerInfo[] {
    return this.store.listWorkers();
  }

  /**
   * Marks workers silent for longer than the liveness window as dead and
   * revokes their leases. Returns the ids marked dead in this pass.
   */
  checkLiveness(): string[] {
    const now = this.now();
    const dead: string[] = [];

    for (const worker of this.store.listWorkers()) {
      if (worker.status === 'dead' || now - worker.lastHeartbeatAt <= this.livenessWindowMs) continue;

      const marked: WorkerInfo = { ...worker, status: 'dead' };
      this.store.saveWorker(marked);
      const revoked = this.queue.revokeLeases(worker.id);

      this.log.warn(
        `Worker ${worker.id} missed heartbeats for ${now - worker.lastHeartbeatAt}ms; marked dead, revoked ${revoked.length} leases`
      );
      this.emit('worker:dead', marked, revoked);
      dead.push(worker.id);
    }

    return dead;
  }

  start() {
    if (this.checkTimer) return;
    this.checkTimer = setInterval(() => {
      try {
        this.checkLiveness();
      } catch (error) {
        this.log.error('Liveness check failed:', error);
      }
    }, this.options.checkIntervalMs ?? this.options.heartbeatIntervalMs);
  }

  shutdown() {
    if (this.checkTimer) {
      clearInterval(this.checkTimer);
      this.checkTimer = null;
    }
  }

  isRunning(): boolean {
    return this.checkTimer !== null;
  }

  private liveWorker(workerId: string): WorkerInfo | undefined {
    const worker = this.store.loadWorker(workerId);
    return worker && worker.status !== 'dead' ? worker : undefined;
  }
}
