import { EventEmitter } from 'eventemitter3';
import { errorMessage, UnknownWorkerError } from './errors';
import { ExecutionSupervisor } from './ExecutionSupervisor';
import { createLogger, Logger } from '../lib/logger';
import { ExecutionRecord, Job, JobHandler, SupervisorOptions, WorkerOptions } from './types';
import { WorkerTransport } from './WorkerTransport';

export type WorkerState = 'stopped' | 'running' | 'draining';

export interface WorkerEvents<T> {
  'worker:started': (workerId: string) => void;
  'worker:draining': (workerId: string) => void;
  'worker:stopped': (workerId: string) => void;
  'job:started': (job: Job<T>, slotId: string) => void;
  'job:finished': (record: ExecutionRecord, slotId: string) => void;
  'job:error': (error: Error, slotId: string) => void;
}

interface Slot {
  id: string;
  busy: boolean;
}

/**
 * A worker process. Each concurrency slot registers as its own logical
 * worker (`<id>:<n>`) and holds at most one lease at a time.
 */
export class Worker<T = unknown> extends EventEmitter<WorkerEvents<T>> {
  private readonly slots: Slot[];
  private readonly supervisor: ExecutionSupervisor<T>;
  private readonly inFlight = new Set<Promise<void>>();
  private state: WorkerState = 'stopped';
  private pollTimer: NodeJS.Timeout | null = null;
  private heartbeatTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly transport: WorkerTransport<T>,
    private readonly handler: JobHandler<T>,
    private readonly options: WorkerOptions & { supervisor: Omit<SupervisorOptions, 'leaseMs'> },
    private readonly log: Logger = createLogger('worker')
  ) {
    super();
    const concurrency = options.concurrency ?? 1;
    this.slots = Array.from({ length: concurrency }, (_, i) => ({
      id: concurrency === 1 ? options.id : `${options.id}:${i}`,
      busy: false,
    }));
    this.supervisor = new ExecutionSupervisor<T>(
      transport,
      { ...options.supervisor, leaseMs: options.leaseMs },
      log
    );
  }

  get slotIds(): string[] {
    return this.slots.map((slot) => slot.id);
  }

  getState(): WorkerState {
    return this.state;
  }

  isAccepting(): boolean {
    return this.state === 'running';
  }

  getRunningCount(): number {
    return this.slots.filter((slot) => slot.busy).length;
  }

  async start(): Promise<void> {
    if (this.state !== 'stopped') return;

    for (const slot of this.slots) {
      await this.transport.register(slot.id);
    }
    this.state = 'running';

    this.heartbeatTimer = setInterval(() => {
      this.track(this.heartbeat());
    }, this.options.heartbeatIntervalMs);
    this.pollTimer = setInterval(() => {
      this.track(this.tick());
    }, this.options.pollIntervalMs ?? 100);

    this.log.info(`Worker ${this.options.id} started with ${this.slots.length} slot(s)`);
    this.emit('worker:started', this.options.id);
  }

  /**
   * One scheduling pass: every idle slot tries to claim and run a job.
   * Resolves when the jobs started in this pass have finished.
   */
  async tick(): Promise<void> {
    if (this.state !== 'running') return;
    const idle = this.slots.filter((slot) => !slot.busy);
    await Promise.all(idle.map((slot) => this.runSlot(slot)));
  }

  async heartbeat(): Promise<void> {
    for (const slot of this.slots) {
      const result = await this.transport.heartbeat(slot.id);
      if (!result.ok) {
        // Marked dead (e.g. after a long pause); its leases are gone, so start over.
        this.log.warn(`Slot ${slot.id} was dropped by the coordinator; re-registering`);
        await this.transport.register(slot.id);
      }
    }
  }

  /**
   * Stops claiming, waits for running jobs and deregisters every slot.
   */
  async drain(): Promise<void> {
    if (this.state !== 'running') return;
    this.state = 'draining';
    this.emit('worker:draining', this.options.id);
    this.log.info(`Worker ${this.options.id} draining ${this.getRunningCount()} running job(s)`);

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    await Promise.all([...this.inFlight]);

    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    for (const slot of this.slots) {
      await this.transport.deregister(slot.id);
    }

    this.state = 'stopped';
    this.emit('worker:stopped', this.options.id);
  }

  private async runSlot(slot: Slot): Promise<void> {
    if (slot.busy || this.state !== 'running') return;
    slot.busy = true;

    try {
      const job = await this.transport.claim(slot.id, this.options.leaseMs);
      if (!job) return;

      this.emit('job:started', job, slot.id);
      const record = await this.supervisor.run(job, slot.id, this.handler);
      this.emit('job:finished', record, slot.id);
    } catch (error) {
      if (error instanceof UnknownWorkerError) {
        this.log.warn(`Slot ${slot.id} is not registered; re-registering`);
        await this.transport.register(slot.id);
        return;
      }
      const failure = error instanceof Error ? error : new Error(errorMessage(error));
      this.log.error(`Slot ${slot.id} failed: ${failure.message}`);
      this.emit('job:error', failure, slot.id);
    } finally {
      slot.busy = false;
    }
  }

  private track(work: Promise<void>) {
    const tracked = work.catch((error) => {
      this.log.error(`Worker ${this.options.id} background task failed: ${errorMessage(error)}`);
    });
    this.inFlight.add(tracked);
    void tracked.finally(() => this.inFlight.delete(tracked));
  }
}
