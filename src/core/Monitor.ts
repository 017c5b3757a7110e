import { JobStore, RecordFilter } from './JobStore';
import { ExecutionRecord, JobState, WorkerStatus } from './types';

export interface WorkerReportEntry {
  id: string;
  status: WorkerStatus;
  secondsSinceHeartbeat: number;
}

export interface LivenessReport {
  ok: boolean;
  store: boolean;
  queue: boolean;
  coordinator: boolean;
}

export interface ReadinessReport {
  ready: boolean;
  state: 'accepting' | 'draining';
}

/** Anything whose running state the health probes care about. */
export interface Lifecycle {
  isRunning(): boolean;
}

/**
 * Read-only view over the store for operators. Nothing here mutates state.
 */
export class Monitor {
  constructor(
    private readonly store: JobStore,
    private readonly queue: Lifecycle,
    private readonly coordinator: Lifecycle,
    private readonly intake: { isAccepting(): boolean },
    private readonly now: () => number = Date.now
  ) {}

  queueDepth(): Record<JobState, number> {
    return this.store.countByState();
  }

  liveWorkerCount(): number {
    return this.store.listWorkers().filter((worker) => worker.status !== 'dead').length;
  }

  workerReport(): WorkerReportEntry[] {
    const now = this.now();
    return this.store.listWorkers().map((worker) => ({
      id: worker.id,
      status: worker.status,
      secondsSinceHeartbeat: Math.max(0, Math.floor((now - worker.lastHeartbeatAt) / 1000)),
    }));
  }

  recentRecords(filter: RecordFilter = {}): ExecutionRecord[] {
    return this.store.listRecords({ ...filter, limit: filter.limit ?? 50 });
  }

  liveness(): LivenessReport {
    const store = this.store.ping();
    const queue = this.queue.isRunning();
    const coordinator = this.coordinator.isRunning();
    return { ok: store && queue && coordinator, store, queue, coordinator };
  }

  readiness(): ReadinessReport {
    const accepting = this.intake.isAccepting();
    return { ready: accepting, state: accepting ? 'accepting' : 'draining' };
  }
}
