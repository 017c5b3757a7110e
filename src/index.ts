import { RelayConfig } from './config';
import { JobStore } from './core/JobStore';
import { Monitor } from './core/Monitor';
import { Queue } from './core/Queue';
import { SqliteJobStore } from './core/SqliteJobStore';
import { JobHandler } from './core/types';
import { Worker } from './core/Worker';
import { WorkerCoordinator } from './core/WorkerCoordinator';
import { LocalTransport, WorkerTransport } from './core/WorkerTransport';
import { createQueueApiRoutes, IntakeGate } from './lib/ApiIntegration';

// Main classes
export { Queue, DEFAULT_BACKOFF } from './core/Queue';
export { WorkerCoordinator } from './core/WorkerCoordinator';
export { ExecutionSupervisor } from './core/ExecutionSupervisor';
export { Worker } from './core/Worker';
export { Monitor } from './core/Monitor';
export { SqliteJobStore } from './core/SqliteJobStore';
export { LocalTransport } from './core/WorkerTransport';
export { RemoteWorkerClient } from './lib/RemoteWorkerClient';
export { createQueueApiRoutes, IntakeGate } from './lib/ApiIntegration';
export { computeBackoff } from './core/backoff';
export { loadConfig, loadDotenv } from './config';
export { createLogger, setLogLevel, silentLogger } from './lib/logger';
export * from './core/errors';

// Types
export type * from './core/types';
export type { JobStore, JobFilter, RecordFilter, TransitionGuard } from './core/JobStore';
export type { AckResult, NackResult, NackDecision, ExtendResult, QueueEvents } from './core/Queue';
export type { WorkerTransport, HeartbeatAck } from './core/WorkerTransport';
export type { AttemptState } from './core/ExecutionSupervisor';
export type { WorkerState } from './core/Worker';
export type { LivenessReport, ReadinessReport, WorkerReportEntry } from './core/Monitor';
export type { ApiIntegrationOptions, QueueServices } from './lib/ApiIntegration';
export type { RelayConfig } from './config';
export type { Logger, LogLevel } from './lib/logger';
export type * from './lib/types';

export interface Relay {
  store: JobStore;
  queue: Queue;
  coordinator: WorkerCoordinator;
  monitor: Monitor;
  intake: IntakeGate;
  /** In-process worker protocol, for workers running beside the queue */
  transport: LocalTransport;
  router: ReturnType<typeof createQueueApiRoutes>;
  start(): void;
  shutdown(): void;
}

/**
 * Wire a store, queue, coordinator and monitor together from configuration
 * @param config Configuration, usually from `loadConfig()`
 * @param store Store to use instead of the SQLite file named in the config
 * @returns The wired services plus an Express router exposing them
 */
export function createRelay(config: RelayConfig, store: JobStore = new SqliteJobStore({ path: config.databasePath })): Relay {
  const queue = new Queue(store, {
    defaultMaxAttempts: config.defaultMaxAttempts,
    defaultLeaseMs: config.leaseMs,
    backoff: { baseMs: config.backoffBaseMs, maxMs: config.backoffMaxMs },
    sweepIntervalMs: config.sweepIntervalMs,
    reaperIntervalMs: config.reaperIntervalMs,
    cleanupAfterMs: config.cleanupAfterDays * 24 * 60 * 60 * 1000,
  });
  const coordinator = new WorkerCoordinator(store, queue, {
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    livenessFactor: config.livenessFactor,
  });
  const intake = new IntakeGate();
  const monitor = new Monitor(store, queue, coordinator, intake);
  const router = createQueueApiRoutes({ queue, coordinator, monitor, intake }, { defaultLeaseMs: config.leaseMs });

  return {
    store,
    queue,
    coordinator,
    monitor,
    intake,
    transport: new LocalTransport(queue, coordinator),
    router,
    start() {
      queue.start();
      coordinator.start();
    },
    shutdown() {
      intake.close();
      coordinator.shutdown();
      queue.shutdown();
      store.close();
    },
  };
}

/**
 * Create a worker for `handler` over `transport`: `relay.transport` in-process,
 * or a RemoteWorkerClient pointed at another process
 */
export function createWorker<T = unknown>(
  transport: WorkerTransport<T>,
  handler: JobHandler<T>,
  config: RelayConfig,
  id: string
): Worker<T> {
  return new Worker<T>(transport, handler, {
    id,
    concurrency: config.workerConcurrency,
    leaseMs: config.leaseMs,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    supervisor: { timeoutMs: config.jobTimeoutMs, graceMs: config.graceMs },
  });
}
