import express, { Request, RequestHandler, Response, Router } from 'express';
import { QueueError, QueueErrorCode, ValidationError } from '../core/errors';
import { Monitor } from '../core/Monitor';
import { Queue } from '../core/Queue';
import { ExecutionOutcome, Job } from '../core/types';
import { WorkerCoordinator } from '../core/WorkerCoordinator';
import { createLogger } from './logger';
import { AckResponse, ClaimResponse, ErrorResponse, JobStatusView, NackDecisionView, NackResponse } from './types';

const log = createLogger('api');

/**
 * Options for configuring the API integration
 */
export interface ApiIntegrationOptions {
  /**
   * Optional middleware to run before every route
   */
  middleware?: RequestHandler[];

  /**
   * Lease duration used when a claim does not ask for one
   */
  defaultLeaseMs?: number;

  /**
   * Upper bound on `limit` for record queries (defaults to 500)
   */
  maxRecordLimit?: number;
}

export interface QueueServices {
  queue: Queue;
  coordinator: WorkerCoordinator;
  monitor: Monitor;
  intake: IntakeGate;
}

/**
 * Open while the process accepts submissions; closed once it starts draining.
 */
export class IntakeGate {
  private accepting = true;

  isAccepting(): boolean {
    return this.accepting;
  }

  close() {
    this.accepting = false;
  }

  open() {
    this.accepting = true;
  }
}

const STATUS_BY_CODE: Record<QueueErrorCode, number> = {
  TRANSIENT: 503,
  LEASE_EXPIRED: 409,
  NOT_OWNER: 409,
  EXECUTION_FAILURE: 500,
  EXECUTION_TIMEOUT: 500,
  TERMINAL_FAILURE: 409,
  UNKNOWN_WORKER: 404,
  JOB_NOT_FOUND: 404,
  INVALID_STATE: 409,
  VALIDATION: 400,
  CONFIG: 500,
};

function sendError(res: Response, error: unknown) {
  if (error instanceof QueueError) {
    const body: ErrorResponse = { success: false, error: error.message, code: error.code };
    res.status(STATUS_BY_CODE[error.code]).json(body);
    return;
  }

  log.error('Unhandled error:', error);
  const body: ErrorResponse = { success: false, error: error instanceof Error ? error.message : 'Unknown error' };
  res.status(500).json(body);
}

function field(body: unknown, name: string): unknown {
  if (typeof body !== 'object' || body === null) return undefined;
  return Object.getOwnPropertyDescriptor(body, name)?.value;
}

function requiredString(body: unknown, name: string): string {
  const value = field(body, name);
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${name} is required`);
  }
  return value;
}

function optionalNumber(value: unknown, name: string): number | undefined {
  if (value === undefined || value === null || value === '') return undefined;
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed)) {
    throw new ValidationError(`${name} must be a number`);
  }
  return parsed;
}

function recordLimit(value: unknown, max: number): number {
  const limit = optionalNumber(value, 'limit');
  if (limit === undefined) return Math.min(50, max);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new ValidationError('limit must be a positive integer');
  }
  return Math.min(limit, max);
}

function failureOutcome(value: unknown): Exclude<ExecutionOutcome, 'success'> {
  if (value === undefined || value === 'failure') return 'failure';
  if (value === 'timeout') return 'timeout';
  throw new ValidationError('outcome must be "failure" or "timeout"');
}

function toStatusView(job: Job): JobStatusView {
  return {
    id: job.id,
    state: job.state,
    attempts: job.attempts,
    maxAttempts: job.maxAttempts,
    lastError: job.lastError ?? null,
  };
}

/**
 * Creates Express API routes for submission, the worker protocol and monitoring
 *
 * @param services The queue, coordinator and monitor to expose
 * @param options Configuration options
 * @returns Express router with API endpoints
 */
export function createQueueApiRoutes(
  services: QueueServices,
  options: ApiIntegrationOptions = {}
): Router {
  const { queue, coordinator, monitor, intake } = services;
  const { middleware = [], defaultLeaseMs, maxRecordLimit = 500 } = options;
  const router = express.Router();

  router.use(express.json());
  if (middleware.length > 0) {
    router.use(middleware);
  }

  // Submission API

  router.post('/jobs', (req: Request, res: Response) => {
    try {
      if (!intake.isAccepting()) {
        const body: ErrorResponse = { success: false, error: 'Not accepting new jobs: draining' };
        res.status(503).json(body);
        return;
      }

      const payload = field(req.body, 'payload');
      if (payload === undefined) {
        throw new ValidationError('Invalid job request. Missing payload.');
      }

      const job = queue.enqueue(payload, {
        maxAttempts: optionalNumber(field(req.body, 'maxAttempts'), 'maxAttempts'),
        delayMs: optionalNumber(field(req.body, 'delayMs'), 'delayMs'),
      });
      log.info(`Accepted job ${job.id} (${job.state})`);
      res.status(201).json({ success: true, jobId: job.id, state: job.state });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/jobs/:id', (req: Request, res: Response) => {
    try {
      const job = queue.getJob(req.params.id);
      if (!job) {
        const body: ErrorResponse = { success: false, error: `Job ${req.params.id} not found`, code: 'JOB_NOT_FOUND' };
        res.status(404).json(body);
        return;
      }
      res.json({ success: true, job: toStatusView(job) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/jobs/:id/records', (req: Request, res: Response) => {
    try {
      res.json({ success: true, records: monitor.recentRecords({ jobId: req.params.id, limit: maxRecordLimit }) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/jobs/:id/retry', (req: Request, res: Response) => {
    try {
      const job = queue.retry(req.params.id);
      res.status(201).json({ success: true, jobId: job.id, retriedFrom: req.params.id });
    } catch (error) {
      sendError(res, error);
    }
  });

  // Worker protocol

  router.post('/workers', (req: Request, res: Response) => {
    try {
      const worker = coordinator.register(requiredString(req.body, 'workerId'));
      res.status(201).json({ success: true, worker });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.delete('/workers/:id', (req: Request, res: Response) => {
    try {
      res.json({ success: true, removed: coordinator.deregister(req.params.id) });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/workers/:id/heartbeat', (req: Request, res: Response) => {
    try {
      const result = coordinator.heartbeat(req.params.id);
      if (!result.ok) throw result.error;
      res.json({ success: true, worker: result.worker });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/workers/:id/claim', (req: Request, res: Response) => {
    try {
      const leaseMs = optionalNumber(field(req.body, 'leaseMs'), 'leaseMs') ?? defaultLeaseMs;
      const result = coordinator.claim(req.params.id, leaseMs);
      if (!result.ok) throw result.error;
      const body: ClaimResponse = { success: true, job: result.job };
      res.json(body);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/jobs/:id/ack', (req: Request, res: Response) => {
    try {
      const workerId = requiredString(req.body, 'workerId');
      const result = queue.ack(req.params.id, workerId, field(req.body, 'result'));
      coordinator.markIdle(workerId);
      if (!result.ok) throw result.error;
      const body: AckResponse = { success: true, job: result.job, record: result.record };
      res.json(body);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/jobs/:id/nack', (req: Request, res: Response) => {
    try {
      const workerId = requiredString(req.body, 'workerId');
      const message = requiredString(req.body, 'error');
      const result = queue.nack(req.params.id, workerId, message, failureOutcome(field(req.body, 'outcome')));
      coordinator.markIdle(workerId);
      if (!result.ok) throw result.error;

      const { decision } = result;
      const view: NackDecisionView =
        decision.kind === 'retry'
          ? { kind: 'retry', job: decision.job, delayMs: decision.delayMs }
          : { kind: 'failed', job: decision.job, error: decision.error.message };
      const body: NackResponse = { success: true, decision: view, record: result.record };
      res.json(body);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.post('/jobs/:id/extend', (req: Request, res: Response) => {
    try {
      const workerId = requiredString(req.body, 'workerId');
      const leaseMs = optionalNumber(field(req.body, 'leaseMs'), 'leaseMs') ?? defaultLeaseMs;
      const result = queue.extendLease(req.params.id, workerId, leaseMs);
      if (!result.ok) throw result.error;
      res.json({ success: true, job: result.job });
    } catch (error) {
      sendError(res, error);
    }
  });

  // Monitoring

  router.get('/stats', (req: Request, res: Response) => {
    try {
      res.json({
        success: true,
        depth: monitor.queueDepth(),
        liveWorkers: monitor.liveWorkerCount(),
        workers: monitor.workerReport(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/records', (req: Request, res: Response) => {
    try {
      const jobId = typeof req.query.jobId === 'string' ? req.query.jobId : undefined;
      res.json({
        success: true,
        records: monitor.recentRecords({
          jobId,
          from: optionalNumber(req.query.from, 'from'),
          to: optionalNumber(req.query.to, 'to'),
          limit: recordLimit(req.query.limit, maxRecordLimit),
        }),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get('/health/live', (req: Request, res: Response) => {
    const report = monitor.liveness();
    res.status(report.ok ? 200 : 503).json(report);
  });

  router.get('/health/ready', (req: Request, res: Response) => {
    const report = monitor.readiness();
    res.status(report.ready ? 200 : 503).json(report);
  });

  return router;
}
