import axios, { AxiosInstance, AxiosResponse } from 'axios';
import {
  LeaseError,
  LeaseExpiredError,
  NotOwnerError,
  TerminalFailureError,
  TransientError,
  UnknownWorkerError
} from '../core/errors';
import { AckResult, ExtendResult, NackResult } from '../core/Queue';
import { ExecutionOutcome, Job } from '../core/types';
import { HeartbeatAck, WorkerTransport } from '../core/WorkerTransport';
import { AckResponse, ClaimResponse, NackRequest, NackResponse } from './types';

export interface RemoteWorkerClientOptions {
  /** Base URL of the mounted queue routes, e.g. http://localhost:3000/api/queue */
  baseUrl: string;
  timeoutMs?: number;
}

interface ErrorBody {
  error?: string;
  code?: string;
}

/**
 * Worker protocol over HTTP. Lets worker processes run against a
 * coordinator in another process.
 *
 * Network failures and 5xx responses surface as TransientError; lease races
 * come back as values, same as with the in-process transport.
 */
export class RemoteWorkerClient<T = unknown> implements WorkerTransport<T> {
  private readonly http: AxiosInstance;

  constructor(options: RemoteWorkerClientOptions) {
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 10_000,
      validateStatus: () => true,
    });
  }

  async register(workerId: string): Promise<void> {
    this.expectOk(await this.send('post', '/workers', { workerId }));
  }

  async heartbeat(workerId: string): Promise<HeartbeatAck> {
    const response = await this.send('post', `/workers/${encodeURIComponent(workerId)}/heartbeat`);
    if (response.status === 404) return { ok: false, error: new UnknownWorkerError(workerId) };
    this.expectOk(response);
    return { ok: true };
  }

  async claim(workerId: string, leaseMs: number): Promise<Job<T> | null> {
    const response = await this.send<ClaimResponse<T>>('post', `/workers/${encodeURIComponent(workerId)}/claim`, {
      leaseMs,
    });
    if (response.status === 404) throw new UnknownWorkerError(workerId);
    return this.expectOk(response).job;
  }

  async ack(jobId: string, workerId: string, result?: unknown): Promise<AckResult<T>> {
    const response = await this.send<AckResponse<T>>('post', this.jobPath(jobId, 'ack'), {
      workerId,
      result,
    });
    const error = this.leaseError(response, jobId, workerId);
    if (error) return { ok: false, error };

    const body = this.expectOk(response);
    return { ok: true, job: body.job, record: body.record };
  }

  async nack(
    jobId: string,
    workerId: string,
    error: string,
    outcome: Exclude<ExecutionOutcome, 'success'> = 'failure'
  ): Promise<NackResult<T>> {
    const request: NackRequest = { workerId, error, outcome };
    const response = await this.send<NackResponse<T>>('post', this.jobPath(jobId, 'nack'), request);
    const leaseError = this.leaseError(response, jobId, workerId);
    if (leaseError) return { ok: false, error: leaseError };

    const { decision, record } = this.expectOk(response);
    if (decision.kind === 'retry') {
      return { ok: true, decision, record };
    }
    return {
      ok: true,
      decision: {
        kind: 'failed',
        job: decision.job,
        error: new TerminalFailureError(jobId, decision.job.attempts, decision.job.lastError),
      },
      record,
    };
  }

  async extendLease(jobId: string, workerId: string, leaseMs: number): Promise<ExtendResult<T>> {
    const response = await this.send<{ job: Job<T> }>('post', this.jobPath(jobId, 'extend'), { workerId, leaseMs });
    const error = this.leaseError(response, jobId, workerId);
    if (error) return { ok: false, error };
    return { ok: true, job: this.expectOk(response).job };
  }

  async deregister(workerId: string): Promise<void> {
    this.expectOk(await this.send('delete', `/workers/${encodeURIComponent(workerId)}`));
  }

  private jobPath(jobId: string, action: string): string {
    return `/jobs/${encodeURIComponent(jobId)}/${action}`;
  }

  private async send<B = unknown>(
    method: 'post' | 'delete',
    url: string,
    data?: object
  ): Promise<AxiosResponse<B & ErrorBody>> {
    try {
      return await this.http.request<B & ErrorBody>({ method, url, data });
    } catch (error) {
      throw new TransientError(`Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private leaseError(response: AxiosResponse<ErrorBody>, jobId: string, workerId: string): LeaseError | undefined {
    if (response.status !== 409) return undefined;
    if (response.data.code === 'LEASE_EXPIRED') return new LeaseExpiredError(jobId, workerId);
    if (response.data.code === 'NOT_OWNER') return new NotOwnerError(jobId, workerId);
    return undefined;
  }

  private expectOk<B>(response: AxiosResponse<B & ErrorBody>): B & ErrorBody {
    if (response.status >= 200 && response.status < 300) return response.data;
    const message = response.data?.error ?? `HTTP ${response.status}`;
    if (response.status >= 500) throw new TransientError(message);
    throw new Error(`Queue API rejected request (${response.status}): ${message}`);
  }
}
