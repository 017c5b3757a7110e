import { QueueErrorCode } from '../core/errors';
import { ExecutionOutcome, ExecutionRecord, Job, JobState } from '../core/types';

// Request and response bodies of the HTTP surface

export interface JobStatusView {
  id: string;
  state: JobState;
  attempts: number;
  maxAttempts: number;
  lastError: string | null;
}

export interface ErrorResponse {
  success: false;
  error: string;
  code?: QueueErrorCode;
}

export interface ClaimResponse<T = unknown> {
  success: true;
  job: Job<T> | null;
}

export interface AckResponse<T = unknown> {
  success: true;
  job: Job<T>;
  record: ExecutionRecord;
}

export type NackDecisionView<T = unknown> =
  | { kind: 'retry'; job: Job<T>; delayMs: number }
  | { kind: 'failed'; job: Job<T>; error: string };

export interface NackResponse<T = unknown> {
  success: true;
  decision: NackDecisionView<T>;
  record: ExecutionRecord;
}

export interface NackRequest {
  workerId: string;
  error: string;
  outcome?: Exclude<ExecutionOutcome, 'success'>;
}
