export type QueueErrorCode =
  | 'TRANSIENT'
  | 'LEASE_EXPIRED'
  | 'NOT_OWNER'
  | 'EXECUTION_FAILURE'
  | 'EXECUTION_TIMEOUT'
  | 'TERMINAL_FAILURE'
  | 'UNKNOWN_WORKER'
  | 'JOB_NOT_FOUND'
  | 'INVALID_STATE'
  | 'VALIDATION'
  | 'CONFIG';

export class QueueError extends Error {
  constructor(readonly code: QueueErrorCode, message: string) {
    super(message);
    this.name = 'QueueError';
  }
}

/**
 * Backend hiccup. Safe to retry; the job itself is not at fault.
 */
export class TransientError extends QueueError {
  constructor(message = 'Transient backend error') {
    super('TRANSIENT', message);
    this.name = 'TransientError';
  }
}

export class LeaseExpiredError extends QueueError {
  constructor(readonly jobId: string, readonly workerId: string) {
    super('LEASE_EXPIRED', `Lease on job ${jobId} held by ${workerId} has expired`);
    this.name = 'LeaseExpiredError';
  }
}

export class NotOwnerError extends QueueError {
  constructor(readonly jobId: string, readonly workerId: string) {
    super('NOT_OWNER', `Worker ${workerId} does not hold the lease on job ${jobId}`);
    this.name = 'NotOwnerError';
  }
}

export class ExecutionFailureError extends QueueError {
  constructor(message: string) {
    super('EXECUTION_FAILURE', message);
    this.name = 'ExecutionFailureError';
  }
}

export class ExecutionTimeoutError extends QueueError {
  constructor(readonly timeoutMs: number) {
    super('EXECUTION_TIMEOUT', `Execution exceeded deadline of ${timeoutMs}ms`);
    this.name = 'ExecutionTimeoutError';
  }
}

export class TerminalFailureError extends QueueError {
  constructor(readonly jobId: string, readonly attempts: number, readonly lastError?: string) {
    super('TERMINAL_FAILURE', `Job ${jobId} failed after ${attempts} attempts${lastError ? `: ${lastError}` : ''}`);
    this.name = 'TerminalFailureError';
  }
}

export class UnknownWorkerError extends QueueError {
  constructor(readonly workerId: string) {
    super('UNKNOWN_WORKER', `Worker ${workerId} is not registered or has been marked dead`);
    this.name = 'UnknownWorkerError';
  }
}

export class JobNotFoundError extends QueueError {
  constructor(readonly jobId: string) {
    super('JOB_NOT_FOUND', `Job ${jobId} not found`);
    this.name = 'JobNotFoundError';
  }
}

export class InvalidStateError extends QueueError {
  constructor(message: string) {
    super('INVALID_STATE', message);
    this.name = 'InvalidStateError';
  }
}

export class ValidationError extends QueueError {
  constructor(message: string) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends QueueError {
  constructor(message: string) {
    super('CONFIG', message);
    this.name = 'ConfigError';
  }
}

export type LeaseError = LeaseExpiredError | NotOwnerError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
