export type BrainErrorCode =
  | 'TRANSIENT_NETWORK'
  | 'SERVICE_UNAVAILABLE'
  | 'GATE_TIMEOUT'
  | 'VALIDATION_FAILURE'
  | 'PERMANENT_REMOTE'
  | 'DEADLINE_EXCEEDED';

export class BrainError extends Error {
  readonly code: BrainErrorCode;

  constructor(code: BrainErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Timeouts, refused connections, 5xx and 429. The only retryable kind.
export class TransientNetworkError extends BrainError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super('TRANSIENT_NETWORK', message, options);
    this.status = status;
  }
}

// Circuit open: the operation was never attempted.
export class ServiceUnavailableError extends BrainError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super('SERVICE_UNAVAILABLE', `Remote service unavailable, circuit open (retry in ${retryAfterMs}ms)`);
    this.retryAfterMs = retryAfterMs;
  }
}

export class GateTimeoutError extends BrainError {
  constructor(timeoutMs: number) {
    super('GATE_TIMEOUT', `No request slot became free within ${timeoutMs}ms`);
  }
}

// The remote answered but the body is unusable.
export class ValidationFailureError extends BrainError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('VALIDATION_FAILURE', message, options);
  }
}

export class PermanentRemoteError extends BrainError {
  readonly status: number;

  constructor(status: number, message: string) {
    super('PERMANENT_REMOTE', message);
    this.status = status;
  }
}

export class DeadlineExceededError extends BrainError {
  constructor(message = 'Request deadline exceeded') {
    super('DEADLINE_EXCEEDED', message);
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof TransientNetworkError;
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
