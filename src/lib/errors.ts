/**
 * Error types raised by the backends the orchestrator talks to.
 */

export type Backend = 'model' | 'retrieval' | 'session_store';

export class BackendError extends Error {
  constructor(
    message: string,
    public readonly backend: Backend,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'BackendError';
  }
}

export class ModelUnavailableError extends BackendError {
  constructor(message: string, cause?: unknown) {
    super(message, 'model', cause);
    this.name = 'ModelUnavailableError';
  }
}

export class ModelTimeoutError extends BackendError {
  constructor(
    public readonly timeoutMs: number,
    cause?: unknown,
  ) {
    super(`Model did not answer within ${timeoutMs}ms`, 'model', cause);
    this.name = 'ModelTimeoutError';
  }
}

/** Raised by retrieval store implementations when the backend cannot be reached. */
export class StoreUnavailableError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'StoreUnavailableError';
  }
}

export class RetrievalUnavailableError extends BackendError {
  constructor(
    message: string,
    public readonly reason: 'timeout' | 'unavailable',
    cause?: unknown,
  ) {
    super(message, 'retrieval', cause);
    this.name = 'RetrievalUnavailableError';
  }
}

export class SessionStoreUnavailableError extends BackendError {
  constructor(message: string, cause?: unknown) {
    super(message, 'session_store', cause);
    this.name = 'SessionStoreUnavailableError';
  }
}

export class SessionConflictError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Session ${sessionId} was updated by another turn while this one was being saved`);
    this.name = 'SessionConflictError';
  }
}

export class TurnCancelledError extends Error {
  constructor(message = 'Turn was cancelled before it completed') {
    super(message);
    this.name = 'TurnCancelledError';
  }
}

export class DeadlineExceededError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation exceeded its ${timeoutMs}ms deadline`);
    this.name = 'DeadlineExceededError';
  }
}

export function isModelFailure(error: unknown): error is ModelUnavailableError | ModelTimeoutError {
  return error instanceof ModelUnavailableError || error instanceof ModelTimeoutError;
}
