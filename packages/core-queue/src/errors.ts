/**
 * The queue backend could not be reached. Callers retry with backoff.
 */
export class QueueUnavailableError extends Error {
  readonly code: string = 'QUEUE_UNAVAILABLE';
  readonly status = 503;
  readonly retryable: boolean = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueueUnavailableError';
  }
}

/**
 * The queue was closed by its owner; retrying will not help.
 */
export class QueueClosedError extends QueueUnavailableError {
  override readonly code = 'QUEUE_CLOSED';
  override readonly retryable = false;

  constructor() {
    super('Queue is closed');
    this.name = 'QueueClosedError';
  }
}

/**
 * acknowledge/reject/extendLease on a task that is not in flight.
 */
export class UnknownTaskError extends Error {
  readonly code = 'UNKNOWN_TASK';
  readonly retryable = false;
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} is not in flight`);
    this.name = 'UnknownTaskError';
    this.taskId = taskId;
  }
}
