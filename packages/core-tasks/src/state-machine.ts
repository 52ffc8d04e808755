import type { TaskMessage } from '@taskhook/core-queue';

export const TaskStatus = {
  QUEUED: 'QUEUED',
  RUNNING: 'RUNNING',
  WAITING_INPUT: 'WAITING_INPUT',
  COMPLETED: 'COMPLETED',
  FAILED: 'FAILED',
  CANCELLED: 'CANCELLED'
} as const;

export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

const TRANSITIONS: Record<TaskStatus, readonly TaskStatus[]> = {
  QUEUED: ['RUNNING', 'CANCELLED'],
  RUNNING: ['WAITING_INPUT', 'COMPLETED', 'FAILED', 'CANCELLED'],
  WAITING_INPUT: ['RUNNING', 'CANCELLED'],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: []
};

export interface TaskRecord {
  readonly taskId: string;
  readonly installationId: string;
  readonly provider: string;
  readonly inputMessage: string;
  readonly status: TaskStatus;
  /** ISO-8601 */
  readonly createdAt: string;
  readonly startedAt?: string;
  readonly completedAt?: string;
  readonly durationMs?: number;
  readonly output?: string;
  readonly error?: string;
  readonly tokensUsed?: number;
  readonly costUsd?: number;
}

/** Outcome fields, applied only on entry to COMPLETED or FAILED. */
export type TransitionDetails = {
  output?: string;
  error?: string;
  tokensUsed?: number;
  costUsd?: number;
};

export class InvalidTransitionError extends Error {
  readonly code = 'INVALID_TRANSITION';
  readonly retryable = false;
  readonly taskId: string;
  readonly from: TaskStatus;
  readonly to: TaskStatus;

  constructor(taskId: string, from: TaskStatus, to: TaskStatus) {
    super(`Task ${taskId} cannot move from ${from} to ${to}`);
    this.name = 'InvalidTransitionError';
    this.taskId = taskId;
    this.from = from;
    this.to = to;
  }
}

export function isTerminal(status: TaskStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function createTaskRecord(message: TaskMessage, now: Date = new Date()): TaskRecord {
  return {
    taskId: message.taskId,
    installationId: message.installationId,
    provider: message.provider,
    inputMessage: message.inputMessage,
    status: TaskStatus.QUEUED,
    createdAt: now.toISOString()
  };
}

/**
 * Return the record moved to `to`. The input record is left untouched.
 *
 * @throws InvalidTransitionError for moves the lifecycle does not allow,
 * including any move out of a terminal status
 */
export function transition(
  record: TaskRecord,
  to: TaskStatus,
  details: TransitionDetails = {},
  now: Date = new Date()
): TaskRecord {
  if (!canTransition(record.status, to)) {
    throw new InvalidTransitionError(record.taskId, record.status, to);
  }

  const timestamp = now.toISOString();
  const next: TaskRecord = {
    ...record,
    status: to,
    startedAt: to === TaskStatus.RUNNING && record.startedAt === undefined ? timestamp : record.startedAt
  };

  if (to !== TaskStatus.COMPLETED && to !== TaskStatus.FAILED) {
    return next;
  }

  const startedAt = next.startedAt === undefined ? now.getTime() : Date.parse(next.startedAt);
  return {
    ...next,
    completedAt: timestamp,
    durationMs: Math.max(0, now.getTime() - startedAt),
    output: details.output,
    error: details.error,
    tokensUsed: details.tokensUsed,
    costUsd: details.costUsd
  };
}
