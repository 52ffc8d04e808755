import { createSilentLogger, type Logger } from '@taskhook/core-logging';
import type { TaskMessage } from '@taskhook/core-queue';

import {
  createTaskRecord,
  TaskStatus,
  transition,
  type TaskRecord,
  type TransitionDetails
} from './state-machine.js';
import { TaskNotFoundError, type TaskRecordFilter, type TaskRecordStore } from './store.js';

export type CompletionDetails = {
  output: string;
  tokensUsed?: number;
  costUsd?: number;
};

export type FailureDetails = {
  error: string;
  output?: string;
  tokensUsed?: number;
  costUsd?: number;
};

export interface TaskLifecycleOptions {
  store: TaskRecordStore;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Drives task records through the state machine and persists every step.
 */
export class TaskLifecycle {
  private readonly store: TaskRecordStore;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(options: TaskLifecycleOptions) {
    this.store = options.store;
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'task-lifecycle' });
    this.now = options.now ?? (() => new Date());
  }

  async create(message: TaskMessage): Promise<TaskRecord> {
    const record = createTaskRecord(message, this.now());
    await this.store.insert(record);
    this.logger.info('Task record created', { taskId: record.taskId, installationId: record.installationId });
    return record;
  }

  async get(taskId: string): Promise<TaskRecord | undefined> {
    return this.store.get(taskId);
  }

  async list(filter?: TaskRecordFilter): Promise<TaskRecord[]> {
    return this.store.list(filter);
  }

  start(taskId: string): Promise<TaskRecord> {
    return this.move(taskId, TaskStatus.RUNNING);
  }

  awaitInput(taskId: string): Promise<TaskRecord> {
    return this.move(taskId, TaskStatus.WAITING_INPUT);
  }

  resume(taskId: string): Promise<TaskRecord> {
    return this.move(taskId, TaskStatus.RUNNING);
  }

  complete(taskId: string, details: CompletionDetails): Promise<TaskRecord> {
    return this.move(taskId, TaskStatus.COMPLETED, details);
  }

  fail(taskId: string, details: FailureDetails): Promise<TaskRecord> {
    return this.move(taskId, TaskStatus.FAILED, details);
  }

  /**
   * Only flips the recorded status. Stopping a running execution is up to
   * whoever runs it.
   */
  cancel(taskId: string): Promise<TaskRecord> {
    return this.move(taskId, TaskStatus.CANCELLED);
  }

  private async move(taskId: string, to: TaskStatus, details?: TransitionDetails): Promise<TaskRecord> {
    const existing = await this.store.get(taskId);
    if (!existing) {
      throw new TaskNotFoundError(taskId);
    }
    const next = await this.store.update(taskId, (current) => transition(current, to, details, this.now()));
    this.logger.info('Task status changed', {
      taskId,
      from: existing.status,
      to: next.status,
      durationMs: next.durationMs
    });
    return next;
  }
}
