import type { TaskRecord, TaskStatus } from './state-machine.js';

export class TaskNotFoundError extends Error {
  readonly code = 'TASK_NOT_FOUND';
  readonly status = 404;
  readonly retryable = false;
  readonly taskId: string;

  constructor(taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
    this.taskId = taskId;
  }
}

export class DuplicateTaskError extends Error {
  readonly code = 'DUPLICATE_TASK';
  readonly retryable = false;

  constructor(taskId: string) {
    super(`Task ${taskId} already exists`);
    this.name = 'DuplicateTaskError';
  }
}

export type TaskRecordFilter = {
  status?: TaskStatus;
  installationId?: string;
};

/**
 * Storage port for task records. `update` applies `mutate` atomically with
 * respect to other updates of the same record.
 */
export interface TaskRecordStore {
  insert: (record: TaskRecord) => Promise<void>;
  get: (taskId: string) => Promise<TaskRecord | undefined>;
  update: (taskId: string, mutate: (current: TaskRecord) => TaskRecord) => Promise<TaskRecord>;
  list: (filter?: TaskRecordFilter) => Promise<TaskRecord[]>;
}

export class InMemoryTaskRecordStore implements TaskRecordStore {
  private readonly records = new Map<string, TaskRecord>();

  async insert(record: TaskRecord): Promise<void> {
    if (this.records.has(record.taskId)) {
      throw new DuplicateTaskError(record.taskId);
    }
    this.records.set(record.taskId, record);
  }

  async get(taskId: string): Promise<TaskRecord | undefined> {
    return this.records.get(taskId);
  }

  async update(taskId: string, mutate: (current: TaskRecord) => TaskRecord): Promise<TaskRecord> {
    const current = this.records.get(taskId);
    if (!current) {
      throw new TaskNotFoundError(taskId);
    }
    const next = mutate(current);
    this.records.set(taskId, next);
    return next;
  }

  async list(filter: TaskRecordFilter = {}): Promise<TaskRecord[]> {
    return [...this.records.values()].filter(
      (record) =>
        (filter.status === undefined || record.status === filter.status) &&
        (filter.installationId === undefined || record.installationId === filter.installationId)
    );
  }

  clear(): void {
    this.records.clear();
  }
}
