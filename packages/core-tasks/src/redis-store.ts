/**
 * Redis-backed task record store, shared by every gateway and worker process.
 *
 * Layout (all keys under `keyPrefix`):
 * - `task:{id}`  JSON row
 * - `tasks`      set of all ids
 *
 * Inserts ride on `SET NX`; updates go through a compare-and-set script on the
 * stored row, retried when another process wrote in between.
 */

import { z } from 'zod';

import { safeParseOrThrow } from '@taskhook/core-validation';

import { TaskStatus, type TaskRecord } from './state-machine.js';
import { DuplicateTaskError, TaskNotFoundError, type TaskRecordFilter, type TaskRecordStore } from './store.js';

/**
 * Minimal Redis client surface. The gateway adapts ioredis to it.
 */
export interface TaskRecordRedisClient {
  get(key: string): Promise<string | null>;
  /** With mode 'NX': returns 'OK' when set, null when the key already exists. */
  set(key: string, value: string, mode?: 'NX'): Promise<string | null>;
  sadd(key: string, member: string): Promise<number>;
  smembers(key: string): Promise<string[]>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

export interface RedisTaskRecordStoreOptions {
  client: TaskRecordRedisClient;
  /** @default 'taskhook:' */
  keyPrefix?: string;
  /** Read-modify-write attempts before giving up on a contended row. @default 5 */
  maxWriteAttempts?: number;
}

/** KEYS[1]=row key, ARGV[1]=row as read, ARGV[2]=new row. Returns 1, 0 (changed since read) or -1 (missing). */
export const REPLACE_TASK_SCRIPT = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
if current ~= ARGV[1] then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
return 1
`;

const taskRecordSchema = z.object({
  taskId: z.string().min(1),
  installationId: z.string(),
  provider: z.string(),
  inputMessage: z.string(),
  status: z.nativeEnum(TaskStatus),
  createdAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  durationMs: z.number().optional(),
  output: z.string().optional(),
  error: z.string().optional(),
  tokensUsed: z.number().optional(),
  costUsd: z.number().optional()
});

export class TaskWriteConflictError extends Error {
  readonly code = 'TASK_WRITE_CONFLICT';
  readonly retryable = true;
  readonly taskId: string;

  constructor(taskId: string, attempts: number) {
    super(`Task ${taskId} kept changing during update (${attempts} attempts)`);
    this.name = 'TaskWriteConflictError';
    this.taskId = taskId;
  }
}

export class RedisTaskRecordStore implements TaskRecordStore {
  private readonly client: TaskRecordRedisClient;
  private readonly keyPrefix: string;
  private readonly maxWriteAttempts: number;

  constructor(options: RedisTaskRecordStoreOptions) {
    this.client = options.client;
    this.keyPrefix = options.keyPrefix ?? 'taskhook:';
    this.maxWriteAttempts = options.maxWriteAttempts ?? 5;
  }

  private rowKey(taskId: string): string {
    return `${this.keyPrefix}task:${taskId}`;
  }

  private indexKey(): string {
    return `${this.keyPrefix}tasks`;
  }

  async insert(record: TaskRecord): Promise<void> {
    const stored = await this.client.set(this.rowKey(record.taskId), JSON.stringify(record), 'NX');
    if (stored === null) {
      throw new DuplicateTaskError(record.taskId);
    }
    await this.client.sadd(this.indexKey(), record.taskId);
  }

  async get(taskId: string): Promise<TaskRecord | undefined> {
    const raw = await this.client.get(this.rowKey(taskId));
    return raw === null ? undefined : this.decode(taskId, raw);
  }

  async update(taskId: string, mutate: (current: TaskRecord) => TaskRecord): Promise<TaskRecord> {
    const key = this.rowKey(taskId);
    for (let attempt = 1; attempt <= this.maxWriteAttempts; attempt++) {
      const raw = await this.client.get(key);
      if (raw === null) {
        throw new TaskNotFoundError(taskId);
      }
      const next = mutate(this.decode(taskId, raw));
      const outcome = await this.client.eval(REPLACE_TASK_SCRIPT, 1, key, raw, JSON.stringify(next));
      if (outcome === 1) {
        return next;
      }
      if (outcome === -1) {
        throw new TaskNotFoundError(taskId);
      }
    }
    throw new TaskWriteConflictError(taskId, this.maxWriteAttempts);
  }

  async list(filter: TaskRecordFilter = {}): Promise<TaskRecord[]> {
    const ids = await this.client.smembers(this.indexKey());
    const records = await Promise.all(ids.map((taskId) => this.get(taskId)));
    return records.filter(
      (record): record is TaskRecord =>
        record !== undefined &&
        (filter.status === undefined || record.status === filter.status) &&
        (filter.installationId === undefined || record.installationId === filter.installationId)
    );
  }

  private decode(taskId: string, raw: string): TaskRecord {
    const decoded: unknown = JSON.parse(raw);
    return safeParseOrThrow(taskRecordSchema, decoded, `task(${taskId})`);
  }
}
