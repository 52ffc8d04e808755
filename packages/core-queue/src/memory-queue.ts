import { createSilentLogger, type Logger } from '@taskhook/core-logging';

import { QueueClosedError, UnknownTaskError } from './errors.js';
import { MinHeap } from './heap.js';
import type { TaskMessage } from './message.js';
import { DEFAULT_VISIBILITY_TIMEOUT_MS, type TaskQueue } from './queue.js';

type QueuedEntry = {
  message: TaskMessage;
  sequence: number;
};

type Lease = QueuedEntry & {
  expiresAt: number;
};

type Waiter = {
  resolve: (message: TaskMessage | undefined) => void;
  timer: ReturnType<typeof setTimeout>;
};

export type DeadLetter = {
  message: TaskMessage;
  failedAt: string;
};

export interface InMemoryTaskQueueOptions {
  /** @default 300000 (5 minutes) */
  visibilityTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

function compareEntries(a: QueuedEntry, b: QueuedEntry): number {
  return a.message.priority - b.message.priority || a.sequence - b.sequence;
}

/**
 * Single-process queue. Consumers waiting in `dequeue` are woken by `enqueue`
 * rather than polling.
 */
export class InMemoryTaskQueue implements TaskQueue {
  private readonly heap = new MinHeap<QueuedEntry>(compareEntries);
  private readonly leases = new Map<string, Lease>();
  private readonly waiters: Waiter[] = [];
  private readonly dead: DeadLetter[] = [];
  private readonly visibilityTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private sequence = 0;
  private closed = false;

  constructor(options: InMemoryTaskQueueOptions = {}) {
    this.visibilityTimeoutMs = options.visibilityTimeoutMs ?? DEFAULT_VISIBILITY_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'task-queue' });
  }

  async enqueue(message: TaskMessage): Promise<void> {
    if (this.closed) {
      throw new QueueClosedError();
    }
    this.sequence += 1;
    this.push({ message, sequence: this.sequence });
    this.logger.debug('Task enqueued', { taskId: message.taskId, priority: message.priority });
  }

  async dequeue(timeoutMs: number): Promise<TaskMessage | undefined> {
    if (this.closed) {
      return undefined;
    }
    const entry = this.heap.pop();
    if (entry) {
      return this.lease(entry);
    }
    if (timeoutMs <= 0) {
      return undefined;
    }

    return new Promise<TaskMessage | undefined>((resolve) => {
      const waiter: Waiter = {
        resolve,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter);
          if (index !== -1) {
            this.waiters.splice(index, 1);
          }
          resolve(undefined);
        }, timeoutMs)
      };
      this.waiters.push(waiter);
    });
  }

  async acknowledge(taskId: string): Promise<void> {
    this.takeLease(taskId);
  }

  async reject(taskId: string, requeue: boolean): Promise<void> {
    const lease = this.takeLease(taskId);
    if (requeue && !this.closed) {
      this.push({ message: lease.message, sequence: lease.sequence });
      return;
    }
    this.dead.push({ message: lease.message, failedAt: new Date(this.now()).toISOString() });
    this.logger.warn('Task dead-lettered', { taskId });
  }

  async length(): Promise<number> {
    return this.heap.size;
  }

  async inFlight(): Promise<number> {
    return this.leases.size;
  }

  async extendLease(taskId: string): Promise<void> {
    const lease = this.leases.get(taskId);
    if (!lease) {
      throw new UnknownTaskError(taskId);
    }
    lease.expiresAt = this.now() + this.visibilityTimeoutMs;
  }

  async reapExpired(): Promise<number> {
    const now = this.now();
    let reclaimed = 0;
    for (const [taskId, lease] of this.leases) {
      if (lease.expiresAt > now) {
        continue;
      }
      this.leases.delete(taskId);
      this.push({ message: lease.message, sequence: lease.sequence });
      reclaimed += 1;
    }
    return reclaimed;
  }

  async close(): Promise<void> {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }

  deadLetters(): readonly DeadLetter[] {
    return [...this.dead];
  }

  /** Re-inserted messages keep their original sequence, so they stay ahead of newer peers. */
  private push(entry: QueuedEntry): void {
    this.heap.push(entry);
    const waiter = this.waiters.shift();
    if (!waiter) {
      return;
    }
    clearTimeout(waiter.timer);
    const next = this.heap.pop();
    waiter.resolve(next ? this.lease(next) : undefined);
  }

  private lease(entry: QueuedEntry): TaskMessage {
    this.leases.set(entry.message.taskId, { ...entry, expiresAt: this.now() + this.visibilityTimeoutMs });
    return entry.message;
  }

  private takeLease(taskId: string): Lease {
    const lease = this.leases.get(taskId);
    if (!lease) {
      throw new UnknownTaskError(taskId);
    }
    this.leases.delete(taskId);
    return lease;
  }
}
