import { createSilentLogger, describeError, type Logger } from '@taskhook/core-logging';

import type { TaskMessage } from './message.js';

export const DEFAULT_VISIBILITY_TIMEOUT_MS = 5 * 60 * 1000;

/**
 * Priority mailbox between the webhook router and the worker pool.
 *
 * Ordering is a strict total order on (priority, enqueue sequence). Delivery
 * is at-least-once: a dequeued message is leased to its consumer until it is
 * acknowledged or rejected, and an expired lease puts it back in the queue.
 */
export interface TaskQueue {
  enqueue: (message: TaskMessage) => Promise<void>;
  /** Resolves with `undefined` when nothing arrives within `timeoutMs`. */
  dequeue: (timeoutMs: number) => Promise<TaskMessage | undefined>;
  acknowledge: (taskId: string) => Promise<void>;
  /** `requeue=true` puts the message back at its original priority; `false` dead-letters it. */
  reject: (taskId: string, requeue: boolean) => Promise<void>;
  /** Messages waiting to be dequeued. */
  length: () => Promise<number>;
  /** Messages dequeued but not yet acknowledged or rejected. */
  inFlight: () => Promise<number>;
  /** Heartbeat: restart the visibility timeout of an in-flight message. */
  extendLease: (taskId: string) => Promise<void>;
  /** Return expired leases to the queue. Resolves with how many were returned. */
  reapExpired: () => Promise<number>;
  close: () => Promise<void>;
}

export interface ReaperOptions {
  logger?: Logger;
}

/**
 * Run `reapExpired` every `intervalMs`. The timer does not keep the process
 * alive. Returns a function that stops it.
 */
export function startReaper(queue: TaskQueue, intervalMs: number, options: ReaperOptions = {}): () => void {
  const logger = options.logger ?? createSilentLogger();
  let running = false;

  const tick = async (): Promise<void> => {
    if (running) {
      return;
    }
    running = true;
    try {
      const reclaimed = await queue.reapExpired();
      if (reclaimed > 0) {
        logger.warn('Reclaimed expired task leases', { reclaimed });
      }
    } catch (error) {
      logger.error('Lease reaper failed', describeError(error));
    } finally {
      running = false;
    }
  };

  const timer = setInterval(() => {
    void tick();
  }, intervalMs);
  timer.unref?.();

  return () => clearInterval(timer);
}
