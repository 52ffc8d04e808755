import { createLogger, describeError, type Logger } from '@taskhook/core-logging';
import type { LoopGuard } from '@taskhook/core-loop-guard';
import type { TaskQueue } from '@taskhook/core-queue';
import { sleep } from '@taskhook/core-retry';
import type { TaskLifecycle, TaskRecord } from '@taskhook/core-tasks';

import { processTask, type TaskOutcome } from './process-task.js';
import type { ExecutionEngine, ResultPoster } from './types.js';

export const DEFAULT_DEQUEUE_TIMEOUT_MS = 5_000;
export const DEFAULT_HEARTBEAT_MS = 60_000;
export const DEFAULT_ERROR_BACKOFF_MS = 1_000;

function yieldToEventLoop(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export interface WorkerPoolOptions {
  queue: TaskQueue;
  lifecycle: TaskLifecycle;
  engine: ExecutionEngine;
  poster?: ResultPoster;
  /** Records posted ids so the resulting webhooks are skipped. */
  loopGuard?: LoopGuard;
  logger?: Logger;
  /** @default 1 */
  concurrency?: number;
  /** @default 5000 */
  dequeueTimeoutMs?: number;
  /** Lease renewal interval while the engine runs. Keep it below the visibility timeout. @default 60000 */
  heartbeatMs?: number;
  /** Pause after a failed dequeue. @default 1000 */
  errorBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type WorkerPoolStats = Record<TaskOutcome, number> & { active: number };

export interface WorkerPool {
  start(): void;
  /** Stop taking work and wait for in-flight tasks to finish. */
  stop(): Promise<void>;
  /**
   * Cancel a task. Queued tasks are dropped when dequeued; a task running in
   * this pool has its engine signal aborted.
   */
  cancel(taskId: string): Promise<TaskRecord>;
  stats(): WorkerPoolStats;
  readonly running: boolean;
}

export function createWorkerPool(options: WorkerPoolOptions): WorkerPool {
  const { queue, lifecycle, engine, poster, loopGuard } = options;
  const concurrency = options.concurrency ?? 1;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  const dequeueTimeoutMs = options.dequeueTimeoutMs ?? DEFAULT_DEQUEUE_TIMEOUT_MS;
  const heartbeatMs = options.heartbeatMs ?? DEFAULT_HEARTBEAT_MS;
  const errorBackoffMs = options.errorBackoffMs ?? DEFAULT_ERROR_BACKOFF_MS;
  const wait = options.sleep ?? sleep;
  const baseLogger = (options.logger ?? createLogger({ service: 'worker' })).child({ component: 'worker-pool' });

  const controllers = new Map<string, AbortController>();
  const counters: Record<TaskOutcome, number> = { completed: 0, failed: 0, skipped: 0, cancelled: 0 };
  let loops: Array<Promise<void>> = [];
  let stopping = false;
  let running = false;

  /** Resolves with false when the dequeue timed out. */
  const handle = async (workerId: number, logger: Logger): Promise<boolean> => {
    const message = await queue.dequeue(dequeueTimeoutMs);
    if (!message) {
      return false;
    }

    const taskLogger = logger.child({
      taskId: message.taskId,
      provider: message.provider,
      installationId: message.installationId
    });
    const controller = new AbortController();
    controllers.set(message.taskId, controller);

    try {
      const outcome = await processTask(message, {
        queue,
        lifecycle,
        engine,
        poster,
        loopGuard,
        logger: taskLogger,
        heartbeatMs,
        signal: controller.signal
      });
      counters[outcome] += 1;
    } catch (error) {
      counters.failed += 1;
      taskLogger.error('Task processing failed, dead-lettering message', { workerId, ...describeError(error) });
      await queue.reject(message.taskId, false).catch((rejectError: unknown) => {
        taskLogger.error('Could not reject message', describeError(rejectError));
      });
    } finally {
      controllers.delete(message.taskId);
    }
    return true;
  };

  const runLoop = async (workerId: number): Promise<void> => {
    const logger = baseLogger.child({ workerId });
    logger.debug('Worker loop started');
    while (!stopping) {
      try {
        const handled = await handle(workerId, logger);
        if (!handled) {
          // A closed queue answers at once; give timers and I/O a turn.
          await yieldToEventLoop();
        }
      } catch (error) {
        logger.error('Dequeue failed', describeError(error));
        await wait(errorBackoffMs);
      }
    }
    logger.debug('Worker loop stopped');
  };

  return {
    get running() {
      return running;
    },

    start() {
      if (running) {
        return;
      }
      stopping = false;
      running = true;
      loops = Array.from({ length: concurrency }, (_, index) => runLoop(index + 1));
      baseLogger.info('Worker pool started', { concurrency });
    },

    async stop() {
      if (!running) {
        return;
      }
      stopping = true;
      baseLogger.info('Worker pool stopping', { inFlight: controllers.size });
      await Promise.all(loops);
      loops = [];
      running = false;
      baseLogger.info('Worker pool stopped');
    },

    async cancel(taskId) {
      const cancelled = await lifecycle.cancel(taskId);
      const controller = controllers.get(taskId);
      if (controller) {
        controller.abort();
        baseLogger.info('Aborted running task', { taskId });
      }
      return cancelled;
    },

    stats() {
      return { ...counters, active: controllers.size };
    }
  };
}
