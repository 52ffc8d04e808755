import { describeError, type Logger } from '@taskhook/core-logging';
import type { LoopGuard } from '@taskhook/core-loop-guard';
import { UnknownTaskError, type TaskMessage, type TaskQueue } from '@taskhook/core-queue';
import { InvalidTransitionError, isTerminal, TaskStatus, type TaskLifecycle, type TaskRecord } from '@taskhook/core-tasks';

import type { ExecutionEngine, ExecutionResult, ResultPoster } from './types.js';

export type TaskOutcome = 'completed' | 'failed' | 'skipped' | 'cancelled';

export type ProcessTaskDeps = {
  queue: TaskQueue;
  lifecycle: TaskLifecycle;
  engine: ExecutionEngine;
  poster?: ResultPoster;
  loopGuard?: LoopGuard;
  logger: Logger;
  heartbeatMs: number;
  signal: AbortSignal;
};

async function ensureRecord(message: TaskMessage, deps: ProcessTaskDeps): Promise<TaskRecord> {
  const existing = await deps.lifecycle.get(message.taskId);
  if (existing) {
    return existing;
  }
  deps.logger.warn('Task record missing, recreating from message');
  return deps.lifecycle.create(message);
}

async function markRunning(record: TaskRecord, deps: ProcessTaskDeps): Promise<void> {
  switch (record.status) {
    case TaskStatus.QUEUED:
      await deps.lifecycle.start(record.taskId);
      return;
    case TaskStatus.WAITING_INPUT:
      await deps.lifecycle.resume(record.taskId);
      return;
    default:
      // RUNNING: a redelivery after the previous lease expired.
      deps.logger.warn('Re-running task whose lease expired', { status: record.status });
  }
}

function startHeartbeat(message: TaskMessage, deps: ProcessTaskDeps): () => void {
  const timer = setInterval(() => {
    void deps.queue.extendLease(message.taskId).catch((error: unknown) => {
      deps.logger.warn('Lease heartbeat failed', describeError(error));
    });
  }, deps.heartbeatMs);
  timer.unref?.();
  return () => clearInterval(timer);
}

async function execute(message: TaskMessage, deps: ProcessTaskDeps): Promise<ExecutionResult> {
  const stopHeartbeat = startHeartbeat(message, deps);
  try {
    return await deps.engine.execute(message, { signal: deps.signal });
  } catch (error) {
    deps.logger.error('Execution engine threw', describeError(error));
    return { success: false, output: '', error: error instanceof Error ? error.message : String(error) };
  } finally {
    stopHeartbeat();
  }
}

async function record(
  message: TaskMessage,
  result: ExecutionResult,
  deps: ProcessTaskDeps
): Promise<TaskRecord | undefined> {
  const { tokensUsed, costUsd } = result;
  try {
    return result.success
      ? await deps.lifecycle.complete(message.taskId, { output: result.output, tokensUsed, costUsd })
      : await deps.lifecycle.fail(message.taskId, {
          error: result.error ?? 'Execution failed',
          output: result.output || undefined,
          tokensUsed,
          costUsd
        });
  } catch (error) {
    if (error instanceof InvalidTransitionError) {
      // Cancelled while the engine ran; the cancellation stands.
      deps.logger.info('Task was cancelled during execution, discarding result');
      return undefined;
    }
    throw error;
  }
}

async function post(message: TaskMessage, finished: TaskRecord, deps: ProcessTaskDeps): Promise<void> {
  if (!deps.poster) {
    return;
  }
  try {
    const posted = await deps.poster.post(message, finished);
    if (posted.externalId && deps.loopGuard) {
      await deps.loopGuard.scoped(message.provider).recordSelfPosted(posted.externalId);
    }
    deps.logger.info('Result posted', { externalId: posted.externalId });
  } catch (error) {
    deps.logger.error('Result posting failed', describeError(error));
  }
}

async function acknowledge(message: TaskMessage, deps: ProcessTaskDeps): Promise<void> {
  try {
    await deps.queue.acknowledge(message.taskId);
  } catch (error) {
    if (!(error instanceof UnknownTaskError)) {
      throw error;
    }
    // The reaper got there first; the redelivered copy will find a terminal record.
    deps.logger.warn('Lease lost before acknowledge', { error: error.message });
  }
}

/**
 * Drive one dequeued message through RUNNING to a terminal state, post the
 * result and acknowledge the lease.
 */
export async function processTask(message: TaskMessage, deps: ProcessTaskDeps): Promise<TaskOutcome> {
  const current = await ensureRecord(message, deps);

  if (isTerminal(current.status)) {
    deps.logger.info('Task already finished, dropping message', { status: current.status });
    await acknowledge(message, deps);
    return 'skipped';
  }

  await markRunning(current, deps);
  deps.logger.info('Task started');

  const result = await execute(message, deps);
  const finished = await record(message, result, deps);

  if (!finished) {
    await acknowledge(message, deps);
    return 'cancelled';
  }

  deps.logger.info('Task finished', {
    status: finished.status,
    durationMs: finished.durationMs,
    tokensUsed: finished.tokensUsed,
    costUsd: finished.costUsd
  });

  await post(message, finished, deps);
  await acknowledge(message, deps);
  return finished.status === TaskStatus.COMPLETED ? 'completed' : 'failed';
}
