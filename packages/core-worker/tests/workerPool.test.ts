import { describe, expect, it, vi } from 'vitest';

import { createSilentLogger } from '@taskhook/core-logging';
import { InMemorySelfPostedStore, LoopGuard } from '@taskhook/core-loop-guard';
import { buildTaskMessage, InMemoryTaskQueue, TaskPriority, type TaskMessage } from '@taskhook/core-queue';
import { InMemoryTaskRecordStore, TaskLifecycle } from '@taskhook/core-tasks';

import {
  createWorkerPool,
  type ExecutionEngine,
  type ExecutionResult,
  type ResultPoster,
  type WorkerPool,
  type WorkerPoolOptions
} from '../src/index.js';

function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

function setup(execute: ExecutionEngine['execute'], overrides: Partial<WorkerPoolOptions> = {}) {
  const queue = new InMemoryTaskQueue();
  const lifecycle = new TaskLifecycle({ store: new InMemoryTaskRecordStore() });
  const loopGuard = new LoopGuard(new InMemorySelfPostedStore());
  const engine = { execute: vi.fn<ExecutionEngine['execute']>(execute) };
  const poster = { post: vi.fn<ResultPoster['post']>().mockResolvedValue({ externalId: 'comment-1' }) };
  const pool = createWorkerPool({
    queue,
    lifecycle,
    engine,
    poster,
    loopGuard,
    logger: createSilentLogger(),
    dequeueTimeoutMs: 20,
    ...overrides
  });

  const submit = async (inputMessage = 'review PR 42', priority: TaskPriority = TaskPriority.NORMAL) => {
    const message = buildTaskMessage({
      installationId: 'inst-000000000001',
      provider: 'github',
      inputMessage,
      priority
    });
    await lifecycle.create(message);
    await queue.enqueue(message);
    return message;
  };

  return { queue, lifecycle, loopGuard, engine, poster, pool, submit };
}

const ok: ExecutionResult = { success: true, output: 'LGTM', tokensUsed: 1200, costUsd: 0.04 };

async function settle(pool: WorkerPool, expected: number): Promise<void> {
  await vi.waitFor(() => {
    const { completed, failed, skipped, cancelled } = pool.stats();
    expect(completed + failed + skipped + cancelled).toBe(expected);
  });
  await pool.stop();
}

describe('createWorkerPool', () => {
  it('runs a task to COMPLETED, posts the result and acknowledges it', async () => {
    const { pool, submit, lifecycle, queue, poster, loopGuard, engine } = setup(async () => ok);
    const message = await submit();

    pool.start();
    await settle(pool, 1);

    const record = await lifecycle.get(message.taskId);
    expect(record).toMatchObject({ status: 'COMPLETED', output: 'LGTM', tokensUsed: 1200, costUsd: 0.04 });
    expect(record?.startedAt).toBeDefined();
    expect(engine.execute).toHaveBeenCalledWith(message, { signal: expect.any(AbortSignal) });
    expect(poster.post).toHaveBeenCalledWith(message, record);
    expect(await loopGuard.scoped('github').isSelfPosted('comment-1')).toBe(true);
    expect(await queue.inFlight()).toBe(0);
    expect(await queue.length()).toBe(0);
    expect(pool.stats()).toEqual({ completed: 1, failed: 0, skipped: 0, cancelled: 0, active: 0 });
  });

  it('records FAILED when the engine reports failure', async () => {
    const { pool, submit, lifecycle, poster } = setup(async () => ({
      success: false,
      output: '',
      error: 'tests did not pass'
    }));
    const message = await submit();

    pool.start();
    await settle(pool, 1);

    const record = await lifecycle.get(message.taskId);
    expect(record).toMatchObject({ status: 'FAILED', error: 'tests did not pass' });
    expect(record?.output).toBeUndefined();
    expect(poster.post).toHaveBeenCalledWith(message, record);
  });

  it('records FAILED with the thrown message when the engine throws', async () => {
    const { pool, submit, lifecycle, queue } = setup(async () => {
      throw new Error('sandbox crashed');
    });
    const message = await submit();

    pool.start();
    await settle(pool, 1);

    expect(await lifecycle.get(message.taskId)).toMatchObject({ status: 'FAILED', error: 'sandbox crashed' });
    expect(await queue.inFlight()).toBe(0);
    expect(queue.deadLetters()).toEqual([]);
  });

  it('drops messages whose task was cancelled while queued', async () => {
    const { pool, submit, lifecycle, queue, engine } = setup(async () => ok);
    const message = await submit();
    await lifecycle.cancel(message.taskId);

    pool.start();
    await settle(pool, 1);

    expect(engine.execute).not.toHaveBeenCalled();
    expect(pool.stats().skipped).toBe(1);
    expect(await queue.inFlight()).toBe(0);
  });

  it('keeps the task COMPLETED when posting fails', async () => {
    const { pool, submit, lifecycle, queue, poster, loopGuard } = setup(async () => ok);
    poster.post.mockRejectedValue(new Error('github 502'));
    const message = await submit();

    pool.start();
    await settle(pool, 1);

    expect((await lifecycle.get(message.taskId))?.status).toBe('COMPLETED');
    expect(await queue.inFlight()).toBe(0);
    expect(await loopGuard.scoped('github').isSelfPosted('comment-1')).toBe(false);
  });

  it('takes higher priority work first', async () => {
    const order: string[] = [];
    const { pool, submit } = setup(async (task: TaskMessage) => {
      order.push(task.inputMessage);
      return ok;
    });
    await submit('low', TaskPriority.LOW);
    await submit('normal', TaskPriority.NORMAL);
    await submit('critical', TaskPriority.CRITICAL);

    pool.start();
    await settle(pool, 3);

    expect(order).toEqual(['critical', 'normal', 'low']);
  });

  it('runs up to `concurrency` tasks at once', async () => {
    const gate = deferred<ExecutionResult>();
    const { pool, submit, engine } = setup(() => gate.promise, { concurrency: 2 });
    await submit('first');
    await submit('second');
    await submit('third');

    pool.start();
    await vi.waitFor(() => expect(engine.execute).toHaveBeenCalledTimes(2));
    expect(pool.stats().active).toBe(2);

    gate.resolve(ok);
    await settle(pool, 3);
    expect(pool.stats().completed).toBe(3);
  });

  it('extends the lease while the engine runs', async () => {
    const gate = deferred<ExecutionResult>();
    const { pool, submit, queue } = setup(() => gate.promise, { heartbeatMs: 5 });
    const extendLease = vi.spyOn(queue, 'extendLease');
    const message = await submit();

    pool.start();
    await vi.waitFor(() => expect(extendLease).toHaveBeenCalledTimes(2));
    expect(extendLease).toHaveBeenCalledWith(message.taskId);

    gate.resolve(ok);
    await settle(pool, 1);
    const calls = extendLease.mock.calls.length;
    await new Promise((resolve) => setTimeout(resolve, 20));
    expect(extendLease).toHaveBeenCalledTimes(calls);
  });

  it('aborts a running task on cancel and keeps it CANCELLED', async () => {
    const { pool, submit, lifecycle, poster, engine, queue } = setup(
      (_task, { signal }) =>
        new Promise<ExecutionResult>((resolve) => {
          signal.addEventListener('abort', () => resolve({ success: false, output: '', error: 'aborted' }));
        })
    );
    const message = await submit();

    pool.start();
    await vi.waitFor(() => expect(engine.execute).toHaveBeenCalledTimes(1));
    const cancelled = await pool.cancel(message.taskId);
    await settle(pool, 1);

    expect(cancelled.status).toBe('CANCELLED');
    expect((await lifecycle.get(message.taskId))?.status).toBe('CANCELLED');
    expect(pool.stats().cancelled).toBe(1);
    expect(poster.post).not.toHaveBeenCalled();
    expect(await queue.inFlight()).toBe(0);
  });

  it('recreates a missing task record from the message', async () => {
    const { pool, queue, lifecycle } = setup(async () => ok);
    const message = buildTaskMessage({
      installationId: 'inst-000000000001',
      provider: 'slack',
      inputMessage: 'summarize',
      priority: TaskPriority.HIGH
    });
    await queue.enqueue(message);

    pool.start();
    await settle(pool, 1);

    expect(await lifecycle.get(message.taskId)).toMatchObject({ status: 'COMPLETED', provider: 'slack' });
  });

  it('dead-letters a message when processing itself fails', async () => {
    const { pool, submit, lifecycle, queue } = setup(async () => ok);
    vi.spyOn(lifecycle, 'start').mockRejectedValue(new Error('store offline'));
    const message = await submit();

    pool.start();
    await settle(pool, 1);

    expect(pool.stats().failed).toBe(1);
    expect(queue.deadLetters().map((entry) => entry.message.taskId)).toEqual([message.taskId]);
  });

  it('waits for in-flight work when stopping', async () => {
    const gate = deferred<ExecutionResult>();
    const { pool, submit, lifecycle, engine } = setup(() => gate.promise);
    const message = await submit();

    pool.start();
    await vi.waitFor(() => expect(engine.execute).toHaveBeenCalledTimes(1));
    const stopped = pool.stop();
    gate.resolve(ok);
    await stopped;

    expect(pool.running).toBe(false);
    expect((await lifecycle.get(message.taskId))?.status).toBe('COMPLETED');
  });

  it('leaves the engine signal untouched when stopping', async () => {
    const gate = deferred<ExecutionResult>();
    let seen: AbortSignal | undefined;
    const { pool, submit, engine } = setup((_task, { signal }) => {
      seen = signal;
      return gate.promise;
    });
    await submit();

    pool.start();
    await vi.waitFor(() => expect(engine.execute).toHaveBeenCalledTimes(1));
    const stopped = pool.stop();
    expect(seen?.aborted).toBe(false);
    gate.resolve(ok);
    await stopped;

    expect(seen?.aborted).toBe(false);
    expect(pool.stats().completed).toBe(1);
  });

  it('keeps polling after a failed dequeue', async () => {
    const { pool, submit, queue, lifecycle } = setup(async () => ok, { errorBackoffMs: 1 });
    const original = queue.dequeue.bind(queue);
    vi.spyOn(queue, 'dequeue').mockRejectedValueOnce(new Error('connection reset')).mockImplementation(original);
    const message = await submit();

    pool.start();
    await settle(pool, 1);

    expect((await lifecycle.get(message.taskId))?.status).toBe('COMPLETED');
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => setup(async () => ok, { concurrency: 0 })).toThrow(RangeError);
  });
});
