import { describe, expect, it } from 'vitest';

import { buildTaskMessage, TaskPriority } from '@taskhook/core-queue';

import {
  DuplicateTaskError,
  InMemoryTaskRecordStore,
  InvalidTransitionError,
  RedisTaskRecordStore,
  TaskLifecycle,
  TaskNotFoundError,
  type TaskRecordStore
} from '../src/index.js';

import { FakeTaskRedis } from './helpers/fakeRedis.js';

const stores: Array<[string, () => TaskRecordStore]> = [
  ['InMemoryTaskRecordStore', () => new InMemoryTaskRecordStore()],
  ['RedisTaskRecordStore', () => new RedisTaskRecordStore({ client: new FakeTaskRedis() })]
];

function setup(createStore: () => TaskRecordStore) {
  let clock = Date.parse('2026-03-01T12:00:00.000Z');
  const store = createStore();
  const lifecycle = new TaskLifecycle({ store, now: () => new Date(clock) });
  const advance = (ms: number) => {
    clock += ms;
  };
  const message = buildTaskMessage({
    installationId: 'inst-000000000001',
    provider: 'jira',
    inputMessage: 'triage PROJ-7',
    priority: TaskPriority.HIGH
  });
  return { store, lifecycle, advance, message };
}

describe.each(stores)('TaskLifecycle over %s', (_name, createStore) => {
  it('creates a QUEUED record from the message', async () => {
    const { lifecycle, message } = setup(createStore);

    const record = await lifecycle.create(message);

    expect(record).toEqual({
      taskId: message.taskId,
      installationId: 'inst-000000000001',
      provider: 'jira',
      inputMessage: 'triage PROJ-7',
      status: 'QUEUED',
      createdAt: '2026-03-01T12:00:00.000Z'
    });
    expect(await lifecycle.get(message.taskId)).toEqual(record);
    await expect(lifecycle.create(message)).rejects.toBeInstanceOf(DuplicateTaskError);
  });

  it('persists each step through to completion', async () => {
    const { lifecycle, advance, message } = setup(createStore);
    await lifecycle.create(message);

    advance(1_000);
    await lifecycle.start(message.taskId);
    advance(2_000);
    await lifecycle.awaitInput(message.taskId);
    advance(3_000);
    await lifecycle.resume(message.taskId);
    advance(4_000);
    const completed = await lifecycle.complete(message.taskId, { output: 'done', tokensUsed: 50, costUsd: 0.01 });

    expect(completed).toMatchObject({
      status: 'COMPLETED',
      startedAt: '2026-03-01T12:00:01.000Z',
      completedAt: '2026-03-01T12:00:10.000Z',
      durationMs: 9_000,
      output: 'done'
    });
    expect((await lifecycle.get(message.taskId))?.status).toBe('COMPLETED');
  });

  it('records failures', async () => {
    const { lifecycle, message } = setup(createStore);
    await lifecycle.create(message);
    await lifecycle.start(message.taskId);

    const failed = await lifecycle.fail(message.taskId, { error: 'timeout' });

    expect(failed).toMatchObject({ status: 'FAILED', error: 'timeout', durationMs: 0 });
  });

  it('cancels queued tasks and refuses to cancel finished ones', async () => {
    const { lifecycle, message } = setup(createStore);
    await lifecycle.create(message);

    expect((await lifecycle.cancel(message.taskId)).status).toBe('CANCELLED');
    await expect(lifecycle.cancel(message.taskId)).rejects.toBeInstanceOf(InvalidTransitionError);
    await expect(lifecycle.start(message.taskId)).rejects.toBeInstanceOf(InvalidTransitionError);
    expect((await lifecycle.get(message.taskId))?.status).toBe('CANCELLED');
  });

  it('raises TaskNotFoundError for unknown tasks', async () => {
    const { lifecycle } = setup(createStore);

    await expect(lifecycle.start('task-missing')).rejects.toBeInstanceOf(TaskNotFoundError);
    expect(await lifecycle.get('task-missing')).toBeUndefined();
  });

  it('lists records by status', async () => {
    const { lifecycle, message } = setup(createStore);
    const other = buildTaskMessage({
      installationId: 'inst-000000000002',
      provider: 'slack',
      inputMessage: 'hi',
      priority: TaskPriority.LOW
    });
    await lifecycle.create(message);
    await lifecycle.create(other);
    await lifecycle.start(other.taskId);

    expect((await lifecycle.list({ status: 'QUEUED' })).map((record) => record.taskId)).toEqual([message.taskId]);
    expect((await lifecycle.list({ installationId: 'inst-000000000002' })).length).toBe(1);
  });
});
