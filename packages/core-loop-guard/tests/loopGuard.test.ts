import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { DEFAULT_LOOP_GUARD_TTL_MS, InMemorySelfPostedStore, LoopGuard } from '../src/index.js';

describe('LoopGuard', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-03-01T12:00:00.000Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('suppresses a recorded id within the window and forgets it afterwards', async () => {
    const guard = new LoopGuard(new InMemorySelfPostedStore(), { ttlMs: 60_000 });

    await guard.recordSelfPosted('comment-1');
    expect(await guard.isSelfPosted('comment-1')).toBe(true);

    vi.advanceTimersByTime(59_999);
    expect(await guard.isSelfPosted('comment-1')).toBe(true);

    vi.advanceTimersByTime(1);
    expect(await guard.isSelfPosted('comment-1')).toBe(false);
  });

  it('defaults to a one hour window', async () => {
    const guard = new LoopGuard(new InMemorySelfPostedStore());
    expect(guard.ttlMs).toBe(DEFAULT_LOOP_GUARD_TTL_MS);

    await guard.recordSelfPosted('comment-1');
    vi.advanceTimersByTime(DEFAULT_LOOP_GUARD_TTL_MS - 1);
    expect(await guard.isSelfPosted('comment-1')).toBe(true);
    vi.advanceTimersByTime(1);
    expect(await guard.isSelfPosted('comment-1')).toBe(false);
  });

  it('drops expired entries lazily on lookup', async () => {
    const store = new InMemorySelfPostedStore();
    const guard = new LoopGuard(store, { ttlMs: 1_000 });

    await guard.recordSelfPosted('comment-1');
    vi.advanceTimersByTime(5_000);
    expect(store.size).toBe(1);

    await guard.isSelfPosted('comment-1');
    expect(store.size).toBe(0);
  });

  it('keeps providers apart when scoped', async () => {
    const store = new InMemorySelfPostedStore();
    const guard = new LoopGuard(store);

    await guard.scoped('github').recordSelfPosted('1001');

    expect(await guard.scoped('github').isSelfPosted('1001')).toBe(true);
    expect(await guard.scoped('jira').isSelfPosted('1001')).toBe(false);
    expect(await guard.isSelfPosted('1001')).toBe(false);
  });

  it('writes namespaced keys to the store', async () => {
    const store = { mark: vi.fn().mockResolvedValue(undefined), has: vi.fn().mockResolvedValue(false) };
    const guard = new LoopGuard(store, { ttlMs: 500 });

    await guard.scoped('slack').recordSelfPosted('1700000000.000100');
    await guard.recordSelfPosted('plain');

    expect(store.mark).toHaveBeenNthCalledWith(1, 'slack:posted:1700000000.000100', 500);
    expect(store.mark).toHaveBeenNthCalledWith(2, 'posted:plain', 500);
  });

  it('ignores missing ids', async () => {
    const store = { mark: vi.fn().mockResolvedValue(undefined), has: vi.fn().mockResolvedValue(true) };
    const guard = new LoopGuard(store);

    await guard.recordSelfPosted('');
    expect(await guard.isSelfPosted(undefined)).toBe(false);
    expect(await guard.isSelfPosted('')).toBe(false);
    expect(store.mark).not.toHaveBeenCalled();
    expect(store.has).not.toHaveBeenCalled();
  });

  it('rejects a non-positive TTL', () => {
    expect(() => new LoopGuard(new InMemorySelfPostedStore(), { ttlMs: 0 })).toThrow(RangeError);
  });
});
