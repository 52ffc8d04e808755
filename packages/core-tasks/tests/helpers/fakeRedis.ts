import { REPLACE_TASK_SCRIPT, type TaskRecordRedisClient } from '../../src/index.js';

/**
 * In-process stand-in for the Redis commands the task store uses.
 */
export class FakeTaskRedis implements TaskRecordRedisClient {
  readonly strings = new Map<string, string>();
  readonly sets = new Map<string, Set<string>>();

  async get(key: string): Promise<string | null> {
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string, mode?: 'NX'): Promise<string | null> {
    if (mode === 'NX' && this.strings.has(key)) {
      return null;
    }
    this.strings.set(key, value);
    return 'OK';
  }

  async sadd(key: string, member: string): Promise<number> {
    const members = this.sets.get(key) ?? new Set<string>();
    const added = members.has(member) ? 0 : 1;
    members.add(member);
    this.sets.set(key, members);
    return added;
  }

  async smembers(key: string): Promise<string[]> {
    return [...(this.sets.get(key) ?? [])];
  }

  async eval(script: string, _numKeys: number, ...args: string[]): Promise<unknown> {
    if (script !== REPLACE_TASK_SCRIPT) {
      throw new Error('FakeTaskRedis: unknown script');
    }
    const [key = '', expected = '', next = ''] = args;
    const current = this.strings.get(key);
    if (current === undefined) {
      return -1;
    }
    if (current !== expected) {
      return 0;
    }
    this.strings.set(key, next);
    return 1;
  }
}
