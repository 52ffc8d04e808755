import {
  COMPARE_AND_SET_SCRIPT,
  RELEASE_ACTIVE_SCRIPT,
  type InstallationRedisClient
} from '../../src/index.js';

/**
 * In-process stand-in for the handful of Redis commands the repository uses.
 * The two Lua scripts are emulated by identity.
 */
export class FakeInstallationRedis implements InstallationRedisClient {
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

  async del(key: string): Promise<number> {
    return this.strings.delete(key) ? 1 : 0;
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
    const [key = '', first = '', second = ''] = args;

    if (script === COMPARE_AND_SET_SCRIPT) {
      const current = this.strings.get(key);
      if (current === undefined) {
        return -1;
      }
      const decoded = JSON.parse(current) as { version: number };
      if (decoded.version !== Number(first)) {
        return 0;
      }
      this.strings.set(key, second);
      return 1;
    }

    if (script === RELEASE_ACTIVE_SCRIPT) {
      if (this.strings.get(key) === first) {
        this.strings.delete(key);
        return 1;
      }
      return 0;
    }

    throw new Error('FakeInstallationRedis: unknown script');
  }
}
