/**
 * Redis-backed self-posted store, so the suppression window survives process
 * restarts and is shared by every gateway and worker.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 *
 * const redis = new Redis(process.env.REDIS_URL);
 * const guard = new LoopGuard(new RedisSelfPostedStore({ client: redis }));
 * ```
 */

import type { SelfPostedStore } from './store.js';

/**
 * Minimal Redis client interface.
 * Compatible with ioredis.
 */
export interface SelfPostedRedisClient {
  /** SET with PX (TTL in milliseconds). */
  set(key: string, value: string, flag: 'PX', ttlMs: number): Promise<string | null>;
  /** @returns 1 if the key exists, 0 if not */
  exists(key: string): Promise<number>;
}

export interface RedisSelfPostedStoreOptions {
  client: SelfPostedRedisClient;

  /** @default 'taskhook:loop-guard:' */
  keyPrefix?: string;

  /**
   * Answer of `has` when Redis fails.
   * - 'open': report the id as self-posted, suppressing the event
   * - 'closed': report it as unknown, letting the event through
   * @default 'open'
   */
  failMode?: 'open' | 'closed';

  onError?: (error: Error, context: { key: string; operation: string }) => void;
}

export class RedisSelfPostedStore implements SelfPostedStore {
  private readonly client: SelfPostedRedisClient;
  private readonly keyPrefix: string;
  private readonly failMode: 'open' | 'closed';
  private readonly onError?: (error: Error, context: { key: string; operation: string }) => void;

  constructor(options: RedisSelfPostedStoreOptions) {
    this.client = options.client;
    this.keyPrefix = options.keyPrefix ?? 'taskhook:loop-guard:';
    this.failMode = options.failMode ?? 'open';
    this.onError = options.onError;
  }

  async mark(key: string, ttlMs: number): Promise<void> {
    await this.client.set(`${this.keyPrefix}${key}`, '1', 'PX', ttlMs);
  }

  async has(key: string): Promise<boolean> {
    const redisKey = `${this.keyPrefix}${key}`;
    try {
      return (await this.client.exists(redisKey)) > 0;
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      this.onError?.(err, { key: redisKey, operation: 'has' });
      return this.failMode === 'open';
    }
  }
}
