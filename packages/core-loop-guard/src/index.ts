import { createSilentLogger, type Logger } from '@taskhook/core-logging';

import type { SelfPostedStore } from './store.js';

export { InMemorySelfPostedStore, type InMemorySelfPostedStoreOptions, type SelfPostedStore } from './store.js';
export {
  RedisSelfPostedStore,
  type RedisSelfPostedStoreOptions,
  type SelfPostedRedisClient
} from './redis-store.js';

export const DEFAULT_LOOP_GUARD_TTL_MS = 60 * 60 * 1000;

export interface LoopGuardOptions {
  /** @default 3_600_000 (1 hour) */
  ttlMs?: number;
  logger?: Logger;
}

/**
 * Remembers the external ids of comments and messages the system posted so
 * that the webhooks they cause are not turned into new tasks.
 *
 * Ids are only unique per provider, so callers normally go through
 * `scoped(provider)`.
 */
export class LoopGuard {
  readonly ttlMs: number;
  private readonly store: SelfPostedStore;
  private readonly logger: Logger;
  private readonly namespace: string;

  constructor(store: SelfPostedStore, options: LoopGuardOptions = {}, namespace = '') {
    this.store = store;
    this.ttlMs = options.ttlMs ?? DEFAULT_LOOP_GUARD_TTL_MS;
    this.logger = options.logger ?? createSilentLogger();
    this.namespace = namespace;
    if (!Number.isFinite(this.ttlMs) || this.ttlMs <= 0) {
      throw new RangeError(`Loop guard TTL must be positive, got ${this.ttlMs}`);
    }
  }

  scoped(provider: string): LoopGuard {
    return new LoopGuard(this.store, { ttlMs: this.ttlMs, logger: this.logger }, provider);
  }

  async recordSelfPosted(externalId: string): Promise<void> {
    if (externalId.length === 0) {
      return;
    }
    await this.store.mark(this.keyFor(externalId), this.ttlMs);
    this.logger.debug('Recorded self-posted id', { provider: this.namespace || undefined, externalId });
  }

  async isSelfPosted(externalId: string | undefined): Promise<boolean> {
    if (!externalId) {
      return false;
    }
    return this.store.has(this.keyFor(externalId));
  }

  private keyFor(externalId: string): string {
    return this.namespace ? `${this.namespace}:posted:${externalId}` : `posted:${externalId}`;
  }
}
