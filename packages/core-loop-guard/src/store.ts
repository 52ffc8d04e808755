/**
 * Storage for ids of messages the system posted itself.
 * All methods are async to support both in-memory and shared stores.
 */
export interface SelfPostedStore {
  /** Remember `key` for `ttlMs` milliseconds. Re-marking restarts the window. */
  mark: (key: string, ttlMs: number) => Promise<void>;
  has: (key: string) => Promise<boolean>;
}

export interface InMemorySelfPostedStoreOptions {
  now?: () => number;
}

/**
 * In-memory store with lazy expiry.
 * Suitable for single-instance deployments or testing; the window does not
 * survive a restart.
 */
export class InMemorySelfPostedStore implements SelfPostedStore {
  private readonly entries = new Map<string, number>();
  private readonly now: () => number;

  constructor(options: InMemorySelfPostedStoreOptions = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  async mark(key: string, ttlMs: number): Promise<void> {
    this.entries.set(key, this.now() + ttlMs);
  }

  async has(key: string): Promise<boolean> {
    const expiresAt = this.entries.get(key);
    if (expiresAt === undefined) {
      return false;
    }
    if (expiresAt <= this.now()) {
      this.entries.delete(key);
      return false;
    }
    return true;
  }

  /** Entries currently held, expired ones included until next looked up. */
  get size(): number {
    return this.entries.size;
  }
}
