/**
 * Redis-backed task queue shared by every gateway and worker process.
 *
 * Layout (all keys under `keyPrefix`):
 * - `pending`   sorted set of task ids, score = priority band + INCR sequence
 * - `messages`  hash task id -> encoded message
 * - `leases`    sorted set of in-flight task ids, score = lease expiry (ms)
 * - `scores`    hash task id -> original pending score, kept while in flight
 * - `sequence`  counter
 * - `ready`     list of wake-up tokens, one per id made pending
 * - `dead`      list of dead-lettered encoded messages
 *
 * Taking the head of `pending` and leasing it run as one script, so a failed
 * call leaves the id either pending or leased. Idle consumers block on
 * `BLPOP ready` and claim again when a token arrives.
 */

import { createSilentLogger, describeError, type Logger } from '@taskhook/core-logging';

import { QueueClosedError, QueueUnavailableError, UnknownTaskError } from './errors.js';
import { decodeTaskMessage, encodeTaskMessage, type TaskMessage } from './message.js';
import { DEFAULT_VISIBILITY_TIMEOUT_MS, type TaskQueue } from './queue.js';

/** Scores are `priority * PRIORITY_BAND + sequence`; exact while the sequence stays below the band. */
export const PRIORITY_BAND = 1e15;

/**
 * Minimal Redis client surface. The gateway adapts ioredis to it.
 */
export interface QueueRedisClient {
  incr(key: string): Promise<number>;
  /** @returns `[key, element]`, or null on timeout */
  blpop(key: string, timeoutSeconds: number): Promise<[string, string] | null>;
  zcard(key: string): Promise<number>;
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  eval(script: string, numKeys: number, ...args: string[]): Promise<unknown>;
}

export interface RedisTaskQueueOptions {
  client: QueueRedisClient;
  /** @default 'taskhook:queue:' */
  keyPrefix?: string;
  /** @default 300000 (5 minutes) */
  visibilityTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
}

/** KEYS: messages, pending, ready. ARGV: task id, encoded message, score. */
export const ENQUEUE_SCRIPT = `
redis.call('HSET', KEYS[1], ARGV[1], ARGV[2])
redis.call('ZADD', KEYS[2], ARGV[3], ARGV[1])
redis.call('RPUSH', KEYS[3], '1')
return 1
`;

/**
 * KEYS: pending, leases, scores, messages, ready. ARGV: lease expiry, '1' when
 * the caller already took a wake-up token. Returns `{id, message}` or nil when
 * nothing is pending; `message` is nil when the hash lost it.
 */
export const CLAIM_SCRIPT = `
local head = redis.call('ZRANGE', KEYS[1], 0, 0, 'WITHSCORES')
if #head == 0 then
  redis.call('DEL', KEYS[5])
  return false
end
local id = head[1]
redis.call('ZREM', KEYS[1], id)
redis.call('ZADD', KEYS[2], ARGV[1], id)
redis.call('HSET', KEYS[3], id, head[2])
if ARGV[2] ~= '1' then redis.call('LPOP', KEYS[5]) end
if redis.call('ZCARD', KEYS[1]) == 0 then redis.call('DEL', KEYS[5]) end
return {id, redis.call('HGET', KEYS[4], id)}
`;

/** KEYS: leases, scores, messages. ARGV: task id. Returns 0 when not in flight. */
export const ACKNOWLEDGE_SCRIPT = `
if redis.call('ZREM', KEYS[1], ARGV[1]) == 0 then return 0 end
redis.call('HDEL', KEYS[2], ARGV[1])
redis.call('HDEL', KEYS[3], ARGV[1])
return 1
`;

/** KEYS: leases, scores, pending, ready. ARGV: task id. Returns 0 when not in flight. */
export const REQUEUE_SCRIPT = `
if redis.call('ZREM', KEYS[1], ARGV[1]) == 0 then return 0 end
local score = redis.call('HGET', KEYS[2], ARGV[1])
redis.call('ZADD', KEYS[3], score, ARGV[1])
redis.call('HDEL', KEYS[2], ARGV[1])
redis.call('RPUSH', KEYS[4], '1')
return 1
`;

/** KEYS: leases, scores, messages, dead. ARGV: task id. Returns 0 when not in flight. */
export const DEAD_LETTER_SCRIPT = `
if redis.call('ZREM', KEYS[1], ARGV[1]) == 0 then return 0 end
local message = redis.call('HGET', KEYS[3], ARGV[1])
if message then redis.call('RPUSH', KEYS[4], message) end
redis.call('HDEL', KEYS[2], ARGV[1])
redis.call('HDEL', KEYS[3], ARGV[1])
return 1
`;

/** KEYS: leases. ARGV: task id, new expiry. Returns 0 when not in flight. */
export const EXTEND_LEASE_SCRIPT = `
if not redis.call('ZSCORE', KEYS[1], ARGV[1]) then return 0 end
redis.call('ZADD', KEYS[1], ARGV[2], ARGV[1])
return 1
`;

/** KEYS: leases, scores, pending, ready. ARGV: now. Returns the number of reclaimed ids. */
export const REAP_SCRIPT = `
local expired = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[1])
for _, id in ipairs(expired) do
  local score = redis.call('HGET', KEYS[2], id)
  redis.call('ZREM', KEYS[1], id)
  redis.call('ZADD', KEYS[3], score, id)
  redis.call('HDEL', KEYS[2], id)
  redis.call('RPUSH', KEYS[4], '1')
end
return #expired
`;

export class RedisTaskQueue implements TaskQueue {
  private readonly client: QueueRedisClient;
  private readonly keys: Record<'pending' | 'messages' | 'leases' | 'scores' | 'sequence' | 'ready' | 'dead', string>;
  private readonly visibilityTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private closed = false;

  constructor(options: RedisTaskQueueOptions) {
    const prefix = options.keyPrefix ?? 'taskhook:queue:';
    this.client = options.client;
    this.keys = {
      pending: `${prefix}pending`,
      messages: `${prefix}messages`,
      leases: `${prefix}leases`,
      scores: `${prefix}scores`,
      sequence: `${prefix}sequence`,
      ready: `${prefix}ready`,
      dead: `${prefix}dead`
    };
    this.visibilityTimeoutMs = options.visibilityTimeoutMs ?? DEFAULT_VISIBILITY_TIMEOUT_MS;
    this.now = options.now ?? (() => Date.now());
    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'task-queue' });
  }

  async enqueue(message: TaskMessage): Promise<void> {
    if (this.closed) {
      throw new QueueClosedError();
    }
    await this.call('enqueue', async () => {
      const sequence = await this.client.incr(this.keys.sequence);
      await this.client.eval(
        ENQUEUE_SCRIPT,
        3,
        this.keys.messages,
        this.keys.pending,
        this.keys.ready,
        message.taskId,
        encodeTaskMessage(message),
        String(message.priority * PRIORITY_BAND + sequence)
      );
    });
    this.logger.debug('Task enqueued', { taskId: message.taskId, priority: message.priority });
  }

  async dequeue(timeoutMs: number): Promise<TaskMessage | undefined> {
    if (this.closed) {
      return undefined;
    }
    let claimed = await this.claim(false);
    if (!claimed) {
      // BLPOP treats 0 as "block forever".
      const timeoutSeconds = Math.max(timeoutMs, 1) / 1000;
      const signalled = await this.call('dequeue', () => this.client.blpop(this.keys.ready, timeoutSeconds));
      if (!signalled || this.closed) {
        return undefined;
      }
      claimed = await this.claim(true);
      if (!claimed) {
        return undefined;
      }
    }
    const { taskId, raw } = claimed;

    if (raw === undefined) {
      this.logger.error('Dequeued task has no stored message', { taskId });
      await this.reject(taskId, false);
      return undefined;
    }

    try {
      return decodeTaskMessage(raw);
    } catch (error) {
      this.logger.error('Dequeued task message is corrupt, dead-lettering', { taskId, ...describeError(error) });
      await this.reject(taskId, false);
      return undefined;
    }
  }

  async acknowledge(taskId: string): Promise<void> {
    const outcome = await this.call('acknowledge', () =>
      this.client.eval(ACKNOWLEDGE_SCRIPT, 3, this.keys.leases, this.keys.scores, this.keys.messages, taskId)
    );
    if (outcome !== 1) {
      throw new UnknownTaskError(taskId);
    }
  }

  async reject(taskId: string, requeue: boolean): Promise<void> {
    const outcome = await this.call('reject', () =>
      requeue
        ? this.client.eval(
            REQUEUE_SCRIPT,
            4,
            this.keys.leases,
            this.keys.scores,
            this.keys.pending,
            this.keys.ready,
            taskId
          )
        : this.client.eval(
            DEAD_LETTER_SCRIPT,
            4,
            this.keys.leases,
            this.keys.scores,
            this.keys.messages,
            this.keys.dead,
            taskId
          )
    );
    if (outcome !== 1) {
      throw new UnknownTaskError(taskId);
    }
    if (!requeue) {
      this.logger.warn('Task dead-lettered', { taskId });
    }
  }

  async length(): Promise<number> {
    return this.call('length', () => this.client.zcard(this.keys.pending));
  }

  async inFlight(): Promise<number> {
    return this.call('inFlight', () => this.client.zcard(this.keys.leases));
  }

  async extendLease(taskId: string): Promise<void> {
    const outcome = await this.call('extendLease', () =>
      this.client.eval(
        EXTEND_LEASE_SCRIPT,
        1,
        this.keys.leases,
        taskId,
        String(this.now() + this.visibilityTimeoutMs)
      )
    );
    if (outcome !== 1) {
      throw new UnknownTaskError(taskId);
    }
  }

  async reapExpired(): Promise<number> {
    const reclaimed = await this.call('reapExpired', () =>
      this.client.eval(
        REAP_SCRIPT,
        4,
        this.keys.leases,
        this.keys.scores,
        this.keys.pending,
        this.keys.ready,
        String(this.now())
      )
    );
    return typeof reclaimed === 'number' ? reclaimed : Number(reclaimed);
  }

  /** The client belongs to the caller and stays open. */
  async close(): Promise<void> {
    this.closed = true;
  }

  async deadLetters(): Promise<TaskMessage[]> {
    const raw = await this.call('deadLetters', () => this.client.lrange(this.keys.dead, 0, -1));
    return raw.map((entry) => decodeTaskMessage(entry));
  }

  /** Lease the head of `pending`, if any, in one script. */
  private async claim(tokenTaken: boolean): Promise<{ taskId: string; raw: string | undefined } | undefined> {
    const reply = await this.call('dequeue', () =>
      this.client.eval(
        CLAIM_SCRIPT,
        5,
        this.keys.pending,
        this.keys.leases,
        this.keys.scores,
        this.keys.messages,
        this.keys.ready,
        String(this.now() + this.visibilityTimeoutMs),
        tokenTaken ? '1' : '0'
      )
    );
    if (!Array.isArray(reply) || typeof reply[0] !== 'string') {
      return undefined;
    }
    const raw: unknown = reply[1];
    return { taskId: reply[0], raw: typeof raw === 'string' ? raw : undefined };
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw new QueueUnavailableError(`Queue ${operation} failed: ${error instanceof Error ? error.message : String(error)}`, {
        cause: error
      });
    }
  }
}
