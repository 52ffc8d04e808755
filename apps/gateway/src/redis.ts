import { Redis } from 'ioredis';

import type { InstallationRedisClient } from '@taskhook/core-installations';
import { describeError, type Logger } from '@taskhook/core-logging';
import type { SelfPostedRedisClient } from '@taskhook/core-loop-guard';
import type { QueueRedisClient } from '@taskhook/core-queue';
import type { TaskRecordRedisClient } from '@taskhook/core-tasks';

const BOOT_TIMEOUT_MS = 5000;

export interface RedisConnections {
  /** Shared connection for ordinary commands. */
  client: Redis;
  /** Dedicated connection for BLPOP, which holds its socket while it waits. */
  blocking: Redis;
  close(): Promise<void>;
}

export interface ConnectRedisOptions {
  logger: Logger;
  /** Connect and PING before returning; boot fails when Redis is unreachable. */
  validateAtBoot: boolean;
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timeout after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

async function quietly(redis: Redis, logger: Logger): Promise<void> {
  try {
    await redis.quit();
  } catch (error) {
    logger.warn('Redis quit failed', describeError(error));
  }
}

export async function connectRedis(url: string, options: ConnectRedisOptions): Promise<RedisConnections> {
  const { logger } = options;
  const useTls = url.startsWith('rediss://');
  logger.info('Initializing Redis', { redisTls: useTls });

  const client = new Redis(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    enableOfflineQueue: true,
    lazyConnect: true,
    retryStrategy: (times: number) => Math.min(times * 500, 3000),
    ...(useTls && { tls: {} })
  });
  client.on('error', (err: Error) => {
    logger.error('Redis connection error', { error: err.message });
  });

  if (options.validateAtBoot) {
    try {
      await withTimeout(client.connect(), BOOT_TIMEOUT_MS, 'Redis connect');
      await client.ping();
      logger.info('Redis validated at boot (PING ok)');
    } catch (error) {
      const message = `Redis connection failed at boot: ${error instanceof Error ? error.message : String(error)}`;
      logger.error(message);
      await quietly(client, logger);
      throw new Error(message, { cause: error });
    }
  }

  const blocking = client.duplicate({ maxRetriesPerRequest: null });
  blocking.on('error', (err: Error) => {
    logger.error('Redis blocking connection error', { error: err.message });
  });

  return {
    client,
    blocking,
    close: async () => {
      await Promise.all([quietly(blocking, logger), quietly(client, logger)]);
    }
  };
}

// Adapters: ioredis onto the client surfaces the packages declare.

export function installationClient(redis: Redis): InstallationRedisClient {
  return {
    get: (key) => redis.get(key),
    set: (key, value, mode) => (mode === 'NX' ? redis.set(key, value, 'NX') : redis.set(key, value)),
    del: (key) => redis.del(key),
    sadd: (key, member) => redis.sadd(key, member),
    smembers: (key) => redis.smembers(key),
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args)
  };
}

export function queueClient(connections: Pick<RedisConnections, 'client' | 'blocking'>): QueueRedisClient {
  const { client, blocking } = connections;
  return {
    incr: (key) => client.incr(key),
    blpop: (key, timeoutSeconds) => blocking.blpop(key, timeoutSeconds),
    zcard: (key) => client.zcard(key),
    lrange: (key, start, stop) => client.lrange(key, start, stop),
    eval: (script, numKeys, ...args) => client.eval(script, numKeys, ...args)
  };
}

export function taskRecordClient(redis: Redis): TaskRecordRedisClient {
  return {
    get: (key) => redis.get(key),
    set: (key, value, mode) => (mode === 'NX' ? redis.set(key, value, 'NX') : redis.set(key, value)),
    sadd: (key, member) => redis.sadd(key, member),
    smembers: (key) => redis.smembers(key),
    eval: (script, numKeys, ...args) => redis.eval(script, numKeys, ...args)
  };
}

export function selfPostedClient(redis: Redis): SelfPostedRedisClient {
  return {
    set: (key, value, flag, ttlMs) => redis.set(key, value, flag, ttlMs),
    exists: (key) => redis.exists(key)
  };
}
