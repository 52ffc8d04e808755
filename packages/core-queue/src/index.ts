export * from './message.js';
export { QueueClosedError, QueueUnavailableError, UnknownTaskError } from './errors.js';
export { DEFAULT_VISIBILITY_TIMEOUT_MS, startReaper, type ReaperOptions, type TaskQueue } from './queue.js';
export { InMemoryTaskQueue, type DeadLetter, type InMemoryTaskQueueOptions } from './memory-queue.js';
export {
  ACKNOWLEDGE_SCRIPT,
  CLAIM_SCRIPT,
  DEAD_LETTER_SCRIPT,
  ENQUEUE_SCRIPT,
  EXTEND_LEASE_SCRIPT,
  PRIORITY_BAND,
  REAP_SCRIPT,
  REQUEUE_SCRIPT,
  RedisTaskQueue,
  type QueueRedisClient,
  type RedisTaskQueueOptions
} from './redis-queue.js';
