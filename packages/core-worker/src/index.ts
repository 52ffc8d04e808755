export type {
  ExecuteOptions,
  ExecutionEngine,
  ExecutionResult,
  PostedResult,
  ResultPoster
} from './types.js';
export { processTask, type ProcessTaskDeps, type TaskOutcome } from './process-task.js';
export {
  createWorkerPool,
  DEFAULT_DEQUEUE_TIMEOUT_MS,
  DEFAULT_ERROR_BACKOFF_MS,
  DEFAULT_HEARTBEAT_MS,
  type WorkerPool,
  type WorkerPoolOptions,
  type WorkerPoolStats
} from './pool.js';
