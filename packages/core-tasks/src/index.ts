export {
  canTransition,
  createTaskRecord,
  InvalidTransitionError,
  isTerminal,
  TaskStatus,
  transition,
  type TaskRecord,
  type TransitionDetails
} from './state-machine.js';
export {
  DuplicateTaskError,
  InMemoryTaskRecordStore,
  TaskNotFoundError,
  type TaskRecordFilter,
  type TaskRecordStore
} from './store.js';
export {
  REPLACE_TASK_SCRIPT,
  RedisTaskRecordStore,
  TaskWriteConflictError,
  type RedisTaskRecordStoreOptions,
  type TaskRecordRedisClient
} from './redis-store.js';
export {
  TaskLifecycle,
  type CompletionDetails,
  type FailureDetails,
  type TaskLifecycleOptions
} from './lifecycle.js';
