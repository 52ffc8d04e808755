import type { TaskMessage } from '@taskhook/core-queue';
import type { TaskRecord } from '@taskhook/core-tasks';

export type ExecutionResult = {
  success: boolean;
  output: string;
  error?: string;
  tokensUsed?: number;
  costUsd?: number;
};

export type ExecuteOptions = {
  /** Aborted when the task is cancelled. `stop()` lets running tasks finish. */
  signal: AbortSignal;
};

/**
 * Runs the coding assistant for one task. Supplied by the host.
 */
export interface ExecutionEngine {
  execute(task: TaskMessage, options: ExecuteOptions): Promise<ExecutionResult>;
}

export type PostedResult = {
  /** Provider id of the comment or message that was posted. */
  externalId?: string;
};

/**
 * Writes the outcome back to the provider (PR comment, Slack reply...).
 * Receives the terminal record so it can word failures differently.
 */
export interface ResultPoster {
  post(task: TaskMessage, record: TaskRecord): Promise<PostedResult>;
}
