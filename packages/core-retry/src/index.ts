/**
 * Backoff policy configuration.
 */
export interface BackoffConfig {
  /** Initial delay in milliseconds */
  initialDelayMs: number;

  /** Maximum delay in milliseconds */
  maxDelayMs: number;

  /** Multiplier for exponential backoff */
  multiplier: number;

  /** Retries after the first attempt (total attempts = 1 + maxRetries) */
  maxRetries: number;

  /** Add jitter to prevent thundering herd */
  jitter: boolean;
}

export const DEFAULT_BACKOFF_CONFIG: BackoffConfig = {
  initialDelayMs: 200,
  maxDelayMs: 5000,
  multiplier: 2,
  maxRetries: 3,
  jitter: true
};

/**
 * Calculate the delay before retry number `attempt` (0-based).
 */
export function calculateBackoffDelay(attempt: number, config: Partial<BackoffConfig> = {}): number {
  const cfg = { ...DEFAULT_BACKOFF_CONFIG, ...config };
  const delay = Math.min(cfg.initialDelayMs * Math.pow(cfg.multiplier, attempt), cfg.maxDelayMs);

  if (cfg.jitter) {
    // ±25%
    const jitterFactor = 0.75 + Math.random() * 0.5;
    return Math.floor(delay * jitterFactor);
  }

  return delay;
}

export interface RetryContext {
  attempt: number;
  totalDelayMs: number;
  lastError?: Error;
  nextDelayMs?: number;
}

export interface RetryOptions extends Partial<BackoffConfig> {
  /** Return false to surface the error immediately. Defaults to `isRetryableError`. */
  shouldRetryError?: (error: Error) => boolean;
  onRetry?: (context: RetryContext) => void;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Errors opt out of retries by carrying `retryable: false`.
 */
export function isRetryableError(error: Error): boolean {
  const flag: unknown = Reflect.get(error, 'retryable');
  return flag !== false;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Execute a function with exponential backoff on failure.
 * The last error is rethrown once retries are exhausted.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const cfg = { ...DEFAULT_BACKOFF_CONFIG, ...options };
  const shouldRetryError = options.shouldRetryError ?? isRetryableError;
  const wait = options.sleep ?? sleep;
  const ctx: RetryContext = { attempt: 0, totalDelayMs: 0 };

  while (true) {
    try {
      return await fn(ctx.attempt);
    } catch (error) {
      const err = toError(error);
      ctx.lastError = err;

      if (ctx.attempt >= cfg.maxRetries || !shouldRetryError(err)) {
        throw err;
      }

      const delay = calculateBackoffDelay(ctx.attempt, cfg);
      ctx.nextDelayMs = delay;
      ctx.totalDelayMs += delay;
      ctx.attempt++;

      options.onRetry?.(ctx);

      await wait(delay);
    }
  }
}
