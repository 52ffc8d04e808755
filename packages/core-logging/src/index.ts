export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LoggerContext = {
  service?: string;
  correlationId?: string;
  provider?: string;
  organizationId?: string;
  installationId?: string;
  taskId?: string;
  [key: string]: unknown;
};

export type Logger = {
  debug: (message: string, context?: LoggerContext) => void;
  info: (message: string, context?: LoggerContext) => void;
  warn: (message: string, context?: LoggerContext) => void;
  error: (message: string, context?: LoggerContext) => void;
  child: (context: LoggerContext) => Logger;
};

export type LoggerOptions = {
  /** Entries below this level are dropped. Defaults to LOG_LEVEL or 'info'. */
  level?: LogLevel;
  /** Replaces console.log, mostly for tests. */
  sink?: (line: string) => void;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

/**
 * Context keys whose values never reach the log stream.
 * Matched case-insensitively against the key name.
 */
const REDACTED_KEYS = new Set([
  'accesstoken',
  'refreshtoken',
  'webhooksecret',
  'secret',
  'authorization',
  'password'
]);

export const REDACTED = '[redacted]';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

function resolveLevel(level?: LogLevel): LogLevel {
  if (level) {
    return level;
  }
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

function redact(value: unknown, depth = 0): unknown {
  if (depth > 4 || value === null || typeof value !== 'object') {
    return value;
  }
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, depth + 1));
  }

  return Object.fromEntries(
    Object.entries(value).map(([key, nested]) => [
      key,
      REDACTED_KEYS.has(key.toLowerCase()) ? REDACTED : redact(nested, depth + 1)
    ])
  );
}

function serializeEntry(level: LogLevel, message: string, context: LoggerContext) {
  const entry = {
    level,
    message,
    timestamp: new Date().toISOString(),
    ...context
  };

  const present = Object.entries(entry).filter(([, value]) => value !== undefined && value !== null);
  return redact(Object.fromEntries(present));
}

export function createLogger(baseContext: LoggerContext = {}, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[resolveLevel(options.level)];
  // Every level goes to stdout; the level travels inside the JSON payload.
  const sink = options.sink ?? ((line: string) => console.log(line));

  const write = (level: LogLevel, message: string, context?: LoggerContext) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    sink(JSON.stringify(serializeEntry(level, message, { ...baseContext, ...context })));
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    child: (context) => createLogger({ ...baseContext, ...context }, options)
  };
}

/**
 * Logger that drops everything. Handy as a default for library code under test.
 */
export function createSilentLogger(): Logger {
  const noop = () => {};
  const silent: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => silent
  };
  return silent;
}

/**
 * Error fields suitable for a log context.
 */
export function describeError(error: unknown): { error: string; errorName?: string; stack?: string } {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name, stack: error.stack };
  }
  return { error: String(error) };
}
