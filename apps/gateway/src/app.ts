import express, { type ErrorRequestHandler, type Express } from 'express';

import { createWebhookRoutes } from '@taskhook/adapter-express';
import {
  InMemoryInstallationRepository,
  RedisInstallationRepository,
  TokenService,
  type InstallationRepository,
  type Platform,
  type RefreshFunction
} from '@taskhook/core-installations';
import { createLogger, describeError, type Logger } from '@taskhook/core-logging';
import {
  InMemorySelfPostedStore,
  LoopGuard,
  RedisSelfPostedStore,
  type SelfPostedStore
} from '@taskhook/core-loop-guard';
import { InMemoryTaskQueue, RedisTaskQueue, startReaper, type TaskQueue } from '@taskhook/core-queue';
import { InMemoryTaskRecordStore, RedisTaskRecordStore, TaskLifecycle, type TaskRecordStore } from '@taskhook/core-tasks';
import { createWebhookRouter, WebhookRegistry, type EnqueueRetryOptions, type WebhookRouter } from '@taskhook/core-webhooks';
import { createWorkerPool, type ExecutionEngine, type ResultPoster, type WorkerPool } from '@taskhook/core-worker';
import { createGitHubHandler } from '@taskhook/provider-github';
import { createJiraHandler } from '@taskhook/provider-jira';
import { createSentryHandler } from '@taskhook/provider-sentry';
import { createSlackHandler } from '@taskhook/provider-slack';

import { loadConfig, type GatewayConfig } from './config.js';
import {
  connectRedis,
  installationClient,
  queueClient,
  selfPostedClient,
  taskRecordClient,
  type RedisConnections
} from './redis.js';

export const SERVICE_NAME = 'gateway';

export interface BuildAppOptions {
  /** Defaults to `loadConfig()` over `process.env`. */
  config?: GatewayConfig;
  logger?: Logger;
  repository?: InstallationRepository;
  queue?: TaskQueue;
  taskStore?: TaskRecordStore;
  selfPostedStore?: SelfPostedStore;
  refreshers?: Partial<Record<Platform, RefreshFunction>>;
  /** Required when `config.workerConcurrency` is above 0. */
  engine?: ExecutionEngine;
  poster?: ResultPoster;
  enqueueRetry?: EnqueueRetryOptions;
  /** Largest accepted webhook body. @default '1mb' */
  bodyLimit?: string | number;
  now?: () => Date;
}

export interface Gateway {
  app: Express;
  config: GatewayConfig;
  router: WebhookRouter;
  tokenService: TokenService;
  queue: TaskQueue;
  lifecycle: TaskLifecycle;
  loopGuard: LoopGuard;
  /** Present when in-process workers are configured. */
  workers?: WorkerPool;
  /** Stop workers and the reaper, close the queue, release Redis. */
  close(): Promise<void>;
}

interface Stores {
  repository: InstallationRepository;
  queue: TaskQueue;
  taskStore: TaskRecordStore;
  selfPostedStore: SelfPostedStore;
}

function createStores(
  config: GatewayConfig,
  options: BuildAppOptions,
  redis: RedisConnections | undefined,
  logger: Logger
): Stores {
  if (!redis) {
    logger.warn('REDIS_URL not configured - using in-memory stores', {
      nodeEnv: config.nodeEnv,
      warning: 'Installations, queue, task records and loop guard are local to this process'
    });
  }

  const repository =
    options.repository ??
    (redis ? new RedisInstallationRepository({ client: installationClient(redis.client) }) : new InMemoryInstallationRepository());

  const queue =
    options.queue ??
    (redis
      ? new RedisTaskQueue({
          client: queueClient(redis),
          visibilityTimeoutMs: config.queueVisibilityTimeoutMs,
          logger
        })
      : new InMemoryTaskQueue({ visibilityTimeoutMs: config.queueVisibilityTimeoutMs, logger }));

  const taskStore =
    options.taskStore ??
    (redis ? new RedisTaskRecordStore({ client: taskRecordClient(redis.client) }) : new InMemoryTaskRecordStore());

  const selfPostedStore =
    options.selfPostedStore ??
    (redis
      ? new RedisSelfPostedStore({
          client: selfPostedClient(redis.client),
          onError: (error, context) => {
            // context.key names a provider message id; keep it out of the logs.
            logger.error('Loop guard store operation failed', { error: error.message, operation: context.operation });
          }
        })
      : new InMemorySelfPostedStore());

  return { repository, queue, taskStore, selfPostedStore };
}

function createRegistry(config: GatewayConfig, logger: Logger): WebhookRegistry {
  const registry = new WebhookRegistry({ logger });
  const triggerLabels = config.agentLabels;
  registry.register('github', createGitHubHandler({ triggerLabels }));
  registry.register('jira', createJiraHandler({ triggerLabels }));
  registry.register('slack', createSlackHandler());
  registry.register('sentry', createSentryHandler());
  return registry;
}

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status >= 400 && error.status < 600 ? error.status : 500;
  }
  return 500;
}

function jsonErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, _req, res, _next) => {
    const status = errorStatus(error);
    if (status >= 500) {
      logger.error('Unhandled request error', describeError(error));
    }
    res.status(status).json({
      success: false,
      code: status === 413 ? 'PAYLOAD_TOO_LARGE' : status >= 500 ? 'INTERNAL_ERROR' : 'BAD_REQUEST',
      message: status >= 500 ? 'Internal error' : error instanceof Error ? error.message : 'Bad request'
    });
  };
}

/**
 * Wire stores, services, provider handlers and HTTP routes.
 *
 * With `REDIS_URL` set, installations, the queue, task records and the loop
 * guard live in Redis (validated with a PING at boot outside development); otherwise they are
 * in-memory. Injected stores win over both.
 */
export async function buildApp(options: BuildAppOptions = {}): Promise<Gateway> {
  const config = options.config ?? loadConfig();
  const logger = options.logger ?? createLogger({ service: SERVICE_NAME }, { level: config.logLevel });

  if (config.workerConcurrency > 0 && !options.engine) {
    throw new Error(`WORKER_CONCURRENCY=${config.workerConcurrency} needs an execution engine`);
  }

  const redis = config.redisUrl
    ? await connectRedis(config.redisUrl, {
        logger,
        validateAtBoot: config.nodeEnv === 'production' || config.nodeEnv === 'staging'
      })
    : undefined;

  const { repository, queue, taskStore, selfPostedStore } = createStores(config, options, redis, logger);
  const tokenService = new TokenService({ repository, refreshers: options.refreshers, logger });
  const lifecycle = new TaskLifecycle({ store: taskStore, logger, now: options.now });
  const loopGuard = new LoopGuard(selfPostedStore, { ttlMs: config.loopGuardTtlMs, logger });

  const router = createWebhookRouter({
    registry: createRegistry(config, logger),
    installations: tokenService,
    queue,
    lifecycle,
    loopGuard,
    logger,
    serviceName: SERVICE_NAME,
    enqueueRetry: options.enqueueRetry,
    verificationSecrets: config.slackSigningSecret ? { slack: config.slackSigningSecret } : {},
    now: options.now
  });

  const stopReaper = startReaper(queue, config.queueReaperIntervalMs, { logger });

  const workers = options.engine && config.workerConcurrency > 0
    ? createWorkerPool({
        queue,
        lifecycle,
        engine: options.engine,
        poster: options.poster,
        loopGuard,
        logger,
        concurrency: config.workerConcurrency
      })
    : undefined;
  workers?.start();

  const app = express();
  app.disable('x-powered-by');

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', service: SERVICE_NAME });
  });
  app.use('/webhooks', createWebhookRoutes(router, { limit: options.bodyLimit }));
  app.use(jsonErrorHandler(logger));

  logger.info('Gateway ready', {
    providers: router.health().providers,
    storage: redis ? 'redis' : 'memory',
    workers: config.workerConcurrency
  });

  return {
    app,
    config,
    router,
    tokenService,
    queue,
    lifecycle,
    loopGuard,
    workers,
    close: async () => {
      stopReaper();
      const draining = workers?.stop();
      await queue.close();
      await draining;
      await redis?.close();
    }
  };
}
