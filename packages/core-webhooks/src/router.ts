import { InstallationNotFoundError, type Installation, type Platform } from '@taskhook/core-installations';
import { createLogger, describeError, type Logger } from '@taskhook/core-logging';
import type { LoopGuard } from '@taskhook/core-loop-guard';
import { buildTaskMessage, QueueUnavailableError, type TaskMessage, type TaskQueue } from '@taskhook/core-queue';
import { withRetry, type RetryOptions } from '@taskhook/core-retry';
import { getHeader, SignatureValidationError } from '@taskhook/core-signature';
import type { TaskLifecycle } from '@taskhook/core-tasks';
import { ValidationError } from '@taskhook/core-validation';

import type { WebhookRegistry } from './registry.js';
import { PayloadParseError, type HeaderMap, type RawBody, type WebhookHandler } from './types.js';

/** The part of the token service the router needs. */
export type InstallationSource = {
  getActiveInstallation: (platform: Platform, organizationId: string) => Promise<Installation>;
};

export type EnqueueRetryOptions = Omit<RetryOptions, 'shouldRetryError' | 'onRetry'>;

export type WebhookRouterOptions = {
  registry: WebhookRegistry;
  installations: InstallationSource;
  queue: TaskQueue;
  lifecycle: TaskLifecycle;
  loopGuard?: LoopGuard;
  logger?: Logger;
  serviceName?: string;
  /** Backoff around `queue.enqueue`. */
  enqueueRetry?: EnqueueRetryOptions;
  /**
   * App-level secrets for verification handshakes, which name no tenant
   * (Slack `url_verification`). Keyed by provider.
   */
  verificationSecrets?: Partial<Record<string, string>>;
  now?: () => Date;
};

export type WebhookRouterRequest = {
  provider: string;
  headers: HeaderMap;
  rawBody: RawBody;
};

export type SkipReason = 'self_posted' | 'no_trigger';

export type AcceptedBody = { success: true; task_id: string; skipped: false; correlation_id: string };
export type SkippedBody = { success: true; skipped: true; reason: SkipReason; correlation_id: string };
export type ChallengeBody = { challenge: string; correlation_id: string };
export type ErrorBody = { success: false; code: string; message: string; correlation_id: string };
export type WebhookResponseBody = AcceptedBody | SkippedBody | ChallengeBody | ErrorBody;

export type WebhookRouterResponse = {
  status: number;
  body: WebhookResponseBody;
  headers: Record<string, string>;
};

export type HealthBody = { status: 'ok'; providers: string[] };

export type WebhookRouter = {
  handle: (request: WebhookRouterRequest) => Promise<WebhookRouterResponse>;
  health: () => HealthBody;
};

const DEFAULT_ENQUEUE_RETRY: EnqueueRetryOptions = {
  maxRetries: 3,
  initialDelayMs: 100,
  maxDelayMs: 2000
};

export function generateCorrelationId(): string {
  return `${Date.now().toString(36)}-${Math.random().toString(36).substring(2, 11)}`;
}

function responseHeaders(correlationId: string): Record<string, string> {
  return { 'x-correlation-id': correlationId };
}

function errorResponse(status: number, code: string, message: string, correlationId: string): WebhookRouterResponse {
  return {
    status,
    body: { success: false, code, message, correlation_id: correlationId },
    headers: responseHeaders(correlationId)
  };
}

function skippedResponse(reason: SkipReason, correlationId: string): WebhookRouterResponse {
  return {
    status: 200,
    body: { success: true, skipped: true, reason, correlation_id: correlationId },
    headers: responseHeaders(correlationId)
  };
}

/**
 * Orchestrates one inbound webhook: handler lookup, tenant resolution,
 * signature check, parsing, loop guard, trigger policy, task creation and
 * enqueue. Every path resolves to a response; nothing is thrown.
 */
export function createWebhookRouter(options: WebhookRouterOptions): WebhookRouter {
  const { registry, installations, queue, lifecycle, loopGuard } = options;
  const baseLogger = options.logger ?? createLogger({ service: options.serviceName ?? 'webhooks' });
  const enqueueRetry = { ...DEFAULT_ENQUEUE_RETRY, ...options.enqueueRetry };
  const now = options.now ?? (() => new Date());

  const enqueue = async (message: TaskMessage, logger: Logger): Promise<void> => {
    await withRetry(() => queue.enqueue(message), {
      ...enqueueRetry,
      onRetry: (ctx) =>
        logger.warn('Enqueue failed, retrying', {
          attempt: ctx.attempt,
          nextDelayMs: ctx.nextDelayMs,
          error: ctx.lastError?.message
        })
    });
  };

  const answerChallenge = (
    handler: WebhookHandler,
    request: WebhookRouterRequest,
    challenge: string,
    correlationId: string,
    logger: Logger
  ): WebhookRouterResponse => {
    const secret = options.verificationSecrets?.[handler.provider];
    if (!secret || !handler.validate(request.rawBody, request.headers, secret)) {
      logger.warn('Verification handshake rejected', { configured: Boolean(secret) });
      return errorResponse(401, 'UNAUTHORIZED', 'Invalid signature', correlationId);
    }
    logger.info('Verification handshake answered');
    return {
      status: 200,
      body: { challenge, correlation_id: correlationId },
      headers: responseHeaders(correlationId)
    };
  };

  const processWebhook = async (
    handler: WebhookHandler,
    request: WebhookRouterRequest,
    correlationId: string,
    requestLogger: Logger
  ): Promise<WebhookRouterResponse> => {
    const challenge = handler.verificationChallenge?.(request.rawBody, request.headers);
    if (challenge !== undefined) {
      return answerChallenge(handler, request, challenge, correlationId, requestLogger);
    }

    const organizationId = handler.extractOrganizationId(request.rawBody, request.headers);
    const installation = await installations.getActiveInstallation(handler.provider, organizationId);
    const logger = requestLogger.child({ organizationId, installationId: installation.id });

    if (!handler.validate(request.rawBody, request.headers, installation.webhookSecret)) {
      throw new SignatureValidationError('INVALID_SIGNATURE', 'Signature verification failed', handler.provider);
    }

    const event = handler.parse(request.rawBody, request.headers, { installationId: installation.id, now: now() });

    if (loopGuard && (await loopGuard.scoped(handler.provider).isSelfPosted(event.externalId))) {
      logger.info('Self-posted event skipped', { eventType: event.eventType, externalId: event.externalId });
      return skippedResponse('self_posted', correlationId);
    }

    if (!handler.shouldProcess(event)) {
      logger.info('Webhook skipped, no trigger matched', { eventType: event.eventType });
      return skippedResponse('no_trigger', correlationId);
    }

    const taskRequest = handler.buildTaskRequest(event);
    const message = buildTaskMessage(
      {
        installationId: installation.id,
        provider: handler.provider,
        inputMessage: taskRequest.inputMessage,
        priority: taskRequest.priority,
        sourceMetadata: taskRequest.sourceMetadata
      },
      now()
    );
    const taskLogger = logger.child({ taskId: message.taskId });

    await lifecycle.create(message);
    try {
      await enqueue(message, taskLogger);
    } catch (error) {
      await lifecycle.cancel(message.taskId).catch((cancelError: unknown) => {
        taskLogger.error('Could not cancel task after failed enqueue', describeError(cancelError));
      });
      throw error;
    }

    taskLogger.info('Webhook accepted', { eventType: event.eventType, priority: message.priority });
    return {
      status: 200,
      body: { success: true, task_id: message.taskId, skipped: false, correlation_id: correlationId },
      headers: responseHeaders(correlationId)
    };
  };

  const handle = async (request: WebhookRouterRequest): Promise<WebhookRouterResponse> => {
    const correlationId = getHeader(request.headers, 'x-correlation-id') ?? generateCorrelationId();
    const logger = baseLogger.child({ correlationId, provider: request.provider });

    const handler = registry.getHandler(request.provider);
    if (!handler) {
      logger.warn('Webhook for unregistered provider');
      return errorResponse(404, 'UNKNOWN_PROVIDER', `Provider ${request.provider} is not supported`, correlationId);
    }

    try {
      return await processWebhook(handler, request, correlationId, logger);
    } catch (error) {
      if (error instanceof PayloadParseError || error instanceof ValidationError) {
        logger.warn('Webhook payload could not be parsed', { error: error.message });
        return errorResponse(400, 'PAYLOAD_PARSE_FAILED', error.message, correlationId);
      }
      if (error instanceof SignatureValidationError) {
        logger.warn('Signature verification failed', { code: error.code });
        return errorResponse(401, 'UNAUTHORIZED', 'Invalid signature', correlationId);
      }
      if (error instanceof InstallationNotFoundError) {
        logger.warn('No active installation for tenant', { error: error.message });
        return errorResponse(401, 'UNAUTHORIZED', 'Unknown installation', correlationId);
      }
      if (error instanceof QueueUnavailableError) {
        logger.error('Queue unavailable, webhook not accepted', describeError(error));
        return errorResponse(503, 'QUEUE_UNAVAILABLE', 'Queue unavailable', correlationId);
      }
      logger.error('Webhook handling failed', describeError(error));
      return errorResponse(500, 'INTERNAL_ERROR', 'internal_error', correlationId);
    }
  };

  return {
    handle,
    health: () => ({ status: 'ok', providers: registry.listProviders() })
  };
}
