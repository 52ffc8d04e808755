import type { Platform } from '@taskhook/core-installations';
import type { TaskPriority } from '@taskhook/core-queue';
import type { HeaderMap } from '@taskhook/core-signature';
import { z } from 'zod';

export type { HeaderMap };

export type RawBody = Buffer | string;

/**
 * Normalized inbound signal. Lives for one request; only what the task
 * message carries forward outlives it.
 */
export const webhookEventSchema = z.object({
  provider: z.string().min(1),
  eventType: z.string().min(1),
  installationId: z.string(),
  organizationId: z.string().min(1),
  rawPayload: z.unknown(),
  timestamp: z.string().datetime({ offset: true }),
  metadata: z.record(z.string()),
  /** Provider id of the comment or message behind the event; consulted by the loop guard. */
  externalId: z.string().min(1).optional()
});

export type WebhookEvent = z.infer<typeof webhookEventSchema>;

export type TaskRequest = {
  inputMessage: string;
  sourceMetadata: Record<string, string>;
  priority: TaskPriority;
};

export type ParseContext = {
  /** Id of the installation the router resolved for the tenant. */
  installationId: string;
  now?: Date;
};

/**
 * What a provider contributes. Everything except `verificationChallenge` is
 * required; adding a provider means registering one of these, nothing else.
 */
export interface WebhookHandler {
  readonly provider: Platform;

  /**
   * Read the tenant id from the unauthenticated payload so the router can
   * look up the tenant's secret.
   *
   * @throws PayloadParseError when the body is not JSON or names no tenant
   */
  extractOrganizationId: (rawBody: RawBody, headers: HeaderMap) => string;

  /** Signature check over the raw bytes, before any JSON decoding. */
  validate: (rawBody: RawBody, headers: HeaderMap, secret: string) => boolean;

  /** @throws PayloadParseError */
  parse: (rawBody: RawBody, headers: HeaderMap, context: ParseContext) => WebhookEvent;

  shouldProcess: (event: WebhookEvent) => boolean;

  buildTaskRequest: (event: WebhookEvent) => TaskRequest;

  /**
   * Endpoint ownership handshakes that are answered instead of processed.
   * Returns the challenge to echo back, or undefined for ordinary events.
   */
  verificationChallenge?: (rawBody: RawBody, headers: HeaderMap) => string | undefined;
}

export class PayloadParseError extends Error {
  readonly code = 'PAYLOAD_PARSE_FAILED';
  readonly status = 400;
  readonly retryable = false;
  readonly provider: string;

  constructor(provider: string, message: string) {
    super(`${provider}: ${message}`);
    this.name = 'PayloadParseError';
    this.provider = provider;
  }
}
