export {
  PayloadParseError,
  webhookEventSchema,
  type HeaderMap,
  type ParseContext,
  type RawBody,
  type TaskRequest,
  type WebhookEvent,
  type WebhookHandler
} from './types.js';
export { WebhookRegistry } from './registry.js';
export { extractMention, hasAllowedLabel, hasMention, joinLabels, splitLabels } from './trigger.js';
export { metadataValue, parsePayload } from './payload.js';
export {
  createWebhookRouter,
  generateCorrelationId,
  type AcceptedBody,
  type ChallengeBody,
  type EnqueueRetryOptions,
  type ErrorBody,
  type HealthBody,
  type InstallationSource,
  type SkippedBody,
  type SkipReason,
  type WebhookResponseBody,
  type WebhookRouter,
  type WebhookRouterOptions,
  type WebhookRouterRequest,
  type WebhookRouterResponse
} from './router.js';
