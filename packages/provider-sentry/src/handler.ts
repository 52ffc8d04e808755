import { TaskPriority } from '@taskhook/core-queue';
import { getHeader, verifyHmacSha256 } from '@taskhook/core-signature';
import {
  metadataValue,
  parsePayload,
  PayloadParseError,
  type RawBody,
  type WebhookHandler
} from '@taskhook/core-webhooks';

import { sentryPayloadSchema, type SentryPayload } from './schemas.js';

export const SENTRY_SIGNATURE_HEADER = 'sentry-hook-signature';
export const SENTRY_RESOURCE_HEADER = 'sentry-hook-resource';
export const SENTRY_TRIGGER_EVENTS = ['issue.created', 'event_alert.triggered'] as const;

const triggerEvents: ReadonlySet<string> = new Set(SENTRY_TRIGGER_EVENTS);

function parseSentry(rawBody: RawBody): { payload: SentryPayload; installationUuid: string } {
  const payload = parsePayload('sentry', sentryPayloadSchema, rawBody);
  const installationUuid = payload.installation?.uuid;
  if (!installationUuid) {
    throw new PayloadParseError('sentry', 'Missing installation.uuid');
  }
  return { payload, installationUuid };
}

function buildMetadata(payload: SentryPayload): Record<string, string> {
  const { issue, event } = payload.data;
  const source = issue ?? event;
  return {
    issue_id: metadataValue(issue?.id ?? event?.issue_id),
    short_id: metadataValue(issue?.shortId),
    title: metadataValue(source?.title),
    culprit: metadataValue(source?.culprit),
    level: source?.level ?? 'error',
    project: metadataValue(issue?.project?.slug),
    error_type: metadataValue(source?.metadata?.type),
    error_value: metadataValue(source?.metadata?.value),
    actor: metadataValue(payload.actor?.name)
  };
}

function determinePriority(level: string): TaskPriority {
  switch (level.toLowerCase()) {
    case 'fatal':
      return TaskPriority.CRITICAL;
    case 'error':
      return TaskPriority.HIGH;
    default:
      return TaskPriority.NORMAL;
  }
}

/**
 * Sentry integration webhooks. The tenant is the integration installation;
 * the resource comes from the `sentry-hook-resource` header.
 */
export function createSentryHandler(): WebhookHandler {
  return {
    provider: 'sentry',

    extractOrganizationId(rawBody) {
      return parseSentry(rawBody).installationUuid;
    },

    validate(rawBody, headers, secret) {
      return verifyHmacSha256({
        secret,
        rawBody,
        signatureHeader: getHeader(headers, SENTRY_SIGNATURE_HEADER),
        signaturePrefix: ''
      }).valid;
    },

    parse(rawBody, headers, context) {
      const { payload, installationUuid } = parseSentry(rawBody);
      const resource = getHeader(headers, SENTRY_RESOURCE_HEADER) ?? 'unknown';

      return {
        provider: 'sentry',
        eventType: `${resource}.${payload.action ?? 'unknown'}`,
        installationId: context.installationId,
        organizationId: installationUuid,
        rawPayload: payload,
        timestamp: (context.now ?? new Date()).toISOString(),
        metadata: buildMetadata(payload)
      };
    },

    shouldProcess(event) {
      return triggerEvents.has(event.eventType);
    },

    buildTaskRequest(event) {
      const { metadata } = event;
      return {
        inputMessage: `Investigate Sentry issue ${metadata.short_id || metadata.issue_id}: ${metadata.title}`,
        sourceMetadata: metadata,
        priority: determinePriority(metadata.level)
      };
    }
  };
}
