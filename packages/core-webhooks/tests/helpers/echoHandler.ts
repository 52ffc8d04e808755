import { TaskPriority } from '@taskhook/core-queue';
import { getHeader, verifyHmacSha256 } from '@taskhook/core-signature';
import { z } from 'zod';

import {
  extractMention,
  hasAllowedLabel,
  parsePayload,
  PayloadParseError,
  type WebhookEvent,
  type WebhookHandler
} from '../../src/index.js';

const echoPayloadSchema = z.object({
  org: z.string().optional(),
  text: z.string().default(''),
  labels: z.array(z.string()).default([]),
  id: z.string().optional(),
  challenge: z.string().optional()
});

/**
 * Minimal handler for router tests: tenant in `org`, signature in
 * `x-signature`, triggers on `@agent` or the `agent-run` label.
 */
export function createEchoHandler(overrides: Partial<WebhookHandler> = {}): WebhookHandler {
  return {
    provider: 'github',
    extractOrganizationId: (rawBody) => {
      const payload = parsePayload('github', echoPayloadSchema, rawBody);
      if (!payload.org) {
        throw new PayloadParseError('github', 'Missing org');
      }
      return payload.org;
    },
    validate: (rawBody, headers, secret) =>
      verifyHmacSha256({ secret, rawBody, signatureHeader: getHeader(headers, 'x-signature') }).valid,
    parse: (rawBody, _headers, context): WebhookEvent => {
      const payload = parsePayload('github', echoPayloadSchema, rawBody);
      return {
        provider: 'github',
        eventType: 'echo',
        installationId: context.installationId,
        organizationId: payload.org ?? '',
        rawPayload: payload,
        timestamp: (context.now ?? new Date()).toISOString(),
        metadata: { text: payload.text, labels: payload.labels.join(',') },
        externalId: payload.id
      };
    },
    shouldProcess: (event) =>
      extractMention(event.metadata.text) !== undefined || hasAllowedLabel(event.metadata.labels, ['agent-run']),
    buildTaskRequest: (event) => ({
      inputMessage: extractMention(event.metadata.text) ?? 'labelled',
      sourceMetadata: event.metadata,
      priority: TaskPriority.NORMAL
    }),
    verificationChallenge: (rawBody) => {
      const payload = parsePayload('github', echoPayloadSchema, rawBody);
      return payload.challenge;
    },
    ...overrides
  };
}
