import { TaskPriority } from '@taskhook/core-queue';
import { getHeader, verifySlackSignature } from '@taskhook/core-signature';
import {
  metadataValue,
  parsePayload,
  PayloadParseError,
  type WebhookEvent,
  type WebhookHandler
} from '@taskhook/core-webhooks';

import { slackPayloadSchema, type SlackPayload } from './schemas.js';

export const SLACK_SIGNATURE_HEADER = 'x-slack-signature';
export const SLACK_TIMESTAMP_HEADER = 'x-slack-request-timestamp';
export const SLACK_DEFAULT_INPUT = 'How can I help you?';

const USER_MENTION_PATTERN = /<@[UW][A-Z0-9]+>/i;
const USER_MENTION_GLOBAL = /<@[UW][A-Z0-9]+>/gi;
const KEYWORDS = ['@agent', 'agent:', 'hey agent'] as const;
const KEYWORD_PATTERN = /hey agent:?|@agent:?|agent:/gi;

export interface SlackHandlerOptions {
  /** Clock for the replay window check. */
  now?: () => Date;
}

function buildMetadata(payload: SlackPayload): Record<string, string> {
  const event = payload.event;
  const metadata: Record<string, string> = {
    channel: metadataValue(event?.channel),
    channel_type: metadataValue(event?.channel_type),
    user: metadataValue(event?.message?.user ?? event?.user),
    text: metadataValue(event?.message?.text ?? event?.text),
    ts: metadataValue(event?.ts),
    thread_ts: metadataValue(event?.thread_ts),
    bot_id: metadataValue(event?.bot_id)
  };
  if (event?.files && event.files.length > 0) {
    metadata.file_count = String(event.files.length);
  }
  if (event?.reaction) {
    metadata.reaction = event.reaction;
  }
  return metadata;
}

function hasKeyword(text: string): boolean {
  const lowered = text.toLowerCase();
  return KEYWORDS.some((keyword) => lowered.includes(keyword));
}

function inputMessage(event: WebhookEvent): string {
  const stripped = event.metadata.text
    .replace(USER_MENTION_GLOBAL, ' ')
    .replace(KEYWORD_PATTERN, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return stripped || SLACK_DEFAULT_INPUT;
}

function determinePriority(metadata: Record<string, string>): TaskPriority {
  if (metadata.channel_type === 'im') {
    return TaskPriority.HIGH;
  }
  if (metadata.thread_ts) {
    return TaskPriority.NORMAL;
  }
  return TaskPriority.LOW;
}

/**
 * Slack Events API. The tenant is the workspace (`team_id`).
 * `url_verification` requests carry no workspace; the router answers them
 * through `verificationChallenge` with the app signing secret.
 */
export function createSlackHandler(options: SlackHandlerOptions = {}): WebhookHandler {
  const now = options.now ?? (() => new Date());

  return {
    provider: 'slack',

    extractOrganizationId(rawBody) {
      const payload = parsePayload('slack', slackPayloadSchema, rawBody);
      if (!payload.team_id) {
        throw new PayloadParseError('slack', 'Missing team_id');
      }
      return payload.team_id;
    },

    validate(rawBody, headers, secret) {
      return verifySlackSignature({
        secret,
        rawBody,
        signatureHeader: getHeader(headers, SLACK_SIGNATURE_HEADER),
        timestampHeader: getHeader(headers, SLACK_TIMESTAMP_HEADER),
        nowSeconds: Math.floor(now().getTime() / 1000)
      }).valid;
    },

    parse(rawBody, _headers, context) {
      const payload = parsePayload('slack', slackPayloadSchema, rawBody);
      if (payload.type === 'url_verification') {
        throw new PayloadParseError('slack', 'URL verification is answered, not parsed');
      }
      if (!payload.team_id) {
        throw new PayloadParseError('slack', 'Missing team_id');
      }
      const eventType = payload.type === 'event_callback' ? (payload.event?.type ?? 'unknown') : payload.type;
      const ts = payload.event?.ts;

      return {
        provider: 'slack',
        eventType,
        installationId: context.installationId,
        organizationId: payload.team_id,
        rawPayload: payload,
        timestamp: (context.now ?? new Date()).toISOString(),
        metadata: buildMetadata(payload),
        externalId: ts ? ts : undefined
      };
    },

    shouldProcess(event) {
      const { metadata } = event;
      if (metadata.bot_id) {
        return false;
      }
      return USER_MENTION_PATTERN.test(metadata.text) || hasKeyword(metadata.text) || metadata.channel_type === 'im';
    },

    buildTaskRequest(event) {
      return {
        inputMessage: inputMessage(event),
        sourceMetadata: event.metadata,
        priority: determinePriority(event.metadata)
      };
    },

    verificationChallenge(rawBody) {
      const payload = parsePayload('slack', slackPayloadSchema, rawBody);
      return payload.type === 'url_verification' ? payload.challenge : undefined;
    }
  };
}
