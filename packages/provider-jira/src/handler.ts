import { TaskPriority } from '@taskhook/core-queue';
import { getHeader, verifyHmacSha256 } from '@taskhook/core-signature';
import {
  extractMention,
  hasAllowedLabel,
  hasMention,
  joinLabels,
  metadataValue,
  parsePayload,
  PayloadParseError,
  type RawBody,
  type WebhookEvent,
  type WebhookHandler
} from '@taskhook/core-webhooks';

import { jiraPayloadSchema, type JiraPayload } from './schemas.js';

export const JIRA_SIGNATURE_HEADER = 'x-hub-signature';
export const DEFAULT_JIRA_TRIGGER_LABELS = ['agent-review', 'agent-fix', 'agent-analyze'] as const;

const PRIORITY_MAP: Record<string, TaskPriority> = {
  highest: TaskPriority.CRITICAL,
  high: TaskPriority.HIGH,
  medium: TaskPriority.NORMAL,
  low: TaskPriority.LOW,
  lowest: TaskPriority.LOW
};

const ISSUE_CREATED_EVENTS = new Set(['jira:issue_created', 'issue_created']);
const COMMENT_CREATED_EVENT = 'comment_created';

export interface JiraHandlerOptions {
  triggerLabels?: readonly string[];
}

function parseJira(rawBody: RawBody): { payload: JiraPayload; projectKey: string } {
  const payload = parsePayload('jira', jiraPayloadSchema, rawBody);
  const projectKey = payload.issue.fields.project?.key;
  if (!projectKey) {
    throw new PayloadParseError('jira', 'Missing issue.fields.project.key');
  }
  return { payload, projectKey };
}

function buildMetadata(payload: JiraPayload): Record<string, string> {
  const { issue, comment } = payload;
  const { fields } = issue;
  return {
    issue_key: issue.key,
    issue_id: issue.id,
    issue_type: metadataValue(fields.issuetype?.name),
    summary: fields.summary,
    description: metadataValue(fields.description),
    status: metadataValue(fields.status?.name),
    priority: fields.priority?.name ?? 'Medium',
    assignee: metadataValue(fields.assignee?.displayName),
    project_key: metadataValue(fields.project?.key),
    project_name: metadataValue(fields.project?.name),
    comment_body: metadataValue(comment?.body),
    comment_id: metadataValue(comment?.id),
    comment_author: metadataValue(comment?.author?.displayName),
    labels: joinLabels(fields.labels)
  };
}

function isAssignedToAgent(assignee: string): boolean {
  const lowered = assignee.toLowerCase();
  return lowered.includes('agent') || lowered.includes('bot');
}

function isCritical(metadata: Record<string, string>): boolean {
  const priority = metadata.priority.toLowerCase();
  return priority === 'highest' || priority === 'high' || metadata.issue_type.toLowerCase() === 'incident';
}

function inputMessage(event: WebhookEvent): string {
  const { metadata } = event;
  const instruction = extractMention(metadata.comment_body) ?? extractMention(metadata.description);
  if (instruction) {
    return instruction;
  }
  if (ISSUE_CREATED_EVENTS.has(event.eventType)) {
    return `Analyze issue ${metadata.issue_key}: ${metadata.summary}`;
  }
  if (event.eventType === COMMENT_CREATED_EVENT) {
    return `Respond to comment on ${metadata.issue_key}`;
  }
  return `Process ${event.eventType}`;
}

/**
 * Jira webhooks. The tenant is the project key.
 */
export function createJiraHandler(options: JiraHandlerOptions = {}): WebhookHandler {
  const triggerLabels = options.triggerLabels ?? DEFAULT_JIRA_TRIGGER_LABELS;

  return {
    provider: 'jira',

    extractOrganizationId(rawBody) {
      return parseJira(rawBody).projectKey;
    },

    validate(rawBody, headers, secret) {
      return verifyHmacSha256({
        secret,
        rawBody,
        signatureHeader: getHeader(headers, JIRA_SIGNATURE_HEADER)
      }).valid;
    },

    parse(rawBody, _headers, context) {
      const { payload, projectKey } = parseJira(rawBody);
      return {
        provider: 'jira',
        eventType: payload.issue_event_type_name || payload.webhookEvent || 'unknown',
        installationId: context.installationId,
        organizationId: projectKey,
        rawPayload: payload,
        timestamp: (context.now ?? new Date()).toISOString(),
        metadata: buildMetadata(payload),
        externalId: payload.comment?.id
      };
    },

    shouldProcess(event) {
      const { metadata } = event;
      return (
        hasMention(metadata.comment_body, metadata.description) ||
        isAssignedToAgent(metadata.assignee) ||
        isCritical(metadata) ||
        hasAllowedLabel(metadata.labels, triggerLabels)
      );
    },

    buildTaskRequest(event) {
      return {
        inputMessage: inputMessage(event),
        sourceMetadata: event.metadata,
        priority: PRIORITY_MAP[event.metadata.priority.toLowerCase()] ?? TaskPriority.NORMAL
      };
    }
  };
}
