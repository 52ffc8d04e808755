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
  splitLabels,
  type WebhookEvent,
  type WebhookHandler
} from '@taskhook/core-webhooks';

import { githubPayloadSchema, type GitHubPayload } from './schemas.js';

export const GITHUB_SIGNATURE_HEADER = 'x-hub-signature-256';
export const GITHUB_EVENT_HEADER = 'x-github-event';
export const DEFAULT_GITHUB_TRIGGER_LABELS = ['agent-review', 'agent-fix', 'agent-analyze'] as const;

const AUTO_REVIEW_EVENT = 'pull_request.opened';

export interface GitHubHandlerOptions {
  /** Labels that trigger a task on their own. */
  triggerLabels?: readonly string[];
}

function repositoryOwner(payload: GitHubPayload): string | undefined {
  const fullName = payload.repository?.full_name;
  if (!fullName || !fullName.includes('/')) {
    return undefined;
  }
  const [owner] = fullName.split('/');
  return owner || undefined;
}

function collectLabels(payload: GitHubPayload): string[] {
  const names = [
    ...(payload.pull_request?.labels ?? []),
    ...(payload.issue?.labels ?? []),
    ...(payload.label ? [payload.label] : [])
  ].map((label) => label.name);
  return [...new Set(names)];
}

function pullRequestNumber(payload: GitHubPayload): number | undefined {
  if (payload.pull_request) {
    return payload.pull_request.number;
  }
  // Comments on a pull request arrive as issue comments.
  if (payload.issue?.pull_request) {
    return payload.issue.number;
  }
  return undefined;
}

function buildMetadata(payload: GitHubPayload): Record<string, string> {
  const pr = payload.pull_request;
  return {
    repo: metadataValue(payload.repository?.full_name),
    pr_number: metadataValue(pullRequestNumber(payload)),
    pr_title: metadataValue(pr?.title ?? (payload.issue?.pull_request ? payload.issue.title : undefined)),
    pr_body: metadataValue(pr?.body),
    head_ref: metadataValue(pr?.head?.ref),
    head_sha: metadataValue(pr?.head?.sha),
    comment_body: metadataValue(payload.comment?.body),
    comment_id: metadataValue(payload.comment?.id),
    comment_author: metadataValue(payload.comment?.user?.login),
    labels: joinLabels(collectLabels(payload)),
    issue_number: metadataValue(payload.issue?.number)
  };
}

function determinePriority(labels: string): TaskPriority {
  const names = splitLabels(labels);
  if (names.includes('critical')) {
    return TaskPriority.CRITICAL;
  }
  if (names.includes('urgent')) {
    return TaskPriority.HIGH;
  }
  return TaskPriority.NORMAL;
}

function inputMessage(event: WebhookEvent): string {
  const { metadata } = event;
  const instruction = extractMention(metadata.comment_body) ?? extractMention(metadata.pr_body);
  if (instruction) {
    return instruction;
  }
  if (event.eventType === AUTO_REVIEW_EVENT) {
    return `Review PR #${metadata.pr_number}: ${metadata.pr_title}`;
  }
  return `Process ${event.eventType}`;
}

/**
 * GitHub App webhooks. The tenant is the repository owner; the event type is
 * `{x-github-event}.{action}`.
 */
export function createGitHubHandler(options: GitHubHandlerOptions = {}): WebhookHandler {
  const triggerLabels = options.triggerLabels ?? DEFAULT_GITHUB_TRIGGER_LABELS;

  return {
    provider: 'github',

    extractOrganizationId(rawBody) {
      const owner = repositoryOwner(parsePayload('github', githubPayloadSchema, rawBody));
      if (!owner) {
        throw new PayloadParseError('github', 'Missing repository.full_name');
      }
      return owner;
    },

    validate(rawBody, headers, secret) {
      return verifyHmacSha256({
        secret,
        rawBody,
        signatureHeader: getHeader(headers, GITHUB_SIGNATURE_HEADER)
      }).valid;
    },

    parse(rawBody, headers, context) {
      const payload = parsePayload('github', githubPayloadSchema, rawBody);
      const organizationId = repositoryOwner(payload);
      if (!organizationId) {
        throw new PayloadParseError('github', 'Missing repository.full_name');
      }
      const githubEvent = getHeader(headers, GITHUB_EVENT_HEADER) ?? 'unknown';

      return {
        provider: 'github',
        eventType: payload.action ? `${githubEvent}.${payload.action}` : githubEvent,
        installationId: context.installationId,
        organizationId,
        rawPayload: payload,
        timestamp: (context.now ?? new Date()).toISOString(),
        metadata: buildMetadata(payload),
        externalId: payload.comment ? String(payload.comment.id) : undefined
      };
    },

    shouldProcess(event) {
      return (
        hasMention(event.metadata.comment_body, event.metadata.pr_body) ||
        hasAllowedLabel(event.metadata.labels, triggerLabels) ||
        event.eventType === AUTO_REVIEW_EVENT
      );
    },

    buildTaskRequest(event) {
      return {
        inputMessage: inputMessage(event),
        sourceMetadata: event.metadata,
        priority: determinePriority(event.metadata.labels)
      };
    }
  };
}
