import { readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { describe, expect, it } from 'vitest';

import { TaskPriority } from '@taskhook/core-queue';
import { computeHmacSha256Hex, generateHmacSha256 } from '@taskhook/core-signature';

import { createSentryHandler } from '../src/index.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

function loadFixture(name: string): Buffer {
  return readFileSync(path.join(__dirname, '..', 'fixtures', name));
}

const INSTALLATION_UUID = '7a485448-a9e2-4c85-8a3c-4f44175783c9';
const context = { installationId: 'inst-000000000004', now: new Date('2026-03-01T12:00:00.000Z') };

describe('createSentryHandler', () => {
  const handler = createSentryHandler();

  it('validates bare hex signatures', () => {
    const body = loadFixture('issue_created.json');

    expect(
      handler.validate(body, { 'sentry-hook-signature': computeHmacSha256Hex('test-secret', body) }, 'test-secret')
    ).toBe(true);
    expect(
      handler.validate(body, { 'sentry-hook-signature': generateHmacSha256('test-secret', body) }, 'test-secret')
    ).toBe(false);
    expect(handler.validate(body, {}, 'test-secret')).toBe(false);
  });

  it('uses the integration installation as the tenant', () => {
    expect(handler.extractOrganizationId(loadFixture('issue_created.json'), {})).toBe(INSTALLATION_UUID);
    expect(() => handler.extractOrganizationId('{"action":"created"}', {})).toThrow(
      'sentry: Missing installation.uuid'
    );
  });

  describe('new issue', () => {
    const event = handler.parse(loadFixture('issue_created.json'), { 'sentry-hook-resource': 'issue' }, context);

    it('normalizes the event', () => {
      expect(event).toMatchObject({
        provider: 'sentry',
        eventType: 'issue.created',
        organizationId: INSTALLATION_UUID,
        installationId: 'inst-000000000004'
      });
      expect(event.externalId).toBeUndefined();
      expect(event.metadata).toEqual({
        issue_id: '1170820242',
        short_id: 'BILLING-3Q',
        title: "TypeError: Cannot read properties of undefined (reading 'total')",
        culprit: 'computeInvoice(src/invoice)',
        level: 'error',
        project: 'billing',
        error_type: 'TypeError',
        error_value: "Cannot read properties of undefined (reading 'total')",
        actor: 'Sentry'
      });
    });

    it('is investigated at high priority', () => {
      expect(handler.shouldProcess(event)).toBe(true);
      expect(handler.buildTaskRequest(event)).toEqual({
        inputMessage: "Investigate Sentry issue BILLING-3Q: TypeError: Cannot read properties of undefined (reading 'total')",
        sourceMetadata: event.metadata,
        priority: TaskPriority.HIGH
      });
    });
  });

  it('treats fatal alert events as critical', () => {
    const event = handler.parse(
      loadFixture('event_alert_triggered.json'),
      { 'Sentry-Hook-Resource': 'event_alert' },
      context
    );

    expect(event.eventType).toBe('event_alert.triggered');
    expect(event.metadata).toMatchObject({ issue_id: '1170820299', short_id: '', culprit: '', project: '' });
    expect(handler.shouldProcess(event)).toBe(true);
    expect(handler.buildTaskRequest(event)).toMatchObject({
      inputMessage: 'Investigate Sentry issue 1170820299: OutOfMemoryError: worker heap exhausted',
      priority: TaskPriority.CRITICAL
    });
  });

  it('ignores other issue actions', () => {
    const event = handler.parse(loadFixture('issue_resolved.json'), { 'sentry-hook-resource': 'issue' }, context);

    expect(event.eventType).toBe('issue.resolved');
    expect(handler.shouldProcess(event)).toBe(false);
    expect(handler.buildTaskRequest(event).priority).toBe(TaskPriority.NORMAL);
  });

  it('does not trigger without the resource header', () => {
    const event = handler.parse(loadFixture('issue_created.json'), {}, context);

    expect(event.eventType).toBe('unknown.created');
    expect(handler.shouldProcess(event)).toBe(false);
  });
});
