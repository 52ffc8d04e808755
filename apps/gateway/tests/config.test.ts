import { describe, expect, it } from 'vitest';

import { ValidationError } from '@taskhook/core-validation';

import { loadConfig, parseLabelList } from '../src/config.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      port: 3000,
      nodeEnv: 'development',
      logLevel: 'info',
      redisUrl: undefined,
      queueVisibilityTimeoutMs: 300_000,
      queueReaperIntervalMs: 30_000,
      loopGuardTtlMs: 3_600_000,
      agentLabels: undefined,
      workerConcurrency: 0,
      slackSigningSecret: undefined
    });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      PORT: '8080',
      NODE_ENV: 'production',
      LOG_LEVEL: 'debug',
      REDIS_URL: 'rediss://cache.internal:6380',
      QUEUE_VISIBILITY_TIMEOUT_MS: '60000',
      QUEUE_REAPER_INTERVAL_MS: '5000',
      LOOP_GUARD_TTL_MS: '120000',
      AGENT_LABELS: ' agent-fix, ,needs-agent ',
      WORKER_CONCURRENCY: '4',
      SLACK_SIGNING_SECRET: 'test-slack-secret'
    });

    expect(config).toEqual({
      port: 8080,
      nodeEnv: 'production',
      logLevel: 'debug',
      redisUrl: 'rediss://cache.internal:6380',
      queueVisibilityTimeoutMs: 60_000,
      queueReaperIntervalMs: 5_000,
      loopGuardTtlMs: 120_000,
      agentLabels: ['agent-fix', 'needs-agent'],
      workerConcurrency: 4,
      slackSigningSecret: 'test-slack-secret'
    });
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ PORT: '', LOG_LEVEL: '', SLACK_SIGNING_SECRET: '' });
    expect(config.port).toBe(3000);
    expect(config.logLevel).toBe('info');
    expect(config.slackSigningSecret).toBeUndefined();
  });

  it.each(['production', 'staging'])('requires REDIS_URL when NODE_ENV=%s', (nodeEnv) => {
    expect(() => loadConfig({ NODE_ENV: nodeEnv })).toThrow(
      new ValidationError(`environment: REDIS_URL: Required when NODE_ENV=${nodeEnv}`, [])
    );
  });

  it('rejects malformed values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow(ValidationError);
    expect(() => loadConfig({ PORT: '-1' })).toThrow(/^environment: PORT: /);
    expect(() => loadConfig({ REDIS_URL: 'http://cache.internal' })).toThrow(
      'environment: REDIS_URL: Expected a redis:// or rediss:// URL'
    );
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(/^environment: LOG_LEVEL: /);
    expect(() => loadConfig({ WORKER_CONCURRENCY: '1.5' })).toThrow(/^environment: WORKER_CONCURRENCY: /);
  });
});

describe('parseLabelList', () => {
  it('trims entries and drops empty ones', () => {
    expect(parseLabelList('a, b ,,c')).toEqual(['a', 'b', 'c']);
    expect(parseLabelList(' , ')).toEqual([]);
  });
});
