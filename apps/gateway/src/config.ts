import { z } from 'zod';

import type { LogLevel } from '@taskhook/core-logging';
import { safeParseOrThrow } from '@taskhook/core-validation';

const emptyAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const optionalString = z.preprocess(emptyAsUndefined, z.string().min(1).optional());

const positiveInt = (fallback: number) =>
  z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(fallback));

const envSchema = z
  .object({
    PORT: positiveInt(3000),
    NODE_ENV: z.preprocess(
      emptyAsUndefined,
      z.enum(['development', 'test', 'staging', 'production']).default('development')
    ),
    LOG_LEVEL: z.preprocess(emptyAsUndefined, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
    REDIS_URL: z.preprocess(
      emptyAsUndefined,
      z
        .string()
        .regex(/^rediss?:\/\//, { message: 'Expected a redis:// or rediss:// URL' })
        .optional()
    ),
    QUEUE_VISIBILITY_TIMEOUT_MS: positiveInt(300_000),
    QUEUE_REAPER_INTERVAL_MS: positiveInt(30_000),
    LOOP_GUARD_TTL_MS: positiveInt(3_600_000),
    AGENT_LABELS: optionalString,
    WORKER_CONCURRENCY: z.preprocess(emptyAsUndefined, z.coerce.number().int().min(0).default(0)),
    SLACK_SIGNING_SECRET: optionalString
  })
  .superRefine((env, ctx) => {
    if ((env.NODE_ENV === 'production' || env.NODE_ENV === 'staging') && !env.REDIS_URL) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['REDIS_URL'],
        message: `Required when NODE_ENV=${env.NODE_ENV}`
      });
    }
  });

export type NodeEnv = 'development' | 'test' | 'staging' | 'production';

export interface GatewayConfig {
  port: number;
  nodeEnv: NodeEnv;
  logLevel: LogLevel;
  redisUrl?: string;
  queueVisibilityTimeoutMs: number;
  queueReaperIntervalMs: number;
  loopGuardTtlMs: number;
  /** Labels that trigger GitHub and Jira tasks. Unset keeps each handler's defaults. */
  agentLabels?: string[];
  /** In-process workers. 0 leaves execution to separate worker processes. */
  workerConcurrency: number;
  slackSigningSecret?: string;
}

export function parseLabelList(raw: string): string[] {
  return raw
    .split(',')
    .map((label) => label.trim())
    .filter((label) => label.length > 0);
}

/**
 * Read the gateway configuration from the environment.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const parsed = safeParseOrThrow(envSchema, env, 'environment');

  return {
    port: parsed.PORT,
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    redisUrl: parsed.REDIS_URL,
    queueVisibilityTimeoutMs: parsed.QUEUE_VISIBILITY_TIMEOUT_MS,
    queueReaperIntervalMs: parsed.QUEUE_REAPER_INTERVAL_MS,
    loopGuardTtlMs: parsed.LOOP_GUARD_TTL_MS,
    agentLabels: parsed.AGENT_LABELS === undefined ? undefined : parseLabelList(parsed.AGENT_LABELS),
    workerConcurrency: parsed.WORKER_CONCURRENCY,
    slackSigningSecret: parsed.SLACK_SIGNING_SECRET
  };
}
