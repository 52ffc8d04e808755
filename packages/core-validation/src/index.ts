import type { ZodIssue, ZodTypeAny, z } from 'zod';

export class ValidationError extends Error {
  public readonly issues: ZodIssue[];
  public readonly context?: string;

  constructor(message: string, issues: ZodIssue[], context?: string) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
    this.context = context;
  }
}

export function formatIssues(issues: ZodIssue[]): string {
  return issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function safeParseOrThrow<Schema extends ZodTypeAny>(
  schema: Schema,
  data: unknown,
  context?: string
): z.output<Schema> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issueSummary = formatIssues(result.error.issues);
    const message = context ? `${context}: ${issueSummary}` : issueSummary;
    throw new ValidationError(message || 'Validation failed', result.error.issues, context);
  }

  return result.data;
}

export type JsonParseResult = { ok: true; value: unknown } | { ok: false; message: string };

/**
 * Decode a raw request body as JSON without throwing.
 */
export function parseJson(raw: Buffer | string): JsonParseResult {
  const text = typeof raw === 'string' ? raw : raw.toString('utf-8');
  if (text.trim().length === 0) {
    return { ok: false, message: 'Body is empty' };
  }
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (error) {
    return { ok: false, message: error instanceof Error ? error.message : 'Invalid JSON' };
  }
}
