import { formatIssues, parseJson } from '@taskhook/core-validation';
import type { ZodTypeAny, z } from 'zod';

import { PayloadParseError, type RawBody } from './types.js';

/**
 * Decode a raw body and check it against a provider payload schema.
 *
 * @throws PayloadParseError for bodies that are not JSON or do not match
 */
export function parsePayload<Schema extends ZodTypeAny>(
  provider: string,
  schema: Schema,
  rawBody: RawBody
): z.output<Schema> {
  const parsed = parseJson(rawBody);
  if (!parsed.ok) {
    throw new PayloadParseError(provider, `Invalid JSON: ${parsed.message}`);
  }
  const result = schema.safeParse(parsed.value);
  if (!result.success) {
    throw new PayloadParseError(provider, formatIssues(result.error.issues));
  }
  return result.data;
}

/**
 * Metadata values are flat strings; absent and null become ''.
 */
export function metadataValue(value: string | number | boolean | null | undefined): string {
  return value === undefined || value === null ? '' : String(value);
}
