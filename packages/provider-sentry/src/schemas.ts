import { z } from 'zod';

const errorMetadataSchema = z
  .object({
    type: z.string().optional(),
    value: z.string().optional()
  })
  .passthrough();

const issueSchema = z
  .object({
    id: z.union([z.string(), z.number()]),
    shortId: z.string().optional(),
    title: z.string().default(''),
    culprit: z.string().nullable().optional(),
    level: z.string().optional(),
    project: z.object({ slug: z.string(), name: z.string().optional() }).partial().optional(),
    metadata: errorMetadataSchema.optional()
  })
  .passthrough();

/** Alert-rule payloads carry the event instead of the issue. */
const eventSchema = z
  .object({
    issue_id: z.union([z.string(), z.number()]).optional(),
    title: z.string().default(''),
    culprit: z.string().nullable().optional(),
    level: z.string().optional(),
    metadata: errorMetadataSchema.optional()
  })
  .passthrough();

export const sentryPayloadSchema = z
  .object({
    action: z.string().optional(),
    installation: z.object({ uuid: z.string() }).optional(),
    data: z
      .object({
        issue: issueSchema.optional(),
        event: eventSchema.optional(),
        triggered_rule: z.string().optional()
      })
      .passthrough()
      .default({}),
    actor: z
      .object({
        type: z.string().optional(),
        id: z.union([z.string(), z.number()]).optional(),
        name: z.string().optional()
      })
      .optional()
  })
  .passthrough();

export type SentryPayload = z.infer<typeof sentryPayloadSchema>;
