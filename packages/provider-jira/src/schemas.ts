import { z } from 'zod';

const namedSchema = z.object({ name: z.string() });

/** Cloud sites may send rich-text documents; only plain strings are kept. */
const plainText = z.string().nullable().optional().catch(undefined);

export const jiraPayloadSchema = z
  .object({
    webhookEvent: z.string().optional(),
    issue_event_type_name: z.string().optional(),
    user: z.object({ accountId: z.string() }).partial().optional(),
    issue: z.object({
      id: z.string(),
      key: z.string(),
      fields: z.object({
        summary: z.string().default(''),
        description: plainText,
        issuetype: namedSchema.nullable().optional(),
        status: namedSchema.nullable().optional(),
        priority: namedSchema.nullable().optional(),
        assignee: z.object({ displayName: z.string() }).nullable().optional(),
        project: z
          .object({
            key: z.string(),
            name: z.string().default('')
          })
          .optional(),
        labels: z.array(z.string()).default([])
      })
    }),
    comment: z
      .object({
        id: z.string(),
        body: plainText,
        author: z.object({ displayName: z.string() }).optional()
      })
      .optional()
  })
  .passthrough();

export type JiraPayload = z.infer<typeof jiraPayloadSchema>;
