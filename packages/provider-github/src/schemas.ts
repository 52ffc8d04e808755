import { z } from 'zod';

const labelSchema = z.object({ name: z.string() });

const userSchema = z.object({ login: z.string() });

const pullRequestSchema = z.object({
  number: z.number().int(),
  title: z.string().default(''),
  body: z.string().nullable().optional(),
  head: z
    .object({
      ref: z.string().default(''),
      sha: z.string().default('')
    })
    .optional(),
  labels: z.array(labelSchema).default([])
});

const issueSchema = z.object({
  number: z.number().int(),
  title: z.string().default(''),
  body: z.string().nullable().optional(),
  /** Present only when the issue is a pull request. */
  pull_request: z.object({}).passthrough().optional(),
  labels: z.array(labelSchema).default([])
});

const commentSchema = z.object({
  id: z.number().int(),
  body: z.string().default(''),
  user: userSchema.optional()
});

export const githubPayloadSchema = z
  .object({
    action: z.string().optional(),
    repository: z
      .object({
        full_name: z.string()
      })
      .optional(),
    pull_request: pullRequestSchema.optional(),
    issue: issueSchema.optional(),
    comment: commentSchema.optional(),
    /** Set on `labeled` / `unlabeled` actions. */
    label: labelSchema.optional(),
    installation: z.object({ id: z.number().int() }).optional(),
    sender: userSchema.optional()
  })
  .passthrough();

export type GitHubPayload = z.infer<typeof githubPayloadSchema>;
