import { z } from 'zod';

const innerMessageSchema = z.object({
  text: z.string().default(''),
  user: z.string().default('')
});

export const slackEventSchema = z
  .object({
    type: z.string(),
    subtype: z.string().optional(),
    channel: z.string().default(''),
    channel_type: z.string().default(''),
    user: z.string().default(''),
    text: z.string().default(''),
    ts: z.string().default(''),
    thread_ts: z.string().default(''),
    bot_id: z.string().optional(),
    /** Edited messages carry the new content here. */
    message: innerMessageSchema.optional(),
    files: z.array(z.unknown()).optional(),
    reaction: z.string().optional()
  })
  .passthrough();

/** Events API envelope. */
export const slackPayloadSchema = z
  .object({
    type: z.string(),
    team_id: z.string().optional(),
    challenge: z.string().optional(),
    event_id: z.string().optional(),
    event: slackEventSchema.optional()
  })
  .passthrough();

export type SlackEventPayload = z.infer<typeof slackEventSchema>;
export type SlackPayload = z.infer<typeof slackPayloadSchema>;
