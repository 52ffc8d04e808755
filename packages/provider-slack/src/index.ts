export {
  createSlackHandler,
  SLACK_DEFAULT_INPUT,
  SLACK_SIGNATURE_HEADER,
  SLACK_TIMESTAMP_HEADER,
  type SlackHandlerOptions
} from './handler.js';
export { slackEventSchema, slackPayloadSchema, type SlackEventPayload, type SlackPayload } from './schemas.js';
