export {
  createSentryHandler,
  SENTRY_RESOURCE_HEADER,
  SENTRY_SIGNATURE_HEADER,
  SENTRY_TRIGGER_EVENTS
} from './handler.js';
export { sentryPayloadSchema, type SentryPayload } from './schemas.js';
