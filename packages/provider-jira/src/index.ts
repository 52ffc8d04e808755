export {
  createJiraHandler,
  DEFAULT_JIRA_TRIGGER_LABELS,
  JIRA_SIGNATURE_HEADER,
  type JiraHandlerOptions
} from './handler.js';
export { jiraPayloadSchema, type JiraPayload } from './schemas.js';
