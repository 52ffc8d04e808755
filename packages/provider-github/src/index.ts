export {
  createGitHubHandler,
  DEFAULT_GITHUB_TRIGGER_LABELS,
  GITHUB_EVENT_HEADER,
  GITHUB_SIGNATURE_HEADER,
  type GitHubHandlerOptions
} from './handler.js';
export { githubPayloadSchema, type GitHubPayload } from './schemas.js';
