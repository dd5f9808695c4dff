export { CommandRunner, findRepoRoot } from './git.js';
export {
  commitSubject,
  commitBody,
  pullRequestTitle,
  pullRequestBody,
  type AgentChangeSummary,
  type PatternHighlight,
} from './change-summary.js';
export {
  Publisher,
  type PublishRequest,
  type PublishOutcome,
  type PullRequestAction,
  type RunnerFactory,
} from './publisher.js';
