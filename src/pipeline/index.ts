export {
  runAgentUpdate,
  renderProfileDocument,
  type AgentRunContext,
  type AgentRunResult,
  type AgentRunSuccess,
  type AgentRunFailure,
} from './agent-run.js';
export {
  runGuidanceUpdate,
  summarizeAgent,
  agentFlags,
  DEFAULT_BRANCH,
  DEFAULT_BASE_BRANCH,
  type GuidanceRunOptions,
  type GuidanceRunResult,
  type PublishSettings,
} from './guidance-run.js';
export {
  collectStatus,
  prunePatterns,
  type AgentStatus,
  type PatternSummary,
  type PruneResult,
} from './maintenance.js';
