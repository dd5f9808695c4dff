/**
 * Discovery module barrel export.
 */

export * from './types.js';
export { buildDiscoveryPrompt, sessionExcerpt, type PromptOptions } from './prompt-builder.js';
export { parseCandidates, CandidateSchema } from './candidate-parser.js';
export {
  withRetry,
  isTransientError,
  computeRetryDelayMs,
  type RetryPolicy,
} from './retry.js';
export { CompletionBackend, createBackend, retryPolicyFrom, type BackendRuntime } from './backend.js';
export {
  planDiscovery,
  runDiscovery,
  type DiscoveryPlan,
  type DiscoveryOutcome,
  type DiscoveryRequest,
} from './discovery-engine.js';
