// Errors
export {
  ConfigError,
  BackendUnavailableError,
  MalformedResponseError,
  SessionReadError,
  LockHeldError,
  StateFileError,
  PublishError,
  errorMessage,
} from './errors.js';
export type { DiscoveryError, LockHolder } from './errors.js';

// Configuration
export {
  UpdaterSettingsSchema,
  DEFAULT_SETTINGS_FILE,
  DEFAULT_MODEL,
  loadSettings,
  validateSettings,
  applyEnvOverrides,
  parseBooleanEnv,
} from './config/settings.js';
export type {
  UpdaterSettings,
  ResolvedSettings,
  LoadSettingsOptions,
  DiscoveryMode,
  ProviderName,
  Env,
} from './config/settings.js';
export {
  AGENT_KEYS,
  isAgentKey,
  resolveAgentProfile,
  resolveUserPath,
} from './config/agent-profiles.js';
export type {
  AgentKey,
  AgentPaths,
  AgentProfile,
  ManualSectionSpec,
} from './config/agent-profiles.js';

// Session history
export * from './sessions/index.js';

// State and locking
export {
  AutomationStateStore,
  AutomationStateSchema,
  AUTOMATION_STATE_VERSION,
  createEmptyState,
  migrateLegacyState,
  serializeState,
} from './state/automation-state-store.js';
export type { AutomationState, StateLoadResult } from './state/automation-state-store.js';
export { FileLock, acquireStateLocks, lockPathFor } from './safety/file-lock.js';
export type { LockAcquireResult, ReleaseLocks } from './safety/file-lock.js';

// Change detection
export { detectChanges, touchedSessions, compareByRecency } from './detection/change-detector.js';
export type { ChangeSet } from './detection/change-detector.js';

// Patterns, discovery, documents, publishing
export * from './patterns/index.js';
export * from './discovery/index.js';
export * from './document/index.js';
export * from './publish/index.js';

// Pipeline
export * from './pipeline/index.js';
