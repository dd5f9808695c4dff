/**
 * A full `update` run across the selected agents.
 *
 * Locks for every selected state file are taken up front, in sorted
 * order, and held until publishing finishes. Agents run one after the
 * other; a failed agent does not stop the others but does stop
 * publishing.
 */

import type { AgentProfile } from '../config/agent-profiles.js';
import type { ResolvedSettings } from '../config/settings.js';
import { PublishError } from '../errors.js';
import { createBackend } from '../discovery/backend.js';
import type { DiscoveryBackend } from '../discovery/types.js';
import { loadStaticCatalog } from '../patterns/static-catalog.js';
import type { StaticCategory } from '../patterns/types.js';
import { Publisher } from '../publish/publisher.js';
import type { PublishOutcome } from '../publish/publisher.js';
import type { AgentChangeSummary } from '../publish/change-summary.js';
import { acquireStateLocks } from '../safety/file-lock.js';
import { runAgentUpdate } from './agent-run.js';
import type { AgentRunResult, AgentRunSuccess } from './agent-run.js';

export interface PublishSettings {
  enabled: boolean;
  branch: string;
  baseBranch: string;
  push: boolean;
}

export interface GuidanceRunOptions {
  profiles: AgentProfile[];
  resolved: ResolvedSettings;
  dryRun: boolean;
  publish: PublishSettings;
  cwd: string;
  catalog?: StaticCategory[];
  backendFactory?: (resolved: ResolvedSettings, cwd: string) => Promise<DiscoveryBackend>;
  publisher?: Publisher;
  now?: () => Date;
}

export interface GuidanceRunResult {
  agents: AgentRunResult[];
  publish?: PublishOutcome;
  publishError?: PublishError;
  /** Why publishing did not run, when it did not. */
  publishSkipped?: 'dry-run' | 'disabled' | 'agent-failed' | 'nothing-written';
  exitCode: 0 | 1;
}

export const DEFAULT_BRANCH = 'automation/guidance-refresh';
export const DEFAULT_BASE_BRANCH = 'main';

function topPatterns(result: AgentRunSuccess): AgentChangeSummary['topPatterns'] {
  return [...result.patterns]
    .sort((a, b) => b.occurrence_count - a.occurrence_count)
    .slice(0, 3)
    .map((p) => ({ title: p.title, count: p.occurrence_count, example: p.examples[0] }));
}

/** Paths stay absolute; the publisher makes them relative to the repository it finds. */
export function summarizeAgent(result: AgentRunSuccess): AgentChangeSummary {
  return {
    agent: result.profile.key,
    docTitle: result.profile.docTitle,
    outputPath: result.profile.paths.output,
    statePath: result.profile.paths.state,
    totalSessions: result.totalSessions,
    newSessions: result.newSessions,
    updatedSessions: result.updatedSessions,
    newPatternTitles: result.newPatterns.map((p) => p.title),
    topPatterns: topPatterns(result),
  };
}

/** `--agent` flags that reproduce this selection. */
export function agentFlags(profiles: AgentProfile[]): string {
  if (profiles.length > 1) return '--agent all';
  return profiles.map((p) => `--agent ${p.key}`).join(' ') || '--agent codex';
}

export async function runGuidanceUpdate(options: GuidanceRunOptions): Promise<GuidanceRunResult> {
  const now = options.now ?? (() => new Date());
  const catalog = options.catalog ?? await loadStaticCatalog();
  const profiles = [...options.profiles].sort((a, b) => (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

  let backend: DiscoveryBackend | undefined;
  const getBackend = async (): Promise<DiscoveryBackend> => {
    backend ??= await (options.backendFactory ?? createBackend)(options.resolved, options.cwd);
    return backend;
  };

  const release = options.dryRun
    ? async () => undefined
    : await acquireStateLocks(profiles.map((p) => p.paths.state), 'update');

  try {
    const agents: AgentRunResult[] = [];
    for (const profile of profiles) {
      agents.push(await runAgentUpdate({
        profile,
        resolved: options.resolved,
        catalog,
        dryRun: options.dryRun,
        getBackend,
        now,
      }));
    }

    const failed = agents.some((a) => a.status === 'failed');
    const result: GuidanceRunResult = { agents, exitCode: failed ? 1 : 0 };

    if (options.dryRun) return { ...result, publishSkipped: 'dry-run' };
    if (!options.publish.enabled) return { ...result, publishSkipped: 'disabled' };
    if (failed) return { ...result, publishSkipped: 'agent-failed' };

    const succeeded = agents.filter((a): a is AgentRunSuccess => a.status === 'ok');
    if (!succeeded.some((a) => a.documentWritten || a.stateWritten)) {
      return { ...result, publishSkipped: 'nothing-written' };
    }

    try {
      const publish = await (options.publisher ?? new Publisher()).publish({
        files: succeeded.flatMap((a) => [a.profile.paths.output, a.profile.paths.state]),
        branch: options.publish.branch,
        baseBranch: options.publish.baseBranch,
        push: options.publish.push,
        summaries: succeeded.map((a) => summarizeAgent(a)),
        agentFlags: agentFlags(profiles),
      });
      return { ...result, publish };
    } catch (err) {
      if (err instanceof PublishError) {
        return { ...result, publishError: err, exitCode: 1 };
      }
      throw err;
    }
  } finally {
    await release();
  }
}
