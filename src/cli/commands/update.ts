/**
 * update command - refresh guidance documents from new session history.
 *
 * Usage:
 *   guidance-updater update                       Codex guidance, commit and PR
 *   guidance-updater update --agent all --dry-run  Preview both documents
 *   guidance-updater update --skip-git            Write files only
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { loadSettings } from '../../config/settings.js';
import { ConfigError, MalformedResponseError, errorMessage } from '../../errors.js';
import { runGuidanceUpdate } from '../../pipeline/guidance-run.js';
import type { GuidanceRunOptions, GuidanceRunResult } from '../../pipeline/guidance-run.js';
import type { AgentRunResult } from '../../pipeline/agent-run.js';
import type { PublishOutcome } from '../../publish/publisher.js';
import { parseCliFlags } from '../flags.js';
import { commandContext, plural, profilesFromFlags } from './shared.js';
import type { CommandOptions } from './shared.js';

const HELP_TEXT = `
Usage: guidance-updater update [options]

Read new and updated agent sessions, discover recurring patterns, and
regenerate the guidance document for each selected agent. Unless
--skip-git is given, the changes are committed to a branch and a pull
request is opened or updated.

Options:
  --agent <codex|claude|all>  Agent to update (repeatable, default: codex)
  --dry-run                   Print the documents; write nothing
  --dynamic                   Always ask for new patterns, ignoring the cap
  --skip-git                  Write files but do not commit
  --no-push                   Commit but do not push or open a PR
  --branch <name>             Branch to commit to (default: automation/guidance-refresh)
  --base-branch <name>        Base branch for new branches and PRs (default: main)
  --config <path>             Settings file (default: .guidance-updater.json)
  --history, --codex-history <path>
  --state, --codex-state <path>
  --codex, --codex-output <path>
  --claude-projects <path>
  --claude-history <path>
  --claude-state <path>
  --claude-output <path>
  --help, -h                  Show this help message

Environment:
  ANTHROPIC_API_KEY           Credential for the anthropic provider
  PATTERN_UPDATER_PROVIDER    anthropic (default) or codex
  PATTERN_UPDATER_DISABLE_LLM Set to 1 to refresh counts without discovery
`;

export interface UpdateCommandOptions extends CommandOptions {
  /** Replaces the pipeline, for tests. */
  run?: (options: GuidanceRunOptions) => Promise<GuidanceRunResult>;
}

function reportAgent(agent: AgentRunResult): void {
  const label = pc.bold(agent.profile.key);
  for (const readError of agent.readErrors) {
    p.log.warn(`${label}: ${readError.message}`);
  }
  if (agent.skippedLines > 0) {
    p.log.warn(`${label}: skipped ${plural(agent.skippedLines, 'unreadable history line')}`);
  }

  const sessions = `${agent.newSessions.length} new / ${agent.updatedSessions.length} updated`;
  if (agent.status === 'failed') {
    p.log.error(`${label}: ${sessions} sessions; discovery failed: ${agent.error.message}`);
    if (agent.error instanceof MalformedResponseError && agent.error.snippet) {
      p.log.message(pc.dim(agent.error.snippet));
    }
    return;
  }

  if (agent.migrated) {
    p.log.info(`${label}: migrated legacy state file`);
  }
  const lines = [`${label}: ${sessions} sessions (${agent.totalSessions} total)`];
  if (agent.newPatterns.length > 0) {
    lines.push(`new patterns: ${agent.newPatterns.map((pattern) => pattern.title).join(', ')}`);
  }
  if (agent.foldedInto.length > 0) {
    lines.push(`folded into: ${agent.foldedInto.join(', ')}`);
  }
  if (agent.discarded > 0) {
    lines.push(`discarded ${plural(agent.discarded, 'candidate')}`);
  }
  p.log.info(lines.join('\n'));

  if (agent.documentWritten || agent.stateWritten) {
    p.log.success(`${label}: wrote ${[
      agent.documentWritten ? agent.profile.paths.output : null,
      agent.stateWritten ? agent.profile.paths.state : null,
    ].filter((path): path is string => path !== null).join(', ')}`);
  } else {
    p.log.message(pc.dim(`${agent.profile.key}: no changes to write`));
  }
}

function reportPublish(result: GuidanceRunResult): void {
  if (result.publishError) {
    p.log.error(`Publishing failed: ${result.publishError.message}`);
    return;
  }
  const outcome: PublishOutcome | undefined = result.publish;
  if (!outcome) {
    if (result.publishSkipped === 'agent-failed') {
      p.log.warn('Skipped commit: an agent failed');
    } else if (result.publishSkipped === 'nothing-written') {
      p.log.message(pc.dim('Nothing to commit'));
    }
    return;
  }
  if (outcome.status === 'skipped') {
    p.log.message(pc.dim(
      outcome.reason === 'not-a-repository' ? 'Not inside a git repository; skipped commit' : 'No file changes to commit',
    ));
    return;
  }
  for (const warning of outcome.warnings) {
    p.log.warn(warning);
  }
  p.log.success(`Committed to ${pc.cyan(outcome.branch)}${outcome.pushed ? ' and pushed' : ''}`);
  if (outcome.pullRequest === 'created') p.log.success('Opened pull request');
  if (outcome.pullRequest === 'updated') p.log.success('Updated pull request');
  if (outcome.pullRequest === 'gh-unavailable') p.log.warn('gh CLI not available; open the pull request by hand');
}

/**
 * Update command entry point.
 *
 * @param args - Command-line arguments after 'update'
 * @returns Exit code (0 for success, 1 for error)
 */
export async function updateCommand(args: string[], options?: UpdateCommandOptions): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const context = commandContext(options);

  try {
    const flags = parseCliFlags(args);
    if (flags.positionals.length > 0) {
      throw new ConfigError(`Unexpected argument: ${flags.positionals[0]}`);
    }

    const resolved = await loadSettings({ configPath: flags.configPath, cwd: context.cwd, env: context.env });
    if (flags.dynamic) {
      resolved.settings = { ...resolved.settings, discovery_mode: 'dynamic' };
    }
    const profiles = profilesFromFlags(flags, context);

    p.intro(pc.bgCyan(pc.black(' Guidance Update ')));

    const spinner = p.spinner();
    spinner.start(`Updating ${profiles.map((profile) => profile.key).join(', ')}...`);
    let result: GuidanceRunResult;
    try {
      result = await (options?.run ?? runGuidanceUpdate)({
        profiles,
        resolved,
        dryRun: flags.dryRun,
        publish: {
          enabled: !flags.skipGit,
          branch: flags.branch,
          baseBranch: flags.baseBranch,
          push: !flags.noPush,
        },
        cwd: context.cwd,
      });
    } finally {
      spinner.stop('Update finished');
    }

    for (const agent of result.agents) {
      reportAgent(agent);
    }

    if (flags.dryRun) {
      for (const agent of result.agents) {
        if (agent.status !== 'ok') continue;
        console.log(pc.dim(`--- ${agent.profile.paths.output} (dry run) ---`));
        process.stdout.write(agent.document);
      }
    }

    reportPublish(result);
    p.outro(result.exitCode === 0 ? 'Done.' : pc.red('Finished with errors.'));
    return result.exitCode;
  } catch (err) {
    p.log.error(errorMessage(err));
    return 1;
  }
}
