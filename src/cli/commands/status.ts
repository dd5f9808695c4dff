/**
 * status command - show what the automation state knows, per agent.
 *
 * Usage:
 *   guidance-updater status                Codex state summary
 *   guidance-updater status --agent all    Every agent
 *   guidance-updater status --json         Machine-readable output
 */

import * as p from '@clack/prompts';
import pc from 'picocolors';
import { errorMessage } from '../../errors.js';
import { collectStatus } from '../../pipeline/maintenance.js';
import type { AgentStatus } from '../../pipeline/maintenance.js';
import { parseCliFlags } from '../flags.js';
import { commandContext, plural, profilesFromFlags } from './shared.js';
import type { CommandOptions } from './shared.js';

const HELP_TEXT = `
Usage: guidance-updater status [options]

Show tracked sessions, pattern counts and lock state for each selected
agent. Reads the state files only; nothing is written.

Options:
  --agent <codex|claude|all>  Agent to show (repeatable, default: codex)
  --json                      Output as JSON
  --state <path>              Codex state file
  --claude-state <path>       Claude state file
  --help, -h                  Show this help message
`;

function statusJson(status: AgentStatus) {
  return {
    agent: status.profile.key,
    statePath: status.profile.paths.state,
    outputPath: status.profile.paths.output,
    stateExists: status.stateExists,
    trackedSessions: status.trackedSessions,
    pendingLegacySessions: status.pendingLegacySessions,
    updatedAt: status.updatedAt ?? null,
    locked: status.locked,
    patterns: status.patterns,
  };
}

function renderStatus(status: AgentStatus): string {
  const lines = [
    `${pc.bold(status.profile.docTitle)} ${pc.dim(`(${status.profile.paths.state})`)}`,
  ];
  if (!status.stateExists) {
    lines.push(pc.dim('  No state yet; run update first.'));
    return lines.join('\n');
  }

  lines.push(`  Sessions tracked: ${status.trackedSessions}`);
  if (status.pendingLegacySessions > 0) {
    lines.push(`  Awaiting back-fill: ${plural(status.pendingLegacySessions, 'legacy session')}`);
  }
  lines.push(`  Last updated: ${status.updatedAt ?? 'never'}`);
  if (status.locked) {
    lines.push(pc.yellow('  An update is running (lock held)'));
  }

  lines.push('', `  Patterns (${status.patterns.length}):`);
  for (const pattern of status.patterns) {
    const origin = pattern.origin === 'dynamic' ? pc.cyan('dynamic') : pc.dim('static ');
    lines.push(`  ${String(pattern.occurrenceCount).padStart(4)}  ${origin}  ${pattern.title} ${pc.dim(pattern.identifier)}`);
  }
  return lines.join('\n');
}

/**
 * Status command entry point.
 *
 * @param args - Command-line arguments after 'status'
 * @returns Exit code (0 for success, 1 for error)
 */
export async function statusCommand(args: string[], options?: CommandOptions): Promise<number> {
  if (args.includes('--help') || args.includes('-h')) {
    console.log(HELP_TEXT);
    return 0;
  }

  const jsonMode = args.includes('--json');
  const context = commandContext(options);

  try {
    const flags = parseCliFlags(args.filter((arg) => arg !== '--json'));
    const statuses: AgentStatus[] = [];
    for (const profile of profilesFromFlags(flags, context)) {
      statuses.push(await collectStatus(profile));
    }

    if (jsonMode) {
      console.log(JSON.stringify(statuses.map(statusJson), null, 2));
      return 0;
    }

    console.log(statuses.map(renderStatus).join('\n\n'));
    return 0;
  } catch (err) {
    p.log.error(`Failed to show status: ${errorMessage(err)}`);
    return 1;
  }
}
