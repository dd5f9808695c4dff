/**
 * Pieces shared by the update, status and prune commands.
 */

import { homedir } from 'node:os';
import { resolveAgentProfile } from '../../config/agent-profiles.js';
import type { AgentProfile } from '../../config/agent-profiles.js';
import type { Env } from '../../config/settings.js';
import type { CliFlags } from '../flags.js';

/** Injection points for tests; every field defaults to the process. */
export interface CommandOptions {
  cwd?: string;
  env?: Env;
  home?: string;
}

export interface CommandContext {
  cwd: string;
  env: Env;
  home: string;
}

export function commandContext(options?: CommandOptions): CommandContext {
  return {
    cwd: options?.cwd ?? process.cwd(),
    env: options?.env ?? process.env,
    home: options?.home ?? homedir(),
  };
}

/** Profiles for every `--agent`, with path flags applied. */
export function profilesFromFlags(flags: CliFlags, context: CommandContext): AgentProfile[] {
  return flags.agents.map((key) => resolveAgentProfile(key, flags.paths[key], context.cwd, context.home));
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
