/**
 * Argument parsing for the guidance-updater CLI.
 *
 * Value flags accept both `--flag value` and `--flag=value`. `--agent` may
 * repeat; `all` selects every agent.
 */

import { ConfigError } from '../errors.js';
import { AGENT_KEYS, isAgentKey } from '../config/agent-profiles.js';
import type { AgentKey, AgentPaths } from '../config/agent-profiles.js';
import { DEFAULT_BASE_BRANCH, DEFAULT_BRANCH } from '../pipeline/guidance-run.js';

export interface CliFlags {
  help: boolean;
  dryRun: boolean;
  agents: AgentKey[];
  branch: string;
  baseBranch: string;
  skipGit: boolean;
  noPush: boolean;
  dynamic: boolean;
  configPath?: string;
  paths: Record<AgentKey, Partial<AgentPaths>>;
  positionals: string[];
}

type ValueSetter = (flags: CliFlags, value: string) => void;

const VALUE_FLAGS: Record<string, ValueSetter> = {
  agent: (flags, value) => {
    const selected = value === 'all' ? [...AGENT_KEYS] : [value];
    for (const key of selected) {
      if (!isAgentKey(key)) {
        throw new ConfigError(`Unknown agent "${value}" (expected ${AGENT_KEYS.join(', ')} or all)`, 'agent');
      }
      if (!flags.agents.includes(key)) flags.agents.push(key);
    }
  },
  branch: (flags, value) => { flags.branch = value; },
  'base-branch': (flags, value) => { flags.baseBranch = value; },
  config: (flags, value) => { flags.configPath = value; },
  state: (flags, value) => { flags.paths.codex.state = value; },
  'codex-state': (flags, value) => { flags.paths.codex.state = value; },
  codex: (flags, value) => { flags.paths.codex.output = value; },
  'codex-output': (flags, value) => { flags.paths.codex.output = value; },
  history: (flags, value) => { flags.paths.codex.history = value; },
  'codex-history': (flags, value) => { flags.paths.codex.history = value; },
  'claude-projects': (flags, value) => { flags.paths.claude.history = value; },
  'claude-history': (flags, value) => { flags.paths.claude.historyFile = value; },
  'claude-state': (flags, value) => { flags.paths.claude.state = value; },
  'claude-output': (flags, value) => { flags.paths.claude.output = value; },
};

const BOOLEAN_FLAGS: Record<string, (flags: CliFlags) => void> = {
  help: (flags) => { flags.help = true; },
  'dry-run': (flags) => { flags.dryRun = true; },
  'skip-git': (flags) => { flags.skipGit = true; },
  'no-push': (flags) => { flags.noPush = true; },
  dynamic: (flags) => { flags.dynamic = true; },
};

/**
 * Parse CLI arguments (after the command name).
 *
 * @throws {ConfigError} on unknown flags, missing values or unknown agents
 */
export function parseCliFlags(args: string[]): CliFlags {
  const flags: CliFlags = {
    help: false,
    dryRun: false,
    agents: [],
    branch: DEFAULT_BRANCH,
    baseBranch: DEFAULT_BASE_BRANCH,
    skipGit: false,
    noPush: false,
    dynamic: false,
    paths: { codex: {}, claude: {} },
    positionals: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h') {
      flags.help = true;
      continue;
    }
    if (!arg.startsWith('--')) {
      flags.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg.slice(2) : arg.slice(2, eq);
    const setBoolean = BOOLEAN_FLAGS[name];
    if (setBoolean) {
      if (eq !== -1) throw new ConfigError(`--${name} does not take a value`, name);
      setBoolean(flags);
      continue;
    }

    const setValue = VALUE_FLAGS[name];
    if (!setValue) {
      throw new ConfigError(`Unknown flag --${name}`, name);
    }
    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === '' || (eq === -1 && value.startsWith('--'))) {
      throw new ConfigError(`--${name} requires a value`, name);
    }
    setValue(flags, value);
  }

  if (flags.agents.length === 0) flags.agents.push('codex');
  return flags;
}
