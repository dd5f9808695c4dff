/**
 * Agent profiles: which history a coding agent leaves behind, where its
 * guidance document and automation state live, and how the document is
 * titled.
 *
 * Relative paths resolve against the working directory of the run; a
 * leading `~` expands to the home directory.
 *
 * @module config/agent-profiles
 */

import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import type { HistorySourceKind } from '../sessions/types.js';

export const AGENT_KEYS = ['codex', 'claude'] as const;
export type AgentKey = (typeof AGENT_KEYS)[number];

export function isAgentKey(value: string): value is AgentKey {
  return (AGENT_KEYS as readonly string[]).includes(value);
}

/** Delimited operator-authored block carried through every regeneration. */
export interface ManualSectionSpec {
  header: string;
  startMarker: string;
  endMarker: string;
  /** Used only when the existing document has no block yet. */
  defaultLines: string[];
}

export interface AgentPaths {
  /** Codex: history.jsonl. Claude: the projects directory. */
  history: string;
  /** Claude only: flat history.jsonl of quick prompts. */
  historyFile?: string;
  state: string;
  output: string;
}

export interface AgentProfile {
  key: AgentKey;
  source: HistorySourceKind;
  docTitle: string;
  docIntro: string;
  calloutHeader: string;
  staticCallouts: string[];
  manualSection: ManualSectionSpec;
  paths: AgentPaths;
}

type ProfileTemplate = Omit<AgentProfile, 'paths'> & {
  defaultPaths: (home: string) => AgentPaths;
};

const PROFILES: Record<AgentKey, ProfileTemplate> = {
  codex: {
    key: 'codex',
    source: 'codex',
    docTitle: 'Codex Improvement Guidelines',
    docIntro:
      'Codex acts as an autonomous coding partner. The notes below distill common issues spotted ' +
      'across past sessions in `~/.codex/history.jsonl` and turn them into guardrails that apply to any repo.',
    calloutHeader: '# Callouts',
    staticCallouts: [
      'Do not implement fallbacks. When something is unclear or not working, avoid mocked data or quick hacks; surface the blocker instead.',
      'Prefer rg (ripgrep) over grep for searching.',
      'Reach for the available MCP tools before manual spelunking.',
    ],
    manualSection: {
      header: '## Manual Guidance',
      startMarker: '<!-- manual-guidance:start -->',
      endMarker: '<!-- manual-guidance:end -->',
      defaultLines: [],
    },
    defaultPaths: (home) => ({
      history: join(home, '.codex', 'history.jsonl'),
      state: join('.codex', 'automation_state.json'),
      output: join('.codex', 'AGENTS.md'),
    }),
  },
  claude: {
    key: 'claude',
    source: 'claude',
    docTitle: 'Claude Improvement Guidelines',
    docIntro:
      'Claude acts as an autonomous coding partner alongside Codex. The notes below distill recurrent ' +
      'themes from local Claude sessions (captured under `~/.claude/projects`) so future runs follow the same guardrails.',
    calloutHeader: '# Callouts',
    staticCallouts: [],
    manualSection: {
      header: '## Manual Reminders',
      startMarker: '<!-- manual-claude-guidance:start -->',
      endMarker: '<!-- manual-claude-guidance:end -->',
      defaultLines: [
        '- Write plan and todo markdown files to a dedicated docs folder.',
        '- Do not add fallbacks.',
        '- Start new issues on a fresh worktree and branch so parallel agents do not collide.',
        '- Keep agent attribution out of commit messages and pull requests.',
      ],
    },
    defaultPaths: (home) => ({
      history: join(home, '.claude', 'projects'),
      historyFile: join(home, '.claude', 'history.jsonl'),
      state: join('.claude', 'automation_state.json'),
      output: join('.claude', 'CLAUDE.md'),
    }),
  },
};

/** Expand `~` and resolve relative paths against `cwd`. */
export function resolveUserPath(path: string, cwd: string, home: string = homedir()): string {
  if (path === '~') return home;
  if (path.startsWith('~/')) return join(home, path.slice(2));
  return isAbsolute(path) ? path : resolve(cwd, path);
}

/**
 * Build a profile with concrete absolute paths.
 *
 * @param overrides - Paths from CLI flags; unset fields keep the defaults
 */
export function resolveAgentProfile(
  key: AgentKey,
  overrides: Partial<AgentPaths> = {},
  cwd: string = process.cwd(),
  home: string = homedir(),
): AgentProfile {
  const { defaultPaths, ...template } = PROFILES[key];
  const defaults = defaultPaths(home);
  const pick = (value: string | undefined, fallback: string | undefined): string | undefined => {
    const chosen = value ?? fallback;
    return chosen === undefined ? undefined : resolveUserPath(chosen, cwd, home);
  };

  return {
    ...template,
    staticCallouts: [...template.staticCallouts],
    manualSection: { ...template.manualSection, defaultLines: [...template.manualSection.defaultLines] },
    paths: {
      history: resolveUserPath(overrides.history ?? defaults.history, cwd, home),
      historyFile: pick(overrides.historyFile, defaults.historyFile),
      state: resolveUserPath(overrides.state ?? defaults.state, cwd, home),
      output: resolveUserPath(overrides.output ?? defaults.output, cwd, home),
    },
  };
}
