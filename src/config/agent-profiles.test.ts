import { describe, it, expect } from 'vitest';
import { isAgentKey, resolveAgentProfile, resolveUserPath } from './agent-profiles.js';

describe('resolveAgentProfile', () => {
  it('should place Codex history under home and outputs under the working directory', () => {
    const profile = resolveAgentProfile('codex', {}, '/work', '/home/u');

    expect(profile.docTitle).toBe('Codex Improvement Guidelines');
    expect(profile.paths).toEqual({
      history: '/home/u/.codex/history.jsonl',
      historyFile: undefined,
      state: '/work/.codex/automation_state.json',
      output: '/work/.codex/AGENTS.md',
    });
  });

  it('should include the flat history file for Claude', () => {
    const profile = resolveAgentProfile('claude', {}, '/work', '/home/u');

    expect(profile.source).toBe('claude');
    expect(profile.paths.history).toBe('/home/u/.claude/projects');
    expect(profile.paths.historyFile).toBe('/home/u/.claude/history.jsonl');
    expect(profile.manualSection.startMarker).toBe('<!-- manual-claude-guidance:start -->');
  });

  it('should apply overrides with tilde and relative paths', () => {
    const profile = resolveAgentProfile(
      'claude',
      { state: '~/s.json', output: '/abs/CLAUDE.md', history: 'rel/projects' },
      '/work',
      '/home/u',
    );

    expect(profile.paths.state).toBe('/home/u/s.json');
    expect(profile.paths.output).toBe('/abs/CLAUDE.md');
    expect(profile.paths.history).toBe('/work/rel/projects');
  });

  it('should hand out independent copies', () => {
    const first = resolveAgentProfile('codex', {}, '/work', '/home/u');
    first.staticCallouts.push('extra');

    expect(resolveAgentProfile('codex', {}, '/work', '/home/u').staticCallouts).toHaveLength(3);
  });
});

describe('resolveUserPath', () => {
  it('should expand a bare tilde', () => {
    expect(resolveUserPath('~', '/w', '/h')).toBe('/h');
  });
});

describe('isAgentKey', () => {
  it('should accept known agents only', () => {
    expect(isAgentKey('claude')).toBe(true);
    expect(isAgentKey('cursor')).toBe(false);
  });
});
