import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

const { spinner } = vi.hoisted(() => ({
  spinner: { start: vi.fn(), stop: vi.fn() },
}));

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  spinner: vi.fn(() => spinner),
  log: {
    message: vi.fn(),
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    success: vi.fn(),
  },
}));

vi.mock('picocolors', () => ({
  default: {
    bold: (s: string) => s,
    dim: (s: string) => s,
    red: (s: string) => s,
    yellow: (s: string) => s,
    green: (s: string) => s,
    cyan: (s: string) => s,
    bgCyan: (s: string) => s,
    black: (s: string) => s,
  },
}));

import * as p from '@clack/prompts';
import { updateCommand } from './update.js';
import { resolveAgentProfile } from '../../config/agent-profiles.js';
import type { GuidanceRunOptions, GuidanceRunResult } from '../../pipeline/guidance-run.js';
import type { AgentRunSuccess } from '../../pipeline/agent-run.js';

describe('updateCommand', () => {
  let tmpDir: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmpDir = await mkdtemp(join(tmpdir(), 'update-command-test-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('should print help and exit 0', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const code = await updateCommand(['--help']);

    expect(code).toBe(0);
    expect(log.mock.calls[0]?.[0]).toContain('Usage: guidance-updater update [options]');
  });

  it('should fail before running when the credential is missing', async () => {
    const run = vi.fn();

    const code = await updateCommand([], { cwd: tmpDir, env: {}, home: tmpDir, run });

    expect(code).toBe(1);
    expect(run).not.toHaveBeenCalled();
    expect(vi.mocked(p.log.error).mock.calls[0]?.[0]).toMatch(/^ANTHROPIC_API_KEY \(or CLAUDE_API_KEY\) is not set/);
  });

  it('should reject stray positional arguments', async () => {
    const run = vi.fn();

    const code = await updateCommand(['now'], { cwd: tmpDir, env: { ANTHROPIC_API_KEY: 'test-secret' }, run });

    expect(code).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith('Unexpected argument: now');
  });

  it('should pass flags through to the pipeline', async () => {
    const run = vi.fn(async (_options: GuidanceRunOptions): Promise<GuidanceRunResult> => ({
      agents: [],
      publishSkipped: 'disabled',
      exitCode: 0,
    }));

    const code = await updateCommand(
      ['--agent', 'all', '--skip-git', '--dynamic', '--branch=guidance/next'],
      { cwd: tmpDir, env: { ANTHROPIC_API_KEY: 'test-secret' }, home: tmpDir, run },
    );

    expect(code).toBe(0);
    const options = run.mock.calls[0]?.[0];
    expect(options?.profiles.map((profile) => profile.key)).toEqual(['codex', 'claude']);
    expect(options?.profiles[0]?.paths.history).toBe(join(tmpDir, '.codex', 'history.jsonl'));
    expect(options?.resolved.settings.discovery_mode).toBe('dynamic');
    expect(options?.resolved.apiKey).toBe('test-secret');
    expect(options?.dryRun).toBe(false);
    expect(options?.publish).toEqual({
      enabled: false,
      branch: 'guidance/next',
      baseBranch: 'main',
      push: true,
    });
    expect(spinner.stop).toHaveBeenCalledWith('Update finished');
  });

  it('should write the dry-run document to stdout and return the run exit code', async () => {
    const write = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const profile = resolveAgentProfile('codex', {}, tmpDir, tmpDir);
    const agent: AgentRunSuccess = {
      profile,
      readErrors: [],
      skippedLines: 2,
      newSessions: ['s1'],
      updatedSessions: [],
      status: 'ok',
      discovery: 'skipped',
      totalSessions: 1,
      newPatterns: [],
      foldedInto: [],
      discarded: 0,
      patterns: [],
      migrated: false,
      document: '# Codex Improvement Guidelines\n',
      documentWritten: false,
      stateWritten: false,
    };
    const run = vi.fn(async (): Promise<GuidanceRunResult> => ({
      agents: [agent],
      publishSkipped: 'dry-run',
      exitCode: 0,
    }));

    const code = await updateCommand(
      ['--dry-run'],
      { cwd: tmpDir, env: { PATTERN_UPDATER_DISABLE_LLM: '1' }, home: tmpDir, run },
    );

    expect(code).toBe(0);
    expect(write).toHaveBeenCalledWith('# Codex Improvement Guidelines\n');
    expect(p.log.warn).toHaveBeenCalledWith('codex: skipped 2 unreadable history lines');
    expect(p.log.info).toHaveBeenCalledWith('codex: 1 new / 0 updated sessions (1 total)');
  });

  it('should return 1 when the run reports failure', async () => {
    const run = vi.fn(async (): Promise<GuidanceRunResult> => ({
      agents: [],
      publishSkipped: 'agent-failed',
      exitCode: 1,
    }));

    const code = await updateCommand([], { cwd: tmpDir, env: { ANTHROPIC_API_KEY: 'test-secret' }, home: tmpDir, run });

    expect(code).toBe(1);
    expect(p.log.warn).toHaveBeenCalledWith('Skipped commit: an agent failed');
    expect(p.outro).toHaveBeenCalledWith('Finished with errors.');
  });
});
