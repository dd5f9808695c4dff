import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { MockInstance } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('@clack/prompts', () => ({
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
    yellow: (s: string) => s,
    cyan: (s: string) => s,
  },
}));

import * as p from '@clack/prompts';
import { statusCommand } from './status.js';
import { AutomationStateStore, createEmptyState } from '../../state/automation-state-store.js';

describe('statusCommand', () => {
  let tmpDir: string;
  let log: MockInstance<typeof console.log>;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmpDir = await mkdtemp(join(tmpdir(), 'status-command-test-'));
    log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('should print JSON for a saved state', async () => {
    const state = createEmptyState();
    state.session_progress = { s1: 100, s2: 200 };
    state.legacy_processed_sessions = ['old'];
    state.patterns['dynamic-use-jq'] = {
      identifier: 'dynamic-use-jq',
      title: 'Reach for jq',
      description: '',
      keywords: ['jq'],
      bullets: [],
      examples: [],
      occurrence_count: 4,
      origin: 'dynamic',
    };
    await new AutomationStateStore(join(tmpDir, 'state.json')).save(state);

    const code = await statusCommand(['--json', '--state', 'state.json'], { cwd: tmpDir, home: tmpDir });

    expect(code).toBe(0);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual([
      {
        agent: 'codex',
        statePath: join(tmpDir, 'state.json'),
        outputPath: join(tmpDir, '.codex', 'AGENTS.md'),
        stateExists: true,
        trackedSessions: 2,
        pendingLegacySessions: 1,
        updatedAt: null,
        locked: false,
        patterns: [
          { identifier: 'dynamic-use-jq', title: 'Reach for jq', origin: 'dynamic', occurrenceCount: 4 },
        ],
      },
    ]);
  });

  it('should tell the operator when no state exists yet', async () => {
    const code = await statusCommand(['--agent', 'claude'], { cwd: tmpDir, home: tmpDir });

    expect(code).toBe(0);
    expect(log).toHaveBeenCalledWith(
      `Claude Improvement Guidelines (${join(tmpDir, '.claude', 'automation_state.json')})\n  No state yet; run update first.`,
    );
  });

  it('should report bad flags', async () => {
    const code = await statusCommand(['--agent', 'cursor'], { cwd: tmpDir, home: tmpDir });

    expect(code).toBe(1);
    expect(vi.mocked(p.log.error).mock.calls[0]?.[0]).toMatch(/^Failed to show status: Unknown agent "cursor"/);
  });
});
