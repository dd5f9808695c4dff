import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
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
    dim: (s: string) => s,
    yellow: (s: string) => s,
    bgCyan: (s: string) => s,
    black: (s: string) => s,
  },
}));

import * as p from '@clack/prompts';
import { pruneCommand } from './prune.js';
import { AutomationStateStore, createEmptyState } from '../../state/automation-state-store.js';

describe('pruneCommand', () => {
  let tmpDir: string;
  let statePath: string;

  beforeEach(async () => {
    vi.clearAllMocks();
    tmpDir = await mkdtemp(join(tmpdir(), 'prune-command-test-'));
    statePath = join(tmpDir, 'state.json');
    const state = createEmptyState();
    state.patterns['dynamic-use-jq'] = {
      identifier: 'dynamic-use-jq',
      title: 'Reach for jq',
      description: '',
      keywords: ['jq'],
      bullets: ['Use jq for JSON.'],
      examples: [],
      occurrence_count: 2,
      origin: 'dynamic',
    };
    await new AutomationStateStore(statePath).save(state);
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  const run = (...ids: string[]) =>
    pruneCommand([...ids, '--state', 'state.json', '--codex', 'AGENTS.md'], { cwd: tmpDir, env: {}, home: tmpDir });

  it('should remove a dynamic pattern and regenerate the document', async () => {
    const code = await run('dynamic-use-jq');

    expect(code).toBe(0);
    expect(p.log.success).toHaveBeenCalledWith('Removed dynamic-use-jq');
    const state = JSON.parse(await readFile(statePath, 'utf-8'));
    expect(state.patterns['dynamic-use-jq']).toBeUndefined();
    expect(state.patterns.plan_first.origin).toBe('static');
    const doc = await readFile(join(tmpDir, 'AGENTS.md'), 'utf-8');
    expect(doc.startsWith('# Codex Improvement Guidelines\n')).toBe(true);
    expect(doc).not.toContain('Reach for jq');
  });

  it('should exit 1 for unknown identifiers', async () => {
    const code = await run('dynamic-missing');

    expect(code).toBe(1);
    expect(p.log.warn).toHaveBeenCalledWith('No pattern named dynamic-missing');
  });

  it('should require an identifier', async () => {
    const code = await run();

    expect(code).toBe(1);
    expect(p.log.error).toHaveBeenCalledWith('prune needs at least one pattern identifier');
  });
});
