import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

// Forced EEXIST from link(), to simulate a lock that reappears after removal.
const { linkConflicts } = vi.hoisted(() => ({ linkConflicts: { remaining: 0 } }));

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    link: async (existingPath: string, newPath: string): Promise<void> => {
      if (linkConflicts.remaining > 0) {
        linkConflicts.remaining -= 1;
        throw Object.assign(new Error(`EEXIST: file already exists, link '${newPath}'`), { code: 'EEXIST' });
      }
      return actual.link(existingPath, newPath);
    },
  };
});

import { mkdtemp, rm, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileLock, acquireStateLocks, lockPathFor } from './file-lock.js';
import { LockHeldError } from '../errors.js';
import type { LockHolder } from '../errors.js';

// ============================================================================
// FileLock Tests
// ============================================================================

describe('FileLock', () => {
  let tmpDir: string;
  let lockPath: string;
  let lock: FileLock;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'file-lock-test-'));
    lockPath = join(tmpDir, 'automation_state.json.lock');
    lock = new FileLock(lockPath);
  });

  afterEach(async () => {
    linkConflicts.remaining = 0;
    await rm(tmpDir, { recursive: true, force: true });
  });

  describe('acquire()', () => {
    it('should succeed when no lock exists', async () => {
      const result = await lock.acquire('update');
      expect(result.acquired).toBe(true);
      if (result.acquired) {
        await result.release();
      }
    });

    it('should write holder with PID, operation, timestamp, and hostname', async () => {
      const result = await lock.acquire('update');

      const info: LockHolder = JSON.parse(await readFile(lockPath, 'utf-8'));
      expect(info.pid).toBe(process.pid);
      expect(info.operation).toBe('update');
      expect(info.acquiredAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);
      expect(typeof info.hostname).toBe('string');

      if (result.acquired) {
        await result.release();
      }
    });

    it('should leave no temp files behind', async () => {
      const result = await lock.acquire('update');
      expect(await readdir(tmpDir)).toEqual(['automation_state.json.lock']);
      if (result.acquired) {
        await result.release();
      }
    });

    it('should report the holder when lock held by alive PID', async () => {
      const first = await lock.acquire('update');
      expect(first.acquired).toBe(true);

      const second = await lock.acquire('prune');
      expect(second.acquired).toBe(false);
      if (!second.acquired) {
        expect(second.holder?.pid).toBe(process.pid);
        expect(second.holder?.operation).toBe('update');
      }

      if (first.acquired) {
        await first.release();
      }
    });

    it('should clean up stale lock from dead PID and acquire', async () => {
      const stale: LockHolder = {
        pid: 2147483646,
        operation: 'update',
        acquiredAt: new Date().toISOString(),
        hostname: 'test-host',
      };
      await writeFile(lockPath, JSON.stringify(stale), 'utf-8');

      const result = await lock.acquire('update');
      expect(result.acquired).toBe(true);

      const info: LockHolder = JSON.parse(await readFile(lockPath, 'utf-8'));
      expect(info.pid).toBe(process.pid);

      if (result.acquired) {
        await result.release();
      }
    });

    it('should replace a corrupt lockfile', async () => {
      await writeFile(lockPath, 'not json{{{', 'utf-8');

      const result = await lock.acquire('update');
      expect(result.acquired).toBe(true);
      if (result.acquired) {
        await result.release();
      }
    });

    it('should report no holder when a stale lock reappears after removal', async () => {
      linkConflicts.remaining = 2;

      const result = await lock.acquire('update');

      expect(result).toEqual({ acquired: false, holder: null });
      expect(linkConflicts.remaining).toBe(0);
    });
  });

  describe('release()', () => {
    it('should remove the lockfile and allow re-acquisition', async () => {
      const first = await lock.acquire('update');
      if (first.acquired) {
        await first.release();
      }
      expect(await lock.isLocked()).toBe(false);

      const second = await lock.acquire('update');
      expect(second.acquired).toBe(true);
      if (second.acquired) {
        await second.release();
      }
    });

    it('should be idempotent', async () => {
      const result = await lock.acquire('update');
      if (result.acquired) {
        await result.release();
        await expect(result.release()).resolves.toBeUndefined();
      }
    });

    it('should not remove a lock taken over by another holder', async () => {
      const result = await lock.acquire('update');
      const other: LockHolder = {
        pid: process.pid,
        operation: 'prune',
        acquiredAt: '2020-01-01T00:00:00.000Z',
        hostname: 'test-host',
      };
      await writeFile(lockPath, JSON.stringify(other), 'utf-8');

      if (result.acquired) {
        await result.release();
      }
      expect(await lock.getHolder()).toEqual(other);
    });
  });

  describe('getHolder()', () => {
    it('should return null when no lockfile exists', async () => {
      expect(await lock.getHolder()).toBeNull();
    });

    it('should return null for corrupt lockfile', async () => {
      await writeFile(lockPath, '{"pid":"abc"}', 'utf-8');
      expect(await lock.getHolder()).toBeNull();
    });
  });
});

// ============================================================================
// acquireStateLocks Tests
// ============================================================================

describe('acquireStateLocks', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), 'state-locks-test-'));
  });

  afterEach(async () => {
    linkConflicts.remaining = 0;
    await rm(tmpDir, { recursive: true, force: true });
  });

  it('should derive the lock path from the state path', () => {
    expect(lockPathFor('/repo/.codex/automation_state.json')).toBe('/repo/.codex/automation_state.json.lock');
  });

  it('should let exactly one of two concurrent runs proceed', async () => {
    const statePath = join(tmpDir, 'automation_state.json');

    const outcomes = await Promise.allSettled([
      acquireStateLocks([statePath], 'update'),
      acquireStateLocks([statePath], 'update'),
    ]);

    const fulfilled = outcomes.filter((o) => o.status === 'fulfilled');
    const rejected = outcomes.filter((o): o is PromiseRejectedResult => o.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected).toHaveLength(1);
    expect(rejected[0].reason).toBeInstanceOf(LockHeldError);

    for (const outcome of outcomes) {
      if (outcome.status === 'fulfilled') await outcome.value();
    }
  });

  it('should describe a lock that could not be replaced without a holder PID', async () => {
    const statePath = join(tmpDir, 'automation_state.json');
    linkConflicts.remaining = 2;

    const failure = acquireStateLocks([statePath], 'update');

    await expect(failure).rejects.toThrow(
      `Lock ${statePath}.lock is stale or corrupt and could not be replaced. Remove it if no guidance-updater run is active.`,
    );
    await expect(failure).rejects.toMatchObject({ holder: null });
  });

  it('should release earlier locks when a later one is held', async () => {
    const a = join(tmpDir, 'a.json');
    const b = join(tmpDir, 'b.json');
    const holdB = await acquireStateLocks([b], 'update');

    await expect(acquireStateLocks([b, a], 'update')).rejects.toThrow(LockHeldError);
    expect(await new FileLock(lockPathFor(a)).isLocked()).toBe(false);

    await holdB();
  });

  it('should release every lock it took', async () => {
    const a = join(tmpDir, 'a.json');
    const b = join(tmpDir, 'b.json');
    const release = await acquireStateLocks([a, b], 'update');
    expect(await new FileLock(lockPathFor(a)).isLocked()).toBe(true);

    await release();
    expect(await readdir(tmpDir)).toEqual([]);
  });
});
