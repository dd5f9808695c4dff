/**
 * Advisory lock on a state file.
 *
 * The lock lives next to the state as `<state>.lock` and records the
 * holder. Its content is written to a temp file first and then hard-linked
 * into place; `link` fails with EEXIST when the lock exists, so creation
 * is atomic and a reader never sees an empty lock file.
 *
 * A lock whose PID is dead, or whose content cannot be parsed, is stale:
 * it is removed once and acquisition retried.
 */

import { z } from 'zod';
import { link, mkdir, readFile, unlink, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { hostname } from 'node:os';
import { LockHeldError } from '../errors.js';
import type { LockHolder } from '../errors.js';

// ============================================================================
// Zod Schemas
// ============================================================================

const LockHolderSchema = z.object({
  pid: z.number().int(),
  operation: z.string(),
  acquiredAt: z.string(),
  hostname: z.string(),
}).passthrough();

export type LockAcquireResult =
  | { acquired: true; release: () => Promise<void> }
  /** `holder` is null when a stale or corrupt lock reappeared after removal. */
  | { acquired: false; holder: LockHolder | null };

/** Lock path guarding a state file. */
export function lockPathFor(statePath: string): string {
  return `${statePath}.lock`;
}

async function unlinkIfPresent(path: string): Promise<void> {
  try {
    await unlink(path);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'ENOENT') throw err;
  }
}

/**
 * Check if a PID is alive using process.kill(pid, 0).
 *
 * Signal 0 checks existence without sending a signal. EPERM means the
 * process exists but belongs to someone else.
 */
export function isPidAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    return (err as NodeJS.ErrnoException).code === 'EPERM';
  }
}

// ============================================================================
// FileLock
// ============================================================================

export class FileLock {
  constructor(readonly lockPath: string) {}

  /**
   * Attempt to acquire the lock for the given operation.
   *
   * Returns the holder instead of throwing when a live process owns it.
   */
  async acquire(operation: string): Promise<LockAcquireResult> {
    return this.tryAcquire(operation, true);
  }

  /**
   * Parse the lock file.
   *
   * @returns The holder, or null if there is no lock or it is corrupt
   */
  async getHolder(): Promise<LockHolder | null> {
    let content: string;
    try {
      content = await readFile(this.lockPath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw err;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch {
      return null;
    }
    const result = LockHolderSchema.safeParse(parsed);
    return result.success ? result.data : null;
  }

  /** True when a live process holds the lock. */
  async isLocked(): Promise<boolean> {
    const holder = await this.getHolder();
    return holder !== null && isPidAlive(holder.pid);
  }

  private async tryAcquire(operation: string, allowRetry: boolean): Promise<LockAcquireResult> {
    const dir = dirname(this.lockPath);
    await mkdir(dir, { recursive: true });

    const holder: LockHolder = {
      pid: process.pid,
      operation,
      acquiredAt: new Date().toISOString(),
      hostname: hostname(),
    };

    const tempPath = join(
      dir,
      `.${basename(this.lockPath)}-${process.pid}-${Math.random().toString(36).slice(2)}.tmp`,
    );
    await writeFile(tempPath, JSON.stringify(holder), 'utf-8');

    try {
      await link(tempPath, this.lockPath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'EEXIST') {
        throw err;
      }

      const existing = await this.getHolder();
      if (existing && isPidAlive(existing.pid)) {
        return { acquired: false, holder: existing };
      }
      // Stale or corrupt
      if (allowRetry) {
        await unlinkIfPresent(this.lockPath);
        return this.tryAcquire(operation, false);
      }
      return { acquired: false, holder: existing };
    } finally {
      await unlinkIfPresent(tempPath);
    }

    const lockPath = this.lockPath;
    let released = false;
    const release = async (): Promise<void> => {
      if (released) return;
      const current = await this.getHolder();
      if (current && current.pid === holder.pid && current.acquiredAt === holder.acquiredAt) {
        await unlinkIfPresent(lockPath);
      }
      released = true;
    };

    return { acquired: true, release };
  }
}

// ============================================================================
// Multi-file locking
// ============================================================================

/** Releases every lock taken by `acquireStateLocks`. */
export type ReleaseLocks = () => Promise<void>;

/**
 * Lock several state files, in sorted path order.
 *
 * @throws {LockHeldError} when any lock is held; locks taken so far are
 *   released first
 */
export async function acquireStateLocks(statePaths: string[], operation: string): Promise<ReleaseLocks> {
  const releases: Array<() => Promise<void>> = [];
  const releaseAll: ReleaseLocks = async () => {
    for (const release of releases.reverse()) {
      await release();
    }
    releases.length = 0;
  };

  for (const lockPath of [...new Set(statePaths.map(lockPathFor))].sort()) {
    const result = await new FileLock(lockPath).acquire(operation);
    if (!result.acquired) {
      await releaseAll();
      throw new LockHeldError(lockPath, result.holder);
    }
    releases.push(result.release);
  }
  return releaseAll;
}
