/**
 * Thin wrapper over the git and gh CLIs.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { PublishError, errorMessage } from '../errors.js';

const execFileAsync = promisify(execFile);

export class CommandRunner {
  constructor(readonly cwd: string) {}

  /**
   * Run a command and return trimmed stdout.
   *
   * @throws {PublishError} tagged with `step`
   */
  async run(step: string, bin: string, args: string[]): Promise<string> {
    try {
      const { stdout } = await execFileAsync(bin, args, { cwd: this.cwd, maxBuffer: 10 * 1024 * 1024 });
      return stdout.trim();
    } catch (err) {
      throw new PublishError(`${step} failed (${bin} ${args.join(' ')}): ${errorMessage(err)}`, step, { cause: err });
    }
  }

  /** Trimmed stdout, or null when the command fails. */
  async capture(bin: string, args: string[]): Promise<string | null> {
    try {
      const { stdout } = await execFileAsync(bin, args, { cwd: this.cwd, maxBuffer: 10 * 1024 * 1024 });
      return stdout.trim();
    } catch {
      return null;
    }
  }

  /** Like run(), but reports failure as false instead of throwing. */
  async attempt(bin: string, args: string[]): Promise<boolean> {
    return (await this.capture(bin, args)) !== null;
  }
}

/** Repository root containing `dir`, or null outside a repository. */
export async function findRepoRoot(dir: string): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync('git', ['rev-parse', '--show-toplevel'], { cwd: dir });
    const root = stdout.trim();
    return root.length > 0 ? root : null;
  } catch {
    return null;
  }
}
