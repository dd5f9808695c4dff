/**
 * Discovery through the `codex exec` CLI.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { BackendUnavailableError } from '../errors.js';
import { truncateText } from '../sessions/text-sanitizer.js';
import { CompletionBackend } from './backend.js';
import type { BackendRuntime } from './backend.js';
import { isTransientError } from './retry.js';

const execFileAsync = promisify(execFile);

/** Output marker the CLI prints when it cannot reach its API. */
const NETWORK_FAILURE = 'error sending request';

export interface CodexBackendOptions {
  bin: string;
  sandbox: string;
  approval: string;
  enableNetwork: boolean;
  timeoutMs: number;
  cwd: string;
}

/** A codex run that is worth repeating (timeout or network failure). */
export class CodexTransientError extends Error {
  override name = 'CodexTransientError' as const;
}

interface ExecFailure {
  code?: string | number;
  killed?: boolean;
  signal?: string | null;
  stdout?: string;
  stderr?: string;
  message: string;
}

function asExecFailure(err: unknown): ExecFailure {
  if (!(err instanceof Error)) return { message: String(err) };
  const failure: ExecFailure = { message: err.message };
  for (const [key, value] of Object.entries(err)) {
    if (key === 'code' && (typeof value === 'string' || typeof value === 'number')) failure.code = value;
    if (key === 'killed' && typeof value === 'boolean') failure.killed = value;
    if (key === 'signal' && (typeof value === 'string' || value === null)) failure.signal = value;
    if (key === 'stdout' && typeof value === 'string') failure.stdout = value;
    if (key === 'stderr' && typeof value === 'string') failure.stderr = value;
  }
  return failure;
}

export class CodexBackend extends CompletionBackend {
  readonly name = 'codex';

  constructor(
    private readonly options: CodexBackendOptions,
    runtime: BackendRuntime,
  ) {
    super(runtime);
  }

  /** Arguments for `codex exec`, prompt last. */
  buildArgs(prompt: string): string[] {
    const args = ['-a', this.options.approval, 'exec', '--sandbox', this.options.sandbox, '--cd', this.options.cwd];
    if (this.options.sandbox === 'workspace-write' && this.options.enableNetwork) {
      args.push('-c', 'sandbox_workspace_write.network_access=true');
    }
    args.push(prompt);
    return args;
  }

  protected override isRetryable(err: unknown): boolean {
    return err instanceof CodexTransientError || isTransientError(err);
  }

  protected async complete(prompt: string): Promise<string> {
    let stdout: string;
    let stderr: string;
    try {
      ({ stdout, stderr } = await execFileAsync(this.options.bin, this.buildArgs(prompt), {
        cwd: this.options.cwd,
        timeout: this.options.timeoutMs,
        maxBuffer: 10 * 1024 * 1024,
      }));
    } catch (err) {
      const failure = asExecFailure(err);
      if (failure.code === 'ENOENT') {
        throw new BackendUnavailableError(`codex binary not found: ${this.options.bin}`, this.name, { cause: err });
      }
      if (failure.killed || failure.signal === 'SIGTERM') {
        throw new CodexTransientError(`codex exec timed out after ${this.options.timeoutMs}ms`, { cause: err });
      }
      const output = (failure.stderr || failure.stdout || failure.message).trim();
      if (output.toLowerCase().includes(NETWORK_FAILURE)) {
        throw new CodexTransientError(`codex could not reach its API: ${truncateText(output, 200)}`, { cause: err });
      }
      throw new BackendUnavailableError(`codex exec failed: ${truncateText(output, 200)}`, this.name, { cause: err });
    }

    if (`${stdout}\n${stderr}`.toLowerCase().includes(NETWORK_FAILURE)) {
      throw new CodexTransientError('codex could not reach its API');
    }
    return stdout;
  }
}
