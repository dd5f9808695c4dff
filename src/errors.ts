/**
 * Error taxonomy for guidance updates.
 *
 * | Error                    | Scope                         | Exit |
 * |--------------------------|-------------------------------|------|
 * | ConfigError              | before any I/O side effect    | 1    |
 * | LockHeldError            | before any write              | 1    |
 * | StateFileError           | state file unreadable/invalid | 1    |
 * | BackendUnavailableError  | aborts discovery for an agent | 1    |
 * | MalformedResponseError   | aborts discovery for an agent | 1    |
 * | SessionReadError         | one source, run continues     | 0    |
 * | PublishError             | after files are on disk       | 1    |
 *
 * @module errors
 */

/** Invalid flags, settings or a missing credential. */
export class ConfigError extends Error {
  override name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/** The language-model backend cannot be reached or refused the request. */
export class BackendUnavailableError extends Error {
  override name = 'BackendUnavailable' as const;

  constructor(
    message: string,
    public readonly backend: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Backend output did not match the candidate schema. */
export class MalformedResponseError extends Error {
  override name = 'MalformedResponse' as const;

  constructor(
    message: string,
    /** First characters of the raw backend output, for diagnosis. */
    public readonly snippet: string,
  ) {
    super(message);
  }
}

/** A history source or transcript could not be read. Non-fatal. */
export class SessionReadError extends Error {
  override name = 'SessionReadError' as const;

  constructor(
    message: string,
    /** Path of the file that failed. */
    public readonly source: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Holder details as recorded in the lock file. */
export interface LockHolder {
  pid: number;
  operation: string;
  acquiredAt: string;
  hostname: string;
}

/**
 * Another run holds the lock on the same state file, or a stale lock
 * could not be replaced (`holder` is null).
 */
export class LockHeldError extends Error {
  override name = 'LockHeldError' as const;

  constructor(
    public readonly lockPath: string,
    public readonly holder: LockHolder | null,
  ) {
    super(
      holder
        ? `Lock ${lockPath} held by PID ${holder.pid} (operation: ${holder.operation}, acquired: ${holder.acquiredAt}). Another guidance-updater run is in progress.`
        : `Lock ${lockPath} is stale or corrupt and could not be replaced. Remove it if no guidance-updater run is active.`,
    );
  }
}

/** The persisted state file exists but cannot be used. */
export class StateFileError extends Error {
  override name = 'StateFileError' as const;

  constructor(
    message: string,
    public readonly statePath: string,
  ) {
    super(message);
  }
}

/** A git or gh step failed while publishing. */
export class PublishError extends Error {
  override name = 'PublishError' as const;

  constructor(
    message: string,
    public readonly step: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** Errors that abort discovery for one agent without touching its files. */
export type DiscoveryError = BackendUnavailableError | MalformedResponseError;

/** Render an unknown thrown value as a message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
