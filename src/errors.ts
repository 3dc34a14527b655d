/**
 * Error taxonomy for the mirroring engine.
 *
 * Every failure that crosses a component boundary is one of these. I/O paths
 * return them inside result objects; only programmer errors (bad configuration,
 * constructing an entity from an unvalidated URL, using a stopped queue) throw.
 */

export type MirrorErrorCode =
  | 'VALIDATION'
  | 'RATE_LIMITED'
  | 'METADATA'
  | 'CLONE_TRANSIENT'
  | 'FILESYSTEM'
  | 'ROLLBACK'
  | 'TASK_FAILED';

export abstract class MirrorError extends Error {
  abstract readonly code: MirrorErrorCode;
  /** Whether retrying later may succeed without operator action */
  abstract readonly recoverable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed URL or unrecognized host. Raised before any I/O. */
export class ValidationError extends MirrorError {
  readonly code = 'VALIDATION';
  readonly recoverable = false;

  constructor(
    message: string,
    readonly url: string
  ) {
    super(message);
  }
}

/**
 * The hosting API answered 403. Surfaced on its own so callers can back off
 * instead of hammering the API; metadata fetches are never retried here.
 */
export class RateLimitError extends MirrorError {
  readonly code = 'RATE_LIMITED';
  readonly recoverable = true;

  constructor(
    readonly repository: string,
    readonly status: number = 403
  ) {
    super(`Hosting API rate limit reached while querying ${repository}`);
  }
}

/** Any other non-200 answer, or a transport failure, from the hosting API. */
export class MetadataError extends MirrorError {
  readonly code = 'METADATA';
  readonly recoverable = true;

  constructor(
    message: string,
    readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** The clone call kept failing after every retry attempt. */
export class CloneTransientFailure extends MirrorError {
  readonly code = 'CLONE_TRANSIENT';
  readonly recoverable = true;

  constructor(
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export type FilesystemOperation = 'stat' | 'remove' | 'move' | 'copy' | 'mkdir' | 'verify';

export class FilesystemError extends MirrorError {
  readonly code = 'FILESYSTEM';
  readonly recoverable = false;

  constructor(
    readonly operation: FilesystemOperation,
    readonly path: string,
    options?: { cause?: unknown }
  ) {
    super(`Filesystem ${operation} failed for ${path}: ${describeCause(options?.cause)}`, options);
  }
}

/**
 * A clone failed AND the previous copy could not be put back. The destination
 * may be in neither the old nor the new state; both paths are left on disk.
 */
export class RollbackError extends MirrorError {
  readonly code = 'ROLLBACK';
  readonly recoverable = false;

  constructor(
    readonly destinationPath: string,
    readonly backupPath: string,
    readonly cloneError: Error,
    options?: { cause?: unknown }
  ) {
    super(
      `Rollback failed for ${destinationPath}; previous copy left at ${backupPath} ` +
        `(clone error: ${cloneError.message})`,
      options
    );
  }
}

/** Terminal, caller-visible failure of a scheduled task. */
export class TaskFailure extends MirrorError {
  readonly code = 'TASK_FAILED';
  readonly recoverable = false;

  constructor(
    readonly taskId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return 'unknown error';
  return String(cause);
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
