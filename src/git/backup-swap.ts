import { dirname } from 'path';
import { FilesystemError, RollbackError, type CloneTransientFailure } from '../errors.js';
import type { CloneClient, LocalRepository } from '../types.js';
import { logIncident } from '../utils/incident-log.js';
import { logger, repoTag } from '../utils/logger.js';
import { backupPathFor } from './destination.js';
import {
  checkExists,
  ensureDirectory,
  moveDirectory,
  nodeFileSystem,
  removeDirectory,
  type FileSystemOps,
} from './fs-ops.js';
import { withRetry, type RetryOptions } from './retry.js';

export interface CloneSource {
  url: string;
  owner: string;
  name: string;
}

export interface CloneIntoOptions {
  branch?: string;
  depth?: number;
}

export type CloneOutcome =
  | {
      success: true;
      path: string;
      repository: LocalRepository;
      attempts: number;
      /** Set when the old copy could not be deleted after a successful clone */
      staleBackupPath?: string;
    }
  | {
      success: false;
      error: CloneTransientFailure | FilesystemError | RollbackError;
      attempts: number;
      /** True when the destination is back in its pre-call state (or absent, if it was) */
      restored: boolean;
    };

export interface BackupSwapOptions {
  retry?: Omit<RetryOptions, 'label' | 'onAttemptFailed'>;
  fs?: FileSystemOps;
}

/**
 * Clones into a destination without ever losing the previous good copy.
 *
 * An existing destination is moved aside to `backup-<name>` first. The clone
 * runs (with retries) into the now-absent path. On success the backup is
 * deleted; on failure the partial clone is removed and the backup is moved
 * back. A backup never outlives the call that created it, except when the
 * rollback itself fails and both copies are kept for manual recovery.
 */
export class BackupSwapCloner {
  private readonly fs: FileSystemOps;

  constructor(
    private client: CloneClient,
    private options: BackupSwapOptions = {}
  ) {
    this.fs = options.fs ?? nodeFileSystem;
  }

  async cloneInto(source: CloneSource, destinationPath: string, options: CloneIntoOptions = {}): Promise<CloneOutcome> {
    const tag = repoTag(source.owner, source.name);

    const parent = await ensureDirectory(dirname(destinationPath), this.fs);
    if (!parent.success) {
      return { success: false, error: parent.error, attempts: 0, restored: true };
    }

    // Step 1: move the current copy aside
    let backupPath: string | null = null;
    const destinationExists = await checkExists(destinationPath, this.fs);
    if (!destinationExists.success) {
      return { success: false, error: destinationExists.error, attempts: 0, restored: true };
    }
    if (destinationExists.value) {
      backupPath = backupPathFor(destinationPath);
      logger.info(`${tag} Destination exists, moving it aside`, { destinationPath, backupPath });

      const backupExists = await checkExists(backupPath, this.fs);
      if (!backupExists.success) {
        return { success: false, error: backupExists.error, attempts: 0, restored: true };
      }
      if (backupExists.value) {
        logger.info(`${tag} Deleting previous backup generation`, { backupPath });
        const stale = await removeDirectory(backupPath, this.fs);
        if (!stale.success) {
          return { success: false, error: stale.error, attempts: 0, restored: true };
        }
      }

      const moved = await moveDirectory(destinationPath, backupPath, this.fs);
      if (!moved.success) {
        return { success: false, error: moved.error, attempts: 0, restored: true };
      }
    }

    // Step 2: clone, each failed attempt leaves the destination absent again
    logger.info(`${tag} Cloning ${source.url}`, { destinationPath, branch: options.branch });
    const outcome = await withRetry(
      () => this.client.clone(source.url, destinationPath, { branch: options.branch, depth: options.depth }),
      {
        ...this.options.retry,
        label: `${tag} clone`,
        onAttemptFailed: async () => {
          const cleaned = await removeDirectory(destinationPath, this.fs);
          if (!cleaned.success) {
            logger.warn(`${tag} Could not clear partial clone before next attempt`, {
              destinationPath,
              error: cleaned.error.message,
            });
          }
        },
      }
    );

    if (outcome.success) {
      // Step 3: drop the old copy
      let staleBackupPath: string | undefined;
      if (backupPath) {
        const removed = await removeDirectory(backupPath, this.fs);
        if (!removed.success) {
          staleBackupPath = backupPath;
          logger.warn(`${tag} Clone succeeded but the backup could not be deleted`, {
            backupPath,
            error: removed.error.message,
          });
        }
      }

      logger.info(`${tag} Clone complete`, { destinationPath, attempts: outcome.attempts });
      return {
        success: true,
        path: destinationPath,
        repository: outcome.value,
        attempts: outcome.attempts,
        ...(staleBackupPath ? { staleBackupPath } : {}),
      };
    }

    // Steps 4 & 5: remove whatever the clone left, then restore the old copy
    const cloneError = outcome.error;
    const partial = await removeDirectory(destinationPath, this.fs);

    if (!backupPath) {
      if (!partial.success) {
        logger.error(`${tag} Clone failed and the partial destination could not be removed`, {
          destinationPath,
          error: partial.error.message,
        });
      }
      return { success: false, error: cloneError, attempts: outcome.attempts, restored: partial.success };
    }

    const restoreError = partial.success ? await this.restoreBackup(backupPath, destinationPath) : partial.error;

    if (restoreError) {
      const rollbackError = new RollbackError(destinationPath, backupPath, cloneError, { cause: restoreError });
      logger.error(`${tag} ROLLBACK FAILED - manual recovery required`, {
        destinationPath,
        backupPath,
        cloneError: cloneError.message,
        rollbackError: restoreError.message,
      });
      logIncident('ROLLBACK FAILED', {
        repository: `${source.owner}/${source.name}`,
        destinationPath,
        backupPath,
        cloneError: cloneError.message,
        rollbackError: restoreError.message,
      });
      return { success: false, error: rollbackError, attempts: outcome.attempts, restored: false };
    }

    logger.warn(`${tag} Clone failed, previous copy restored`, { destinationPath, error: cloneError.message });
    return { success: false, error: cloneError, attempts: outcome.attempts, restored: true };
  }

  private async restoreBackup(backupPath: string, destinationPath: string): Promise<FilesystemError | null> {
    const moved = await moveDirectory(backupPath, destinationPath, this.fs);
    return moved.success ? null : moved.error;
  }
}
