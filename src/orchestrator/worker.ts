import { BackupSwapCloner } from '../git/backup-swap.js';
import { resolveDestination, shortBranchName } from '../git/destination.js';
import { logger } from '../utils/logger.js';
import type { CloneTask, TaskRunResult } from './task-queue.js';

export interface CloneWorkerOptions {
  /** Passed to `git clone --depth`; full history when unset */
  depth?: number;
}

/**
 * Runs one clone task: resolves where the clone lives, performs the
 * backup-swap clone and records the clone on the repository when it succeeds.
 */
export class CloneWorker {
  constructor(
    private cloner: BackupSwapCloner,
    private options: CloneWorkerOptions = {}
  ) {}

  /** Bound `run`, suitable as a `TaskQueue` runner. */
  readonly runner = (task: CloneTask): Promise<TaskRunResult> => this.run(task);

  async run(task: CloneTask): Promise<TaskRunResult> {
    const { source } = task;
    const destinationPath = resolveDestination(task.destinationRoot, source.identity(), task.branch);
    const branch = task.branch ? shortBranchName(task.branch) : undefined;

    const outcome = await this.cloner.cloneInto(
      { url: source.url, owner: source.owner, name: source.name },
      destinationPath,
      { branch, depth: this.options.depth }
    );

    if (!outcome.success) {
      logger.error(`Worker failed to clone ${source.fullName}`, {
        taskId: task.id,
        branch,
        attempts: outcome.attempts,
        restored: outcome.restored,
        error: outcome.error.message,
      });
      return { success: false, error: outcome.error };
    }

    source.recordClone(outcome.path, outcome.repository);

    return { success: true, path: outcome.path };
  }
}
