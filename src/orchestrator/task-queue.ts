import { EventEmitter, once } from 'events';
import { TaskFailure, toError } from '../errors.js';
import type { RepositorySource } from '../mirror/repository.js';
import type { QueueStats, TaskResult, TaskStatus } from '../types.js';
import { logger } from '../utils/logger.js';

export interface CloneTask {
  id: string;
  source: RepositorySource;
  destinationRoot: string;
  branch?: string;
  createdAt: number;
}

export type TaskRunResult = { success: true; path: string } | { success: false; error: Error };

/** Executes one task. Rejections are caught and treated as failures. */
export type TaskRunner = (task: CloneTask) => Promise<TaskRunResult>;

export interface TaskHandle {
  readonly id: string;
  readonly status: TaskStatus;
  /** Settles once with the task's terminal state; never rejects */
  readonly result: Promise<TaskResult>;
}

interface QueuedTask {
  task: CloneTask;
  status: TaskStatus;
  resolve: (result: TaskResult) => void;
}

export interface TaskQueueOptions {
  maxConcurrentTasks: number;
  runner: TaskRunner;
  /** Used in log lines and task ids */
  name?: string;
}

/**
 * Bounded clone scheduler.
 *
 * Tasks start in FIFO order; at most `maxConcurrentTasks` run at once. The
 * head task is only dequeued after the running count was incremented, so a
 * saturated queue leaves it in place. Dispatch is woken by submissions and by
 * completions instead of polling.
 *
 * Per-task state: pending -> running -> succeeded | failed. Failed is terminal;
 * retries happen inside the runner.
 */
export class TaskQueue extends EventEmitter {
  readonly name: string;
  readonly maxConcurrentTasks: number;

  private pending: QueuedTask[] = [];
  private runningCount = 0;
  private inFlight = new Set<Promise<void>>();
  private runner: TaskRunner;
  private taskId = 0;
  private dispatching = false;
  private stopped = false;
  private stats = {
    peakRunning: 0,
    totalSucceeded: 0,
    totalFailed: 0,
  };

  constructor(options: TaskQueueOptions) {
    super();
    if (!Number.isInteger(options.maxConcurrentTasks) || options.maxConcurrentTasks < 1) {
      throw new RangeError(`maxConcurrentTasks must be a positive integer, got ${options.maxConcurrentTasks}`);
    }
    this.maxConcurrentTasks = options.maxConcurrentTasks;
    this.runner = options.runner;
    this.name = options.name ?? 'clone';
  }

  /**
   * Queue a clone of `source` (optionally one branch) under `destinationRoot`.
   */
  submit(source: RepositorySource, destinationRoot: string, branch?: string): TaskHandle {
    if (this.stopped) {
      throw new Error(`Task queue "${this.name}" is stopped`);
    }

    const task: CloneTask = {
      id: `${this.name}-${++this.taskId}`,
      source,
      destinationRoot,
      ...(branch ? { branch } : {}),
      createdAt: Date.now(),
    };

    let resolveResult: (result: TaskResult) => void = () => undefined;
    const result = new Promise<TaskResult>((resolve) => {
      resolveResult = resolve;
    });
    const queued: QueuedTask = { task, status: 'pending', resolve: resolveResult };
    this.pending.push(queued);

    logger.debug('Clone task queued', {
      id: task.id,
      repository: source.fullName,
      branch,
      queueLength: this.pending.length,
    });
    this.emit('task:queued', { taskId: task.id });

    this.dispatch();

    return {
      id: task.id,
      get status() {
        return queued.status;
      },
      result,
    };
  }

  /** Increment the running count if it is below the cap. */
  private tryIncrementRunning(): boolean {
    if (this.runningCount >= this.maxConcurrentTasks) {
      return false;
    }
    this.runningCount++;
    if (this.runningCount > this.stats.peakRunning) {
      this.stats.peakRunning = this.runningCount;
    }
    return true;
  }

  private decrementRunning(): void {
    if (this.runningCount > 0) {
      this.runningCount--;
    }
  }

  private dispatch(): void {
    if (this.dispatching) {
      return;
    }
    this.dispatching = true;

    try {
      while (!this.stopped && this.pending.length > 0) {
        const head = this.pending[0];
        if (!this.tryIncrementRunning()) {
          logger.debug(`Max concurrent tasks reached (${this.maxConcurrentTasks})`, {
            queue: this.name,
            pending: this.pending.length,
          });
          break;
        }

        this.pending.shift();
        const run = this.runTask(head).finally(() => {
          this.inFlight.delete(run);
        });
        this.inFlight.add(run);
      }
    } finally {
      this.dispatching = false;
    }
  }

  private async runTask(queued: QueuedTask): Promise<void> {
    const { task } = queued;
    queued.status = 'running';
    logger.info(`Started clone task ${task.id}`, {
      repository: task.source.fullName,
      branch: task.branch,
      running: this.runningCount,
      waitMs: Date.now() - task.createdAt,
    });
    this.emit('task:started', { taskId: task.id });

    let result: TaskResult;
    try {
      const outcome = await this.runner(task);
      result = outcome.success
        ? { status: 'succeeded', taskId: task.id, path: outcome.path }
        : { status: 'failed', taskId: task.id, error: this.toTaskFailure(task.id, outcome.error) };
    } catch (err) {
      result = { status: 'failed', taskId: task.id, error: this.toTaskFailure(task.id, toError(err)) };
    } finally {
      this.decrementRunning();
    }

    queued.status = result.status;
    if (result.status === 'succeeded') {
      this.stats.totalSucceeded++;
      logger.info(`Clone task ${task.id} succeeded`, { path: result.path, running: this.runningCount });
      this.emit('task:succeeded', result);
    } else {
      this.stats.totalFailed++;
      logger.error(`Clone task ${task.id} failed`, { error: result.error.message, running: this.runningCount });
      this.emit('task:failed', result);
    }
    queued.resolve(result);

    this.dispatch();
    this.emitIfIdle();
  }

  private toTaskFailure(taskId: string, error: Error): TaskFailure {
    return error instanceof TaskFailure ? error : new TaskFailure(taskId, error.message, { cause: error });
  }

  private isIdle(): boolean {
    return this.pending.length === 0 && this.runningCount === 0;
  }

  private emitIfIdle(): void {
    if (this.isIdle()) {
      this.emit('idle');
    }
  }

  /** Resolves once nothing is pending or running. */
  async onIdle(): Promise<void> {
    if (this.isIdle()) {
      return;
    }
    await once(this, 'idle');
  }

  /**
   * Stop dispatching: refuse new submissions, fail every task that has not
   * started, and wait for running tasks to finish. Running clones are not
   * interrupted.
   */
  async stop(): Promise<void> {
    if (!this.stopped) {
      this.stopped = true;
      const dropped = this.pending.splice(0);

      for (const queued of dropped) {
        queued.status = 'failed';
        this.stats.totalFailed++;
        const result: TaskResult = {
          status: 'failed',
          taskId: queued.task.id,
          error: new TaskFailure(queued.task.id, 'Task queue stopped before the task started'),
        };
        this.emit('task:failed', result);
        queued.resolve(result);
      }

      logger.info(`Task queue "${this.name}" stopping`, { dropped: dropped.length, running: this.runningCount });
    }

    await Promise.allSettled([...this.inFlight]);
    this.emitIfIdle();
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  get running(): number {
    return this.runningCount;
  }

  get length(): number {
    return this.pending.length;
  }

  getStats(): QueueStats {
    return {
      pending: this.pending.length,
      running: this.runningCount,
      peakRunning: this.stats.peakRunning,
      maxConcurrentTasks: this.maxConcurrentTasks,
      totalSucceeded: this.stats.totalSucceeded,
      totalFailed: this.stats.totalFailed,
      stopped: this.stopped,
    };
  }
}
