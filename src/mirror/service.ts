import type { MirrorConfig } from '../config/schema.js';
import { BackupSwapCloner, type BackupSwapOptions } from '../git/backup-swap.js';
import { SimpleGitCloneClient } from '../git/clone-client.js';
import { shortBranchName } from '../git/destination.js';
import { GitHubMetadataClient, statusToError } from '../github/metadata-client.js';
import { MetadataError, RateLimitError, TaskFailure, describeCause, toError } from '../errors.js';
import { CloneWorker } from '../orchestrator/worker.js';
import { TaskQueue, type TaskHandle } from '../orchestrator/task-queue.js';
import { fail, ok, type BranchRef, type CloneClient, type CommitDateResolver, type Result, type TaskResult } from '../types.js';
import { logger, repoTag } from '../utils/logger.js';
import { DEFAULT_ACCEPTED_HOST, validateRepoUrl } from '../utils/repo.js';
import { computeConcurrencyCap } from '../utils/resources.js';
import { collectActiveBranches } from './active-branches.js';
import type { RepositorySource } from './repository.js';

export interface BranchLists {
  known: BranchRef[];
  active: BranchRef[];
}

export type BranchListing = ({ success: true } & BranchLists) | { success: false; error: RateLimitError | MetadataError };

export interface MirrorServiceOptions {
  metadata: GitHubMetadataClient;
  cloneClient: CloneClient;
  maxConcurrentTasks?: number;
  /** Cap for per-branch clones; `'auto'` sizes it from CPU and free memory */
  branchConcurrency?: number | 'auto';
  loadFactor?: number;
  cloneDepth?: number;
  acceptedHost?: string;
  /** Retry and filesystem settings for the backup-swap cloner */
  backupSwap?: BackupSwapOptions;
}

export interface MirrorOptions {
  /** Explicit branches to clone beside the default one */
  branches?: string[];
  cutoffDays: number;
  /** Clone every active branch when no explicit list is given */
  mirrorActiveBranches?: boolean;
}

export interface MirrorReport {
  repository: string;
  defaultBranch: string;
  /** Set when branch metadata could not be listed; the default branch is still cloned */
  metadataError?: RateLimitError | MetadataError;
  defaultClone: TaskResult;
  branchClones: Array<{ branch: string; result: TaskResult }>;
}

/**
 * Entry point for mirroring: validation, branch discovery, and cloning through
 * bounded queues. Every collaborator is passed in; nothing here is global.
 */
export class MirrorService {
  readonly metadata: GitHubMetadataClient;
  private worker: CloneWorker;
  private queue: TaskQueue;
  /** Shared by every repository's branch clones; created on first use */
  private branchQueue: TaskQueue | null = null;
  private stopped = false;
  private options: MirrorServiceOptions;

  constructor(options: MirrorServiceOptions) {
    this.options = options;
    this.metadata = options.metadata;
    this.worker = new CloneWorker(new BackupSwapCloner(options.cloneClient, options.backupSwap), {
      depth: options.cloneDepth,
    });
    this.queue = new TaskQueue({
      maxConcurrentTasks: options.maxConcurrentTasks ?? 3,
      runner: this.worker.runner,
      name: 'clone',
    });
  }

  get primaryQueue(): TaskQueue {
    return this.queue;
  }

  validate(url: string): boolean {
    return validateRepoUrl(url, this.options.acceptedHost ?? DEFAULT_ACCEPTED_HOST);
  }

  /**
   * List every branch with its last commit, plus the subset that is active
   * within `cutoffDays`. Rate limiting and other API failures come back as
   * distinct errors.
   */
  async listBranchesAndActivity(
    owner: string,
    name: string,
    cutoffDays: number,
    now: Date = new Date()
  ): Promise<BranchListing> {
    const listed = await this.metadata.fetchBranchesWithCommits(owner, name);
    if (listed.status !== 200) {
      return { success: false, error: statusToError(listed.status, owner, name) };
    }

    const known: BranchRef[] = [...listed.branches].map(([branch, commit]) => ({
      name: branch,
      commitSha: commit.commitSha,
      commitDate: commit.commitDate,
    }));

    // The listing above is itself the fresh read; resolve from it instead of
    // asking the API for each commit a second time.
    const resolve: CommitDateResolver = async (branch) => {
      const commit = listed.branches.get(branch.name);
      if (!commit) {
        return fail(new MetadataError(`No commit metadata for ${branch.name}`, listed.status));
      }
      return ok({ name: branch.name, commitSha: commit.commitSha, commitDate: commit.commitDate });
    };

    const active = await collectActiveBranches(known, cutoffDays, resolve, now);
    return { success: true, known: mergeRefreshed(known, active), active };
  }

  /**
   * Resolve the default branch and rebuild both branch lists from the API.
   * A failed listing leaves both lists empty.
   */
  async refresh(source: RepositorySource, cutoffDays: number, now: Date = new Date()): Promise<BranchListing> {
    source.defaultBranchName = await this.metadata.fetchDefaultBranch(source.owner, source.name);

    const listing = await this.listBranchesAndActivity(source.owner, source.name, cutoffDays, now);
    if (listing.success) {
      source.replaceBranches(listing.known, listing.active);
    } else {
      source.replaceBranches([], []);
      logger.warn(`${repoTag(source.owner, source.name)} Branch listing unavailable`, {
        error: listing.error.message,
      });
    }
    return listing;
  }

  /**
   * Rebuild the branch lists from the local clone's remote-tracking refs,
   * skipping the default branch. Fetches first so dates are current.
   */
  async refreshFromClone(
    source: RepositorySource,
    cutoffDays: number,
    now: Date = new Date()
  ): Promise<Result<BranchLists>> {
    const clone = source.cloneState;
    if (!clone) {
      return fail(new Error(`${source.fullName} has not been cloned yet`));
    }

    const repository = clone.repository;
    try {
      await repository.fetch();
    } catch (err) {
      logger.warn(`${repoTag(source.owner, source.name)} Fetch failed, using refs already on disk`, {
        error: describeCause(err),
      });
    }

    let refs: string[];
    try {
      refs = await repository.listRemoteBranches();
    } catch (err) {
      return fail(toError(err));
    }

    const defaultBranch = source.defaultBranchName;
    const known: BranchRef[] = [];
    for (const ref of refs) {
      if (defaultBranch && shortBranchName(ref) === defaultBranch) continue;
      const commit = await repository.lastCommit(ref).catch((err: unknown) => {
        logger.debug(`${repoTag(source.owner, source.name)} No commit for ${ref}`, { error: describeCause(err) });
        return null;
      });
      known.push({ name: ref, commitSha: commit?.commitSha ?? '', commitDate: commit?.commitDate ?? null });
    }

    const resolve: CommitDateResolver = async (branch) => {
      const commit = await repository.lastCommit(branch.name);
      if (!commit) {
        return fail(new Error(`No commit found for ${branch.name}`));
      }
      return ok({ name: branch.name, commitSha: commit.commitSha, commitDate: commit.commitDate });
    };

    const active = await collectActiveBranches(known, cutoffDays, resolve, now);
    const lists = { known: mergeRefreshed(known, active), active };
    source.replaceBranches(lists.known, lists.active);

    logger.info(`${repoTag(source.owner, source.name)} Branch lists rebuilt from clone`, {
      known: lists.known.length,
      active: lists.active.length,
    });
    return ok(lists);
  }

  submit(source: RepositorySource, destinationRoot: string, branch?: string): TaskHandle {
    return this.queue.submit(source, destinationRoot, branch);
  }

  get isStopped(): boolean {
    return this.stopped;
  }

  /**
   * Refresh metadata, clone the default branch, then clone the requested (or
   * active) branches through the branch queue. One branch queue serves every
   * repository, so its cap bounds branch clones process-wide.
   *
   * Work not yet handed to a queue when `stop()` is called is reported as
   * failed and never started.
   */
  async mirror(source: RepositorySource, destinationRoot: string, options: MirrorOptions): Promise<MirrorReport> {
    const tag = repoTag(source.owner, source.name);
    const listing = await this.refresh(source, options.cutoffDays);

    const defaultClone = this.stopped
      ? unscheduled(source.defaultBranchName)
      : await this.submit(source, destinationRoot).result;
    const report: MirrorReport = {
      repository: source.fullName,
      defaultBranch: source.defaultBranchName,
      ...(listing.success ? {} : { metadataError: listing.error }),
      defaultClone,
      branchClones: [],
    };

    const branches = this.selectBranches(source, options);
    if (branches.length === 0) {
      return report;
    }

    if (this.stopped) {
      logger.warn(`${tag} Service stopped, skipping ${branches.length} branch clone(s)`);
      report.branchClones = branches.map((branch) => ({ branch, result: unscheduled(branch) }));
      return report;
    }

    const queue = this.getBranchQueue();
    logger.info(`${tag} Cloning ${branches.length} branch(es)`, {
      maxConcurrentTasks: queue.maxConcurrentTasks,
    });
    const handles = branches.map((branch) => ({ branch, handle: queue.submit(source, destinationRoot, branch) }));
    for (const { branch, handle } of handles) {
      report.branchClones.push({ branch, result: await handle.result });
    }

    return report;
  }

  /**
   * Stop every queue and wait for running clones to finish. In-flight
   * `mirror()` calls start nothing further.
   */
  async stop(): Promise<void> {
    this.stopped = true;
    await Promise.all([this.queue.stop(), this.branchQueue?.stop()]);
  }

  private getBranchQueue(): TaskQueue {
    if (!this.branchQueue) {
      this.branchQueue = new TaskQueue({
        maxConcurrentTasks: this.branchConcurrency(),
        runner: this.worker.runner,
        name: 'branches',
      });
    }
    return this.branchQueue;
  }

  private selectBranches(source: RepositorySource, options: MirrorOptions): string[] {
    const defaultBranch = source.defaultBranchName;
    const candidates = options.branches?.length
      ? options.branches
      : options.mirrorActiveBranches
        ? source.activeBranches.map((branch) => branch.name)
        : [];

    return [...new Set(candidates)].filter((branch) => shortBranchName(branch) !== defaultBranch);
  }

  private branchConcurrency(): number {
    const configured = this.options.branchConcurrency ?? 'auto';
    return configured === 'auto' ? computeConcurrencyCap({ loadFactor: this.options.loadFactor }) : configured;
  }
}

function unscheduled(branch: string): TaskResult {
  const taskId = `unscheduled-${branch || 'default'}`;
  return {
    status: 'failed',
    taskId,
    error: new TaskFailure(taskId, 'Mirror service stopped before the task started'),
  };
}

/** Replace known entries with their refreshed versions, keeping order. */
function mergeRefreshed(known: BranchRef[], refreshed: BranchRef[]): BranchRef[] {
  const byName = new Map(refreshed.map((branch) => [branch.name, branch]));
  return known.map((branch) => byName.get(branch.name) ?? branch);
}

/**
 * Wire a service from a loaded configuration. `cloneClient` defaults to the
 * simple-git implementation.
 */
export function createMirrorService(
  config: MirrorConfig,
  overrides: Partial<Pick<MirrorServiceOptions, 'metadata' | 'cloneClient' | 'backupSwap'>> = {}
): MirrorService {
  return new MirrorService({
    metadata:
      overrides.metadata ??
      new GitHubMetadataClient({
        apiBaseUrl: config.github.apiBaseUrl,
        token: config.github.token,
        timeoutMs: config.github.timeoutMs,
      }),
    cloneClient: overrides.cloneClient ?? new SimpleGitCloneClient(),
    maxConcurrentTasks: config.maxConcurrentTasks,
    branchConcurrency: config.branchConcurrency,
    loadFactor: config.loadFactor,
    cloneDepth: config.cloneDepth,
    acceptedHost: config.acceptedHost,
    backupSwap: overrides.backupSwap ?? {
      retry: { maxRetries: config.maxRetries, retryDelayMs: config.retryDelayMs },
    },
  });
}
