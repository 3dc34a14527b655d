export * from './errors.js';
export * from './types.js';

export { ConfigLoader, CONFIG_FILE_NAME } from './config/loader.js';
export { MirrorConfigSchema, RepositoryEntrySchema, type MirrorConfig, type RepositoryEntry } from './config/schema.js';

export { BackupSwapCloner, type CloneOutcome, type CloneSource, type BackupSwapOptions } from './git/backup-swap.js';
export { SimpleGitCloneClient, SimpleGitLocalRepository } from './git/clone-client.js';
export { backupPathFor, resolveDestination, sanitizeBranchSegment, shortBranchName } from './git/destination.js';
export { nodeFileSystem, removeDirectory, moveDirectory, type FileSystemOps } from './git/fs-ops.js';
export { withRetry, type RetryOptions, type RetryOutcome } from './git/retry.js';

export { GitHubMetadataClient, statusToError, type BranchesWithCommits } from './github/metadata-client.js';

export { checkActivity, collectActiveBranches, daysSinceLastCommit, isActive } from './mirror/active-branches.js';
export { RepositorySource } from './mirror/repository.js';
export {
  MirrorService,
  createMirrorService,
  type BranchListing,
  type MirrorOptions,
  type MirrorReport,
  type MirrorServiceOptions,
} from './mirror/service.js';

export { TaskQueue, type CloneTask, type TaskHandle, type TaskRunner, type TaskRunResult } from './orchestrator/task-queue.js';
export { CloneWorker } from './orchestrator/worker.js';

export { logger, configureLogDirectory, setLogLevel } from './utils/logger.js';
export { computeConcurrencyCap, getHostResources } from './utils/resources.js';
export { parseRepoUrl, resolveRepoUrl, validateRepoUrl } from './utils/repo.js';
