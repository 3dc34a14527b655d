/**
 * Mirror Types
 *
 * Shared shapes passed between the URL resolver, metadata client,
 * clone protocol and scheduler.
 */

import type { TaskFailure } from './errors.js';

// ─────────────────────────────────────────────────────────────
// Results
// ─────────────────────────────────────────────────────────────

export type Result<T, E extends Error = Error> =
  | { success: true; value: T }
  | { success: false; error: E };

export function ok<T>(value: T): { success: true; value: T } {
  return { success: true, value };
}

export function fail<E extends Error>(error: E): { success: false; error: E } {
  return { success: false, error };
}

// ─────────────────────────────────────────────────────────────
// Repository identity & branches
// ─────────────────────────────────────────────────────────────

export interface RepoIdentity {
  url: string;
  host: string;
  owner: string;
  name: string;
  /** False when the host is not the accepted hosting domain */
  hostAccepted: boolean;
}

export interface BranchCommit {
  commitSha: string;
  commitUrl: string;
  commitDate: Date;
}

export interface BranchRef {
  /** Raw ref as reported by the source, e.g. `origin/feature-x` or `feature-x` */
  name: string;
  commitSha: string;
  commitDate: Date | null;
}

/** Resolves (and refreshes) the last-commit date of a branch. */
export type CommitDateResolver = (branch: BranchRef) => Promise<Result<BranchRef>>;

// ─────────────────────────────────────────────────────────────
// Local clones
// ─────────────────────────────────────────────────────────────

/**
 * Opaque handle to a repository on disk, returned by the clone client.
 * The mirroring engine never depends on the client library's own types.
 */
export interface LocalRepository {
  readonly path: string;
  /** Remote-tracking refs, excluding the symbolic `origin/HEAD` */
  listRemoteBranches(): Promise<string[]>;
  lastCommit(ref: string): Promise<BranchCommit | null>;
  fetch(): Promise<void>;
}

export interface CloneRequestOptions {
  branch?: string;
  depth?: number;
}

export interface CloneClient {
  clone(url: string, destinationPath: string, options?: CloneRequestOptions): Promise<LocalRepository>;
}

export interface CloneState {
  clonedToPath: string;
  repository: LocalRepository;
}

// ─────────────────────────────────────────────────────────────
// Scheduling
// ─────────────────────────────────────────────────────────────

export type TaskStatus = 'pending' | 'running' | 'succeeded' | 'failed';

export type TaskResult =
  | { status: 'succeeded'; taskId: string; path: string }
  | { status: 'failed'; taskId: string; error: TaskFailure };

export interface QueueStats {
  pending: number;
  running: number;
  peakRunning: number;
  maxConcurrentTasks: number;
  totalSucceeded: number;
  totalFailed: number;
  stopped: boolean;
}
