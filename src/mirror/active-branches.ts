import type { BranchRef, CommitDateResolver } from '../types.js';
import { describeCause } from '../errors.js';
import { logger } from '../utils/logger.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

export function daysSinceLastCommit(commitDate: Date, now: Date = new Date()): number {
  return Math.floor((now.getTime() - commitDate.getTime()) / MS_PER_DAY);
}

export interface ActivityCheck {
  active: boolean;
  /** The branch with its refreshed commit metadata, when resolution succeeded */
  branch: BranchRef;
}

/**
 * Decide whether a branch had a commit within the last `cutoffDays` days.
 *
 * `cutoffDays <= 0` disables filtering. Otherwise the commit date is always
 * refreshed through `resolve` first; any resolution failure counts as inactive.
 */
export async function checkActivity(
  branch: BranchRef,
  cutoffDays: number,
  resolve: CommitDateResolver,
  now: Date = new Date()
): Promise<ActivityCheck> {
  if (cutoffDays <= 0) {
    return { active: true, branch };
  }

  let refreshed: BranchRef;
  try {
    const resolved = await resolve(branch);
    if (!resolved.success) {
      logger.debug('Treating branch as inactive: commit could not be resolved', {
        branch: branch.name,
        error: resolved.error.message,
      });
      return { active: false, branch };
    }
    refreshed = resolved.value;
  } catch (err) {
    logger.debug('Treating branch as inactive: commit resolver threw', {
      branch: branch.name,
      error: describeCause(err),
    });
    return { active: false, branch };
  }

  if (!refreshed.commitDate) {
    return { active: false, branch: refreshed };
  }

  const cutoff = new Date(now.getTime() - cutoffDays * MS_PER_DAY);
  return { active: refreshed.commitDate.getTime() >= cutoff.getTime(), branch: refreshed };
}

export async function isActive(
  branch: BranchRef,
  cutoffDays: number,
  resolve: CommitDateResolver,
  now: Date = new Date()
): Promise<boolean> {
  return (await checkActivity(branch, cutoffDays, resolve, now)).active;
}

/**
 * Rebuild the active list from scratch, preserving the order of `known`.
 */
export async function collectActiveBranches(
  known: readonly BranchRef[],
  cutoffDays: number,
  resolve: CommitDateResolver,
  now: Date = new Date()
): Promise<BranchRef[]> {
  const active: BranchRef[] = [];

  for (const branch of known) {
    const check = await checkActivity(branch, cutoffDays, resolve, now);
    if (check.active) {
      active.push(check.branch);
    }
  }

  logger.debug('Collected active branches', {
    known: known.length,
    active: active.length,
    cutoffDays,
  });

  return active;
}
