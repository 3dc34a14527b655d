import { basename, dirname, join, resolve } from 'path';

export const DEFAULT_BRANCH_FALLBACK = 'main';
export const BACKUP_PREFIX = 'backup-';

/** Replace path separators so a branch name stays one directory level. */
export function sanitizeBranchSegment(branch: string): string {
  return branch.replace(/[/\\]/g, '-');
}

/** `origin/feature-x` -> `feature-x`; names without the prefix pass through. */
export function shortBranchName(ref: string, remote: string = 'origin'): string {
  const prefix = `${remote}/`;
  return ref.startsWith(prefix) ? ref.slice(prefix.length) : ref;
}

/**
 * Compute `<root>/<name>/<branch-or-default>`.
 *
 * `root` may be either a shared parent folder or the repository's own folder;
 * `name` is appended only when it is not already the last segment.
 */
export function resolveDestination(
  root: string,
  repo: { name: string; defaultBranchName: string },
  branch?: string
): string {
  let base = resolve(root);
  if (basename(base).toLowerCase() !== repo.name.toLowerCase()) {
    base = join(base, repo.name);
  }

  const segment = branch
    ? sanitizeBranchSegment(shortBranchName(branch))
    : sanitizeBranchSegment(repo.defaultBranchName || DEFAULT_BRANCH_FALLBACK);

  return join(base, segment);
}

/** Sibling path that holds the previous copy while a re-clone runs. */
export function backupPathFor(destinationPath: string): string {
  const absolute = resolve(destinationPath);
  return join(dirname(absolute), `${BACKUP_PREFIX}${basename(absolute)}`);
}
