import { chmod, cp, lstat, mkdir, readdir, rename, rm, stat } from 'fs/promises';
import { dirname, join } from 'path';
import { FilesystemError } from '../errors.js';
import { fail, ok, type Result } from '../types.js';
import { logger } from '../utils/logger.js';

/**
 * The subset of fs/promises the clone protocol touches. Injected so tests can
 * simulate permission and cross-device failures.
 */
export interface FileSystemOps {
  rm(path: string, options: { recursive: boolean; force: boolean }): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  cp(from: string, to: string, options: { recursive: boolean }): Promise<void>;
  chmod(path: string, mode: number): Promise<void>;
  stat(path: string): Promise<{ mode: number; isDirectory(): boolean }>;
  lstat(path: string): Promise<{ size: number; isDirectory(): boolean; isFile(): boolean }>;
  readdir(path: string): Promise<string[]>;
  mkdir(path: string, options: { recursive: boolean }): Promise<unknown>;
}

export const nodeFileSystem: FileSystemOps = {
  rm: (path, options) => rm(path, options),
  rename: (from, to) => rename(from, to),
  cp: (from, to, options) => cp(from, to, options),
  chmod: (path, mode) => chmod(path, mode),
  stat: (path) => stat(path),
  lstat: (path) => lstat(path),
  readdir: (path) => readdir(path),
  mkdir: (path, options) => mkdir(path, options),
};

const OWNER_WRITE = 0o200;
const OWNER_WRITE_EXEC = 0o300;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function errorPath(err: unknown): string | undefined {
  if (err instanceof Error && 'path' in err && typeof err.path === 'string') {
    return err.path;
  }
  return undefined;
}

export function isPermissionError(err: unknown): boolean {
  const code = errorCode(err);
  return code === 'EACCES' || code === 'EPERM';
}

export async function pathExists(path: string, fsOps: FileSystemOps = nodeFileSystem): Promise<boolean> {
  try {
    await fsOps.stat(path);
    return true;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') {
      return false;
    }
    throw err;
  }
}

/** `pathExists` with any error other than ENOENT returned as a `FilesystemError`. */
export async function checkExists(
  path: string,
  fsOps: FileSystemOps = nodeFileSystem
): Promise<Result<boolean, FilesystemError>> {
  try {
    return ok(await pathExists(path, fsOps));
  } catch (err) {
    return fail(new FilesystemError('stat', path, { cause: err }));
  }
}

/**
 * Add the owner write bit to `path` and write/search to its parent; unlinking
 * an entry needs write access on the directory that holds it.
 */
async function clearWriteProtection(path: string, fsOps: FileSystemOps): Promise<void> {
  const target = await fsOps.stat(path);
  await fsOps.chmod(path, target.mode | (target.isDirectory() ? OWNER_WRITE_EXEC : OWNER_WRITE));

  const parent = dirname(path);
  if (parent !== path) {
    const parentStat = await fsOps.stat(parent);
    await fsOps.chmod(parent, parentStat.mode | OWNER_WRITE_EXEC);
  }
}

/**
 * Delete a directory tree. Version-control clients leave read-only object
 * files behind, so a permission error clears write protection on the
 * offending path and retries exactly once.
 */
export async function removeDirectory(
  target: string,
  fsOps: FileSystemOps = nodeFileSystem
): Promise<Result<void, FilesystemError>> {
  try {
    await fsOps.rm(target, { recursive: true, force: true });
    return ok(undefined);
  } catch (err) {
    if (!isPermissionError(err)) {
      return fail(new FilesystemError('remove', target, { cause: err }));
    }

    const offending = errorPath(err) ?? target;
    logger.warn('Permission denied while deleting; clearing write protection and retrying once', {
      target,
      offending,
    });

    try {
      await clearWriteProtection(offending, fsOps);
      await fsOps.rm(target, { recursive: true, force: true });
      return ok(undefined);
    } catch (retryErr) {
      return fail(new FilesystemError('remove', target, { cause: retryErr }));
    }
  }
}

export interface TreeSummary {
  files: number;
  bytes: number;
}

export async function summarizeTree(root: string, fsOps: FileSystemOps = nodeFileSystem): Promise<TreeSummary> {
  const summary: TreeSummary = { files: 0, bytes: 0 };
  const pending = [root];

  while (pending.length > 0) {
    const dir = pending.pop();
    if (dir === undefined) break;

    for (const entry of await fsOps.readdir(dir)) {
      const fullPath = join(dir, entry);
      const info = await fsOps.lstat(fullPath);
      if (info.isDirectory()) {
        pending.push(fullPath);
      } else {
        summary.files++;
        summary.bytes += info.size;
      }
    }
  }

  return summary;
}

/**
 * Move a directory. Uses rename; across devices it copies, verifies the copy
 * matches the source, and only then deletes the source.
 */
export async function moveDirectory(
  from: string,
  to: string,
  fsOps: FileSystemOps = nodeFileSystem
): Promise<Result<void, FilesystemError>> {
  try {
    await fsOps.rename(from, to);
    return ok(undefined);
  } catch (err) {
    if (errorCode(err) !== 'EXDEV') {
      return fail(new FilesystemError('move', from, { cause: err }));
    }
  }

  logger.debug('Rename crossed devices, falling back to copy', { from, to });

  try {
    await fsOps.cp(from, to, { recursive: true });
  } catch (err) {
    await removeDirectory(to, fsOps);
    return fail(new FilesystemError('copy', from, { cause: err }));
  }

  try {
    const [source, copy] = await Promise.all([summarizeTree(from, fsOps), summarizeTree(to, fsOps)]);
    if (source.files !== copy.files || source.bytes !== copy.bytes) {
      await removeDirectory(to, fsOps);
      return fail(
        new FilesystemError('verify', to, {
          cause: new Error(
            `copy incomplete: ${copy.files}/${source.files} files, ${copy.bytes}/${source.bytes} bytes`
          ),
        })
      );
    }
  } catch (err) {
    await removeDirectory(to, fsOps);
    return fail(new FilesystemError('verify', to, { cause: err }));
  }

  return removeDirectory(from, fsOps);
}

export async function ensureDirectory(
  path: string,
  fsOps: FileSystemOps = nodeFileSystem
): Promise<Result<void, FilesystemError>> {
  try {
    await fsOps.mkdir(path, { recursive: true });
    return ok(undefined);
  } catch (err) {
    return fail(new FilesystemError('mkdir', path, { cause: err }));
  }
}
