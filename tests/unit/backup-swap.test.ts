import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CloneTransientFailure, FilesystemError, RollbackError } from '../../src/errors.js';
import { BackupSwapCloner } from '../../src/git/backup-swap.js';
import { nodeFileSystem, pathExists, type FileSystemOps } from '../../src/git/fs-ops.js';
import { closeIncidentLog, initIncidentLog } from '../../src/utils/incident-log.js';
import { FakeCloneClient, noSleep } from '../helpers/fakes.js';

const source = { url: 'https://github.com/acme/widgets', owner: 'acme', name: 'widgets' };

describe('BackupSwapCloner', () => {
  let root = '';
  let repoDir = '';
  let destination = '';

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'backup-swap-'));
    repoDir = join(root, 'widgets');
    destination = join(repoDir, 'main');
  });

  afterEach(async () => {
    closeIncidentLog();
    await rm(root, { recursive: true, force: true });
  });

  async function seedPreviousCopy(): Promise<void> {
    await mkdir(join(destination, 'src'), { recursive: true });
    await writeFile(join(destination, 'old.txt'), 'previous copy');
    await writeFile(join(destination, 'src', 'index.ts'), 'export {};\n');
  }

  function cloner(client: FakeCloneClient, fs?: FileSystemOps): BackupSwapCloner {
    return new BackupSwapCloner(client, { retry: { sleep: noSleep }, ...(fs ? { fs } : {}) });
  }

  it('clones into a fresh destination', async () => {
    const client = new FakeCloneClient();
    const outcome = await cloner(client).cloneInto(source, destination);

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.path).toBe(destination);
      expect(outcome.attempts).toBe(1);
      expect(outcome.staleBackupPath).toBeUndefined();
      expect(outcome.repository.path).toBe(destination);
    }
    expect(await readFile(join(destination, 'README.md'), 'utf-8')).toBe('cloned default');
    expect(await readdir(repoDir)).toEqual(['main']);
  });

  it('replaces an existing copy and leaves no backup behind', async () => {
    await seedPreviousCopy();

    const outcome = await cloner(new FakeCloneClient()).cloneInto(source, destination, { branch: 'main' });

    expect(outcome.success).toBe(true);
    expect(await pathExists(join(destination, 'old.txt'))).toBe(false);
    expect(await readFile(join(destination, 'README.md'), 'utf-8')).toBe('cloned main');
    expect(await readdir(repoDir)).toEqual(['main']);
  });

  it('deletes a backup left over from an earlier run', async () => {
    await seedPreviousCopy();
    await mkdir(join(repoDir, 'backup-main'));
    await writeFile(join(repoDir, 'backup-main', 'stale.txt'), 'older generation');

    const outcome = await cloner(new FakeCloneClient()).cloneInto(source, destination);

    expect(outcome.success).toBe(true);
    expect(await readdir(repoDir)).toEqual(['main']);
  });

  it('succeeds when a retry succeeds and discards the partial clone', async () => {
    const client = new FakeCloneClient(['fail', 'fail']);
    const outcome = await cloner(client).cloneInto(source, destination);

    expect(outcome.success).toBe(true);
    expect(outcome.attempts).toBe(3);
    expect(client.calls).toHaveLength(3);
    expect(await pathExists(join(destination, 'partial.txt'))).toBe(false);
  });

  it('restores the previous copy byte for byte when every attempt fails', async () => {
    await seedPreviousCopy();
    const client = new FakeCloneClient(['fail', 'fail', 'fail']);

    const outcome = await cloner(client).cloneInto(source, destination);

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(CloneTransientFailure);
      expect(outcome.attempts).toBe(3);
      expect(outcome.restored).toBe(true);
    }
    expect(client.calls).toHaveLength(3);
    expect(await readFile(join(destination, 'old.txt'), 'utf-8')).toBe('previous copy');
    expect(await readFile(join(destination, 'src', 'index.ts'), 'utf-8')).toBe('export {};\n');
    expect(await pathExists(join(destination, 'partial.txt'))).toBe(false);
    expect(await readdir(repoDir)).toEqual(['main']);
  });

  it('leaves nothing behind when a first clone fails', async () => {
    const outcome = await cloner(new FakeCloneClient(['fail', 'fail', 'fail'])).cloneInto(source, destination);

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.restored).toBe(true);
    }
    expect(await pathExists(destination)).toBe(false);
  });

  it('keeps both copies and reports a rollback error when the restore fails', async () => {
    await seedPreviousCopy();
    initIncidentLog(join(root, 'logs'));
    const backupPath = join(repoDir, 'backup-main');
    const fs: FileSystemOps = {
      ...nodeFileSystem,
      rename: async (from, to) => {
        if (from === backupPath) {
          throw Object.assign(new Error('EIO: i/o error'), { code: 'EIO' });
        }
        await nodeFileSystem.rename(from, to);
      },
    };

    const outcome = await cloner(new FakeCloneClient(['fail', 'fail', 'fail']), fs).cloneInto(source, destination);

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(RollbackError);
      expect(outcome.restored).toBe(false);
      if (outcome.error instanceof RollbackError) {
        expect(outcome.error.backupPath).toBe(backupPath);
        expect(outcome.error.cloneError).toBeInstanceOf(CloneTransientFailure);
      }
    }
    expect(await readFile(join(backupPath, 'old.txt'), 'utf-8')).toBe('previous copy');
    expect(await readFile(join(root, 'logs', 'recovery.log'), 'utf-8')).toContain('ROLLBACK FAILED');
  });

  it('reports the stale backup when it cannot be deleted after a successful clone', async () => {
    await seedPreviousCopy();
    const backupPath = join(repoDir, 'backup-main');
    const fs: FileSystemOps = {
      ...nodeFileSystem,
      rm: async (path, options) => {
        if (path === backupPath) {
          throw Object.assign(new Error('EIO: i/o error'), { code: 'EIO' });
        }
        await nodeFileSystem.rm(path, options);
      },
    };

    const outcome = await cloner(new FakeCloneClient(), fs).cloneInto(source, destination);

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.staleBackupPath).toBe(backupPath);
      expect(outcome.attempts).toBe(1);
    }
    expect(await readFile(join(destination, 'README.md'), 'utf-8')).toBe('cloned default');
    expect(await readFile(join(backupPath, 'old.txt'), 'utf-8')).toBe('previous copy');
    expect((await readdir(repoDir)).sort()).toEqual(['backup-main', 'main']);
  });

  it('returns a filesystem error when the destination cannot be inspected', async () => {
    await seedPreviousCopy();
    const client = new FakeCloneClient();
    const fs: FileSystemOps = {
      ...nodeFileSystem,
      stat: async (path) => {
        if (path === destination) {
          throw Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
        }
        return nodeFileSystem.stat(path);
      },
    };

    const outcome = await cloner(client, fs).cloneInto(source, destination);

    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.error).toBeInstanceOf(FilesystemError);
      if (outcome.error instanceof FilesystemError) {
        expect(outcome.error.operation).toBe('stat');
        expect(outcome.error.path).toBe(destination);
      }
      expect(outcome.attempts).toBe(0);
      expect(outcome.restored).toBe(true);
    }
    expect(client.calls).toEqual([]);
    expect(await readFile(join(destination, 'old.txt'), 'utf-8')).toBe('previous copy');
  });
});
