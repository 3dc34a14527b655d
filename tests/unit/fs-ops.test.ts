import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FilesystemError } from '../../src/errors.js';
import { moveDirectory, pathExists, removeDirectory, type FileSystemOps } from '../../src/git/fs-ops.js';

function fsError(code: string, path?: string): Error {
  return Object.assign(new Error(`${code}: simulated`), { code, ...(path ? { path } : {}) });
}

function fakeFs(overrides: Partial<FileSystemOps> = {}): FileSystemOps {
  return {
    rm: vi.fn(async () => undefined),
    rename: vi.fn(async () => undefined),
    cp: vi.fn(async () => undefined),
    chmod: vi.fn(async () => undefined),
    stat: vi.fn(async () => ({ mode: 0o755, isDirectory: () => true })),
    lstat: vi.fn(async () => ({ size: 10, isDirectory: () => false, isFile: () => true })),
    readdir: vi.fn(async () => []),
    mkdir: vi.fn(async () => undefined),
    ...overrides,
  };
}

describe('removeDirectory', () => {
  const objectFile = '/m/widgets/main/.git/objects/ab/cd';

  it('clears write protection and retries once on EACCES', async () => {
    const rm = vi
      .fn<[string, { recursive: boolean; force: boolean }], Promise<void>>()
      .mockRejectedValueOnce(fsError('EACCES', objectFile))
      .mockResolvedValue(undefined);
    const chmod = vi.fn(async () => undefined);
    const stat = vi.fn(async (path: string) =>
      path === objectFile
        ? { mode: 0o444, isDirectory: () => false }
        : { mode: 0o555, isDirectory: () => true }
    );

    const result = await removeDirectory('/m/widgets/main', fakeFs({ rm, chmod, stat }));

    expect(result.success).toBe(true);
    expect(rm).toHaveBeenCalledTimes(2);
    expect(chmod.mock.calls).toEqual([
      [objectFile, 0o644],
      ['/m/widgets/main/.git/objects/ab', 0o755],
    ]);
  });

  it('gives up after the single retry', async () => {
    const rm = vi.fn(async () => {
      throw fsError('EACCES', objectFile);
    });
    const stat = vi.fn(async () => ({ mode: 0o444, isDirectory: () => false }));

    const result = await removeDirectory('/m/widgets/main', fakeFs({ rm, stat }));

    expect(result.success).toBe(false);
    expect(rm).toHaveBeenCalledTimes(2);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(FilesystemError);
      expect(result.error.operation).toBe('remove');
      expect(result.error.path).toBe('/m/widgets/main');
    }
  });

  it('does not retry other errors', async () => {
    const rm = vi.fn(async () => {
      throw fsError('EBUSY');
    });
    const chmod = vi.fn(async () => undefined);

    const result = await removeDirectory('/m/widgets/main', fakeFs({ rm, chmod }));

    expect(result.success).toBe(false);
    expect(rm).toHaveBeenCalledTimes(1);
    expect(chmod).not.toHaveBeenCalled();
  });

  describe('on disk', () => {
    let dir = '';

    afterEach(async () => {
      if (dir) await rm(dir, { recursive: true, force: true });
    });

    it('deletes a nested tree', async () => {
      dir = await mkdtemp(join(tmpdir(), 'fs-ops-'));
      const target = join(dir, 'clone');
      await mkdir(join(target, '.git', 'objects'), { recursive: true });
      await writeFile(join(target, '.git', 'objects', 'pack'), 'data');

      const result = await removeDirectory(target);

      expect(result.success).toBe(true);
      expect(await pathExists(target)).toBe(false);
    });
  });
});

describe('moveDirectory', () => {
  it('renames when possible', async () => {
    const fsOps = fakeFs();
    const result = await moveDirectory('/a/src', '/a/dst', fsOps);

    expect(result.success).toBe(true);
    expect(fsOps.rename).toHaveBeenCalledWith('/a/src', '/a/dst');
    expect(fsOps.cp).not.toHaveBeenCalled();
  });

  it('copies, verifies and deletes the source across devices', async () => {
    const rename = vi.fn(async () => {
      throw fsError('EXDEV');
    });
    const readdir = vi.fn(async () => ['HEAD']);
    const fsOps = fakeFs({ rename, readdir });

    const result = await moveDirectory('/a/src', '/b/dst', fsOps);

    expect(result.success).toBe(true);
    expect(fsOps.cp).toHaveBeenCalledWith('/a/src', '/b/dst', { recursive: true });
    expect(fsOps.rm).toHaveBeenCalledTimes(1);
    expect(fsOps.rm).toHaveBeenCalledWith('/a/src', { recursive: true, force: true });
  });

  it('keeps the source when the copy does not match', async () => {
    const rename = vi.fn(async () => {
      throw fsError('EXDEV');
    });
    const readdir = vi.fn(async (path: string) => (path === '/a/src' ? ['HEAD', 'config'] : ['HEAD']));
    const fsOps = fakeFs({ rename, readdir });

    const result = await moveDirectory('/a/src', '/b/dst', fsOps);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.operation).toBe('verify');
    }
    expect(fsOps.rm).toHaveBeenCalledTimes(1);
    expect(fsOps.rm).toHaveBeenCalledWith('/b/dst', { recursive: true, force: true });
  });

  it('reports other rename failures as move errors', async () => {
    const rename = vi.fn(async () => {
      throw fsError('ENOTEMPTY');
    });

    const result = await moveDirectory('/a/src', '/a/dst', fakeFs({ rename }));

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.operation).toBe('move');
      expect(result.error.path).toBe('/a/src');
    }
  });
});
