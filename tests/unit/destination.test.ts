import { describe, it, expect } from 'vitest';
import { join, resolve } from 'path';
import { backupPathFor, resolveDestination, shortBranchName } from '../../src/git/destination.js';

const root = resolve('/srv/mirrors');

describe('resolveDestination', () => {
  it('appends the repository name and default branch', () => {
    expect(resolveDestination(root, { name: 'widgets', defaultBranchName: 'develop' })).toBe(
      join(root, 'widgets', 'develop')
    );
  });

  it('does not repeat a repository folder that is already the root', () => {
    const repoRoot = join(root, 'Widgets');
    expect(resolveDestination(repoRoot, { name: 'widgets', defaultBranchName: 'main' })).toBe(join(repoRoot, 'main'));
  });

  it('falls back to main when the default branch is unknown', () => {
    expect(resolveDestination(root, { name: 'widgets', defaultBranchName: '' })).toBe(join(root, 'widgets', 'main'));
  });

  it('uses a sanitized branch name for branch clones', () => {
    expect(resolveDestination(root, { name: 'widgets', defaultBranchName: 'main' }, 'origin/feature/login')).toBe(
      join(root, 'widgets', 'feature-login')
    );
  });
});

describe('shortBranchName', () => {
  it('strips the remote prefix only', () => {
    expect(shortBranchName('origin/dev')).toBe('dev');
    expect(shortBranchName('dev')).toBe('dev');
    expect(shortBranchName('upstream/dev')).toBe('upstream/dev');
  });
});

describe('backupPathFor', () => {
  it('returns a sibling with the backup prefix', () => {
    expect(backupPathFor(join(root, 'widgets', 'main'))).toBe(join(root, 'widgets', 'backup-main'));
  });
});
