import { simpleGit, type SimpleGit, type SimpleGitOptions } from 'simple-git';
import type { BranchCommit, CloneClient, CloneRequestOptions, LocalRepository } from '../types.js';
import { logger } from '../utils/logger.js';

export interface SimpleGitCloneClientOptions {
  /** Kill git if it produces no output for this long */
  blockTimeoutMs?: number;
  env?: Record<string, string>;
}

function gitOptions(baseDir: string | undefined, options: SimpleGitCloneClientOptions): Partial<SimpleGitOptions> {
  return {
    ...(baseDir ? { baseDir } : {}),
    ...(options.blockTimeoutMs ? { timeout: { block: options.blockTimeoutMs } } : {}),
  };
}

/**
 * A clone on disk, wrapped rather than extended so the engine does not depend
 * on simple-git's types.
 */
export class SimpleGitLocalRepository implements LocalRepository {
  private git: SimpleGit;

  constructor(
    readonly path: string,
    options: SimpleGitCloneClientOptions = {}
  ) {
    this.git = simpleGit(gitOptions(path, options));
    if (options.env) {
      this.git.env({ ...process.env, ...options.env });
    }
  }

  async listRemoteBranches(): Promise<string[]> {
    const output = await this.git.raw(['for-each-ref', '--format=%(refname:short)', 'refs/remotes']);
    return output
      .split('\n')
      .map((line) => line.trim())
      // Newer git shortens refs/remotes/origin/HEAD to plain "origin"
      .filter((ref) => ref.includes('/') && !ref.endsWith('/HEAD'));
  }

  async lastCommit(ref: string): Promise<BranchCommit | null> {
    try {
      const output = await this.git.raw(['log', '-1', '--format=%H%n%cI', ref, '--']);
      const [sha, date] = output.trim().split('\n');
      if (!sha || !date) {
        return null;
      }
      const commitDate = new Date(date);
      if (Number.isNaN(commitDate.getTime())) {
        return null;
      }
      return { commitSha: sha, commitUrl: '', commitDate };
    } catch (err) {
      logger.debug('Failed to read last commit', { path: this.path, ref, err });
      return null;
    }
  }

  async fetch(): Promise<void> {
    await this.git.fetch(['--prune']);
  }
}

export class SimpleGitCloneClient implements CloneClient {
  constructor(private options: SimpleGitCloneClientOptions = {}) {}

  async clone(url: string, destinationPath: string, request: CloneRequestOptions = {}): Promise<LocalRepository> {
    const args: string[] = [];
    if (request.branch) {
      args.push('--branch', request.branch);
    }
    if (request.depth) {
      // --no-single-branch keeps remote refs for every branch so activity can be read locally
      args.push('--depth', String(request.depth), '--no-single-branch');
    }

    const git = simpleGit(gitOptions(undefined, this.options));
    if (this.options.env) {
      git.env({ ...process.env, ...this.options.env });
    }

    await git.clone(url, destinationPath, args);
    return new SimpleGitLocalRepository(destinationPath, this.options);
  }
}
