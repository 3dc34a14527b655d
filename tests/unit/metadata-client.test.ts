import { describe, it, expect } from 'vitest';
import { MetadataError, RateLimitError } from '../../src/errors.js';
import { GitHubMetadataClient, NO_RESPONSE, statusToError } from '../../src/github/metadata-client.js';
import { stubHttp, type StubHandler } from '../helpers/fakes.js';

const commitUrl = (name: string) => `https://api.github.com/repos/acme/widgets/commits/${name}`;

const branchList = [
  { name: 'main', commit: { sha: 'a1', url: commitUrl('a1') } },
  { name: 'dev', commit: { sha: 'b2', url: commitUrl('b2') } },
];

function commitPayload(sha: string, date: string) {
  return { sha, url: commitUrl(sha), commit: { committer: { date } } };
}

function client(handler: StubHandler): GitHubMetadataClient {
  return new GitHubMetadataClient({ http: stubHttp(handler) });
}

describe('GitHubMetadataClient', () => {
  describe('fetchDefaultBranch', () => {
    it('returns the default branch', async () => {
      const metadata = client((url) =>
        url === '/repos/acme/widgets' ? { status: 200, data: { default_branch: 'develop' } } : { status: 404 }
      );

      expect(await metadata.fetchDefaultBranch('acme', 'widgets')).toBe('develop');
      expect(metadata.errors).toHaveLength(0);
    });

    it('falls back to main and records the failure', async () => {
      const metadata = client(() => ({ status: 404 }));

      expect(await metadata.fetchDefaultBranch('acme', 'widgets')).toBe('main');
      expect(metadata.errors).toHaveLength(1);
      expect(metadata.errors[0]).toMatchObject({
        operation: 'fetchDefaultBranch',
        repository: 'acme/widgets',
        status: 404,
        message: 'HTTP 404',
      });
    });

    it('falls back to main when the request never gets a response', async () => {
      const metadata = client(() => new Error('connect ECONNREFUSED'));

      expect(await metadata.fetchDefaultBranch('acme', 'widgets')).toBe('main');
      expect(metadata.errors[0]?.status).toBe(NO_RESPONSE);
      expect(metadata.errors[0]?.message).toBe('connect ECONNREFUSED');
    });

    it('falls back to main on a malformed payload', async () => {
      const metadata = client(() => ({ status: 200, data: { name: 'widgets' } }));

      expect(await metadata.fetchDefaultBranch('acme', 'widgets')).toBe('main');
    });
  });

  describe('fetchBranchesWithCommits', () => {
    it('returns every branch with its last commit', async () => {
      const requests: Array<{ url: string; params: unknown }> = [];
      const metadata = client((url, params) => {
        requests.push({ url, params });
        if (url === '/repos/acme/widgets/branches') return { status: 200, data: branchList };
        if (url === commitUrl('a1')) return { status: 200, data: commitPayload('a1', '2026-02-27T09:00:00Z') };
        if (url === commitUrl('b2')) return { status: 200, data: commitPayload('b2', '2026-01-15T18:30:00Z') };
        return { status: 404 };
      });

      const result = await metadata.fetchBranchesWithCommits('acme', 'widgets');

      expect(result.status).toBe(200);
      expect([...result.branches.keys()]).toEqual(['main', 'dev']);
      expect(result.branches.get('dev')).toEqual({
        commitSha: 'b2',
        commitUrl: commitUrl('b2'),
        commitDate: new Date('2026-01-15T18:30:00Z'),
      });
      expect(requests[0]).toEqual({ url: '/repos/acme/widgets/branches', params: { per_page: 100, page: 1 } });
      expect(requests).toHaveLength(3);
    });

    it('returns an empty map with 403 when the listing is rate limited', async () => {
      const result = await client(() => ({ status: 403 })).fetchBranchesWithCommits('acme', 'widgets');

      expect(result.status).toBe(403);
      expect(result.branches.size).toBe(0);
    });

    it('returns an empty map with 403 when a commit lookup is rate limited', async () => {
      const metadata = client((url) =>
        url === '/repos/acme/widgets/branches' ? { status: 200, data: branchList } : { status: 403 }
      );

      const result = await metadata.fetchBranchesWithCommits('acme', 'widgets');

      expect(result.status).toBe(403);
      expect(result.branches.size).toBe(0);
    });

    it('keeps other statuses for the caller', async () => {
      const result = await client(() => ({ status: 500 })).fetchBranchesWithCommits('acme', 'widgets');

      expect(result.status).toBe(500);
      expect(result.branches.size).toBe(0);
    });

    it('skips branches whose commit cannot be read', async () => {
      const metadata = client((url) => {
        if (url === '/repos/acme/widgets/branches') return { status: 200, data: branchList };
        if (url === commitUrl('a1')) return { status: 200, data: commitPayload('a1', '2026-02-27T09:00:00Z') };
        return { status: 404 };
      });

      const result = await metadata.fetchBranchesWithCommits('acme', 'widgets');

      expect(result.status).toBe(200);
      expect([...result.branches.keys()]).toEqual(['main']);
    });
  });

  describe('fetchBranchCommit', () => {
    it('encodes branch names with slashes', async () => {
      const seen: string[] = [];
      const metadata = client((url) => {
        seen.push(url);
        return { status: 200, data: commitPayload('c3', '2026-02-01T00:00:00Z') };
      });

      const result = await metadata.fetchBranchCommit('acme', 'widgets', 'feature/login');

      expect(seen).toEqual(['/repos/acme/widgets/commits/feature%2Flogin']);
      expect(result.success).toBe(true);
    });

    it('returns a rate limit error on 403', async () => {
      const result = await client(() => ({ status: 403 })).fetchBranchCommit('acme', 'widgets', 'dev');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(RateLimitError);
      }
    });

    it('rejects an unparseable commit date', async () => {
      const result = await client(() => ({ status: 200, data: commitPayload('c3', 'yesterday') })).fetchBranchCommit(
        'acme',
        'widgets',
        'dev'
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.message).toBe('Invalid commit date "yesterday"');
      }
    });
  });

  it('reports API reachability by status', async () => {
    expect(await client(() => ({ status: 200, data: {} })).checkServiceReachable()).toBe(200);
    expect(await client(() => new Error('getaddrinfo ENOTFOUND')).checkServiceReachable()).toBe(NO_RESPONSE);
  });
});

describe('statusToError', () => {
  it('maps 403 to a rate limit error', () => {
    const error = statusToError(403, 'acme', 'widgets');
    expect(error).toBeInstanceOf(RateLimitError);
    expect(error.message).toBe('Hosting API rate limit reached while querying acme/widgets');
  });

  it('maps other statuses to metadata errors', () => {
    const error = statusToError(404, 'acme', 'widgets');
    expect(error).toBeInstanceOf(MetadataError);
    expect(error.message).toBe('Hosting API returned HTTP 404 for acme/widgets');
  });
});
