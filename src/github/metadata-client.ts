import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { MetadataError, RateLimitError, describeCause } from '../errors.js';
import { fail, ok, type BranchCommit, type Result } from '../types.js';
import { logger, repoTag } from '../utils/logger.js';

export const DEFAULT_API_BASE_URL = 'https://api.github.com';
export const FALLBACK_DEFAULT_BRANCH = 'main';
const PAGE_SIZE = 100;
const MAX_PAGES = 50;
const MAX_RECORDED_ERRORS = 50;

/** Status reported when the request failed before any HTTP response */
export const NO_RESPONSE = 0;

const RepoMetadataSchema = z.object({
  default_branch: z.string().min(1),
});

const BranchListSchema = z.array(
  z.object({
    name: z.string(),
    commit: z.object({
      sha: z.string(),
      url: z.string(),
    }),
  })
);

const CommitSchema = z.object({
  sha: z.string(),
  url: z.string().optional(),
  commit: z.object({
    committer: z.object({
      date: z.string(),
    }),
  }),
});

export interface MetadataClientOptions {
  apiBaseUrl?: string;
  token?: string;
  timeoutMs?: number;
  /** Supply a preconfigured instance (tests pass one with a stub adapter) */
  http?: AxiosInstance;
}

export interface BranchesWithCommits {
  status: number;
  branches: Map<string, BranchCommit>;
}

export interface RecordedMetadataError {
  at: Date;
  operation: string;
  repository: string;
  status: number;
  message: string;
}

type HttpOutcome = { status: number; data: unknown; error?: string };

/**
 * Reads default branch and per-branch last-commit metadata from the GitHub
 * REST API. Never throws and never retries: failures degrade to fallback
 * values with the HTTP status preserved for the caller.
 */
export class GitHubMetadataClient {
  private http: AxiosInstance;
  private recorded: RecordedMetadataError[] = [];

  constructor(options: MetadataClientOptions = {}) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.apiBaseUrl ?? DEFAULT_API_BASE_URL,
        timeout: options.timeoutMs ?? 10000,
        headers: {
          Accept: 'application/vnd.github+json',
          'User-Agent': 'repo-mirror',
          ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
        },
      });
  }

  /** Errors recorded by fallbacks, oldest first. */
  get errors(): readonly RecordedMetadataError[] {
    return this.recorded;
  }

  async fetchDefaultBranch(owner: string, name: string): Promise<string> {
    const response = await this.get(`/repos/${owner}/${name}`);
    const parsed = response.status === 200 ? RepoMetadataSchema.safeParse(response.data) : null;

    if (parsed?.success) {
      logger.debug(`${repoTag(owner, name)} Default branch resolved`, { branch: parsed.data.default_branch });
      return parsed.data.default_branch;
    }

    const message =
      parsed && !parsed.success
        ? `malformed payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`
        : response.error ?? `HTTP ${response.status}`;
    this.record('fetchDefaultBranch', owner, name, response.status, message);
    logger.warn(`${repoTag(owner, name)} Could not resolve default branch, using "${FALLBACK_DEFAULT_BRANCH}"`, {
      status: response.status,
      error: message,
    });
    return FALLBACK_DEFAULT_BRANCH;
  }

  /**
   * List branches, then read each branch's last commit. 200 returns the full
   * map; 403 (rate limited) and any other status return an empty map.
   */
  async fetchBranchesWithCommits(owner: string, name: string): Promise<BranchesWithCommits> {
    const tag = repoTag(owner, name);
    const listed: Array<{ name: string; sha: string; url: string }> = [];

    for (let page = 1; page <= MAX_PAGES; page++) {
      const response = await this.get(`/repos/${owner}/${name}/branches`, { per_page: PAGE_SIZE, page });

      if (response.status !== 200) {
        this.record('fetchBranchesWithCommits', owner, name, response.status, response.error ?? `HTTP ${response.status}`);
        if (response.status === 403) {
          logger.warn(`${tag} Rate limited while listing branches`);
        } else {
          logger.warn(`${tag} Branch listing failed`, { status: response.status, error: response.error });
        }
        return { status: response.status, branches: new Map() };
      }

      const parsed = BranchListSchema.safeParse(response.data);
      if (!parsed.success) {
        this.record('fetchBranchesWithCommits', owner, name, response.status, 'malformed branch list');
        return { status: response.status, branches: new Map() };
      }

      listed.push(...parsed.data.map((b) => ({ name: b.name, sha: b.commit.sha, url: b.commit.url })));
      if (parsed.data.length < PAGE_SIZE) break;
    }

    const branches = new Map<string, BranchCommit>();
    for (const branch of listed) {
      const commit = await this.fetchCommit(owner, name, branch.url || `/repos/${owner}/${name}/commits/${branch.sha}`);
      if (!commit.success) {
        if (commit.error instanceof RateLimitError) {
          logger.warn(`${tag} Rate limited while reading commits`, { branch: branch.name });
          return { status: 403, branches: new Map() };
        }
        logger.debug(`${tag} Skipping branch without commit metadata`, {
          branch: branch.name,
          error: commit.error.message,
        });
        continue;
      }
      branches.set(branch.name, commit.value);
    }

    logger.info(`${tag} Fetched ${branches.size} branch(es) with commit metadata`);
    return { status: 200, branches };
  }

  /** Refresh one branch's last commit. */
  async fetchBranchCommit(
    owner: string,
    name: string,
    branch: string
  ): Promise<Result<BranchCommit, MetadataError | RateLimitError>> {
    return this.fetchCommit(owner, name, `/repos/${owner}/${name}/commits/${encodeURIComponent(branch)}`);
  }

  /** Status of `GET /` on the API root, or 0 when unreachable. Diagnostics only. */
  async checkServiceReachable(): Promise<number> {
    const response = await this.get('/');
    if (response.status === NO_RESPONSE) {
      logger.warn('Hosting API unreachable', { error: response.error });
    }
    return response.status;
  }

  private async fetchCommit(
    owner: string,
    name: string,
    url: string
  ): Promise<Result<BranchCommit, MetadataError | RateLimitError>> {
    const response = await this.get(url);

    if (response.status === 403) {
      this.record('fetchCommit', owner, name, 403, response.error ?? 'HTTP 403');
      return fail(new RateLimitError(`${owner}/${name}`));
    }
    if (response.status !== 200) {
      const message = response.error ?? `HTTP ${response.status}`;
      this.record('fetchCommit', owner, name, response.status, message);
      return fail(new MetadataError(`Commit lookup failed: ${message}`, response.status));
    }

    const parsed = CommitSchema.safeParse(response.data);
    if (!parsed.success) {
      return fail(new MetadataError('Malformed commit payload', response.status));
    }

    const commitDate = new Date(parsed.data.commit.committer.date);
    if (Number.isNaN(commitDate.getTime())) {
      return fail(new MetadataError(`Invalid commit date "${parsed.data.commit.committer.date}"`, response.status));
    }

    return ok({ commitSha: parsed.data.sha, commitUrl: parsed.data.url ?? url, commitDate });
  }

  private async get(url: string, params?: Record<string, string | number>): Promise<HttpOutcome> {
    try {
      const response = await this.http.get<unknown>(url, {
        params,
        // Status codes are classified by the caller
        validateStatus: () => true,
      });
      return {
        status: response.status,
        data: response.data,
        ...(response.status !== 200 ? { error: `HTTP ${response.status}` } : {}),
      };
    } catch (err) {
      return { status: NO_RESPONSE, data: null, error: describeCause(err) };
    }
  }

  private record(operation: string, owner: string, name: string, status: number, message: string): void {
    this.recorded.push({ at: new Date(), operation, repository: `${owner}/${name}`, status, message });
    if (this.recorded.length > MAX_RECORDED_ERRORS) {
      this.recorded.shift();
    }
  }
}

/** Map a non-200 branch-listing status to the error callers should surface. */
export function statusToError(status: number, owner: string, name: string): RateLimitError | MetadataError {
  if (status === 403) {
    return new RateLimitError(`${owner}/${name}`);
  }
  if (status === NO_RESPONSE) {
    return new MetadataError(`Hosting API unreachable while querying ${owner}/${name}`, status);
  }
  return new MetadataError(`Hosting API returned HTTP ${status} for ${owner}/${name}`, status);
}
