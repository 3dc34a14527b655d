import type { BranchRef, CloneState, LocalRepository } from '../types.js';
import { DEFAULT_ACCEPTED_HOST, parseRepoUrl, resolveRepoUrl } from '../utils/repo.js';

/**
 * A remote repository being mirrored: identity, branch lists and clone state.
 *
 * Holds the local clone as an opaque `LocalRepository` handle rather than
 * extending any git library type.
 */
export class RepositorySource {
  readonly url: string;
  readonly owner: string;
  readonly name: string;
  readonly host: string;
  readonly hostAccepted: boolean;

  /** Empty until resolved from the hosting API */
  defaultBranchName = '';

  private known: BranchRef[] = [];
  private active: BranchRef[] = [];
  private clone: CloneState | null = null;

  private constructor(url: string, acceptedHost: string) {
    const identity = parseRepoUrl(url, acceptedHost);
    this.url = url;
    this.owner = identity.owner;
    this.name = identity.name;
    this.host = identity.host;
    this.hostAccepted = identity.hostAccepted;
  }

  /**
   * Build from a URL that has already passed validation. An invalid URL here
   * is a caller bug, so it throws.
   */
  static fromUrl(url: string, acceptedHost: string = DEFAULT_ACCEPTED_HOST): RepositorySource {
    const resolved = resolveRepoUrl(url, acceptedHost);
    if (!resolved.success) {
      throw resolved.error;
    }
    return new RepositorySource(url, acceptedHost);
  }

  get fullName(): string {
    return `${this.owner}/${this.name}`;
  }

  get knownBranches(): readonly BranchRef[] {
    return this.known;
  }

  get activeBranches(): readonly BranchRef[] {
    return this.active;
  }

  get cloneState(): CloneState | null {
    return this.clone;
  }

  get clonedToPath(): string | null {
    return this.clone?.clonedToPath ?? null;
  }

  /**
   * Replace both branch lists at once. Lists are never patched in place.
   */
  replaceBranches(known: readonly BranchRef[], active: readonly BranchRef[]): void {
    const knownNames = new Set(known.map((branch) => branch.name));
    const stray = active.find((branch) => !knownNames.has(branch.name));
    if (stray) {
      throw new Error(`Active branch "${stray.name}" is not a known branch of ${this.fullName}`);
    }

    this.known = [...known];
    this.active = [...active];
  }

  /** Record a successful clone. Never called on failure. */
  recordClone(clonedToPath: string, repository: LocalRepository): void {
    this.clone = { clonedToPath, repository };
  }

  identity(): { name: string; defaultBranchName: string } {
    return { name: this.name, defaultBranchName: this.defaultBranchName };
  }
}
