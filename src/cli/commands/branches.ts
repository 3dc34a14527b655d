import chalk from 'chalk';
import { GitHubMetadataClient } from '../../github/metadata-client.js';
import { daysSinceLastCommit } from '../../mirror/active-branches.js';
import { RepositorySource } from '../../mirror/repository.js';
import { MirrorService } from '../../mirror/service.js';
import { SimpleGitCloneClient } from '../../git/clone-client.js';
import { resolveRepoUrl } from '../../utils/repo.js';

interface BranchesOptions {
  cutoffDays: string;
  host: string;
}

/**
 * Print every branch of a repository and whether it is active.
 */
export async function branchesCommand(url: string, options: BranchesOptions): Promise<void> {
  const cutoffDays = Number.parseInt(options.cutoffDays, 10);
  if (!Number.isInteger(cutoffDays) || cutoffDays < 0) {
    console.error(chalk.red(`--cutoff-days must be a non-negative integer, got "${options.cutoffDays}"`));
    process.exitCode = 1;
    return;
  }

  const resolved = resolveRepoUrl(url, options.host);
  if (!resolved.success) {
    console.error(chalk.red(resolved.error.message));
    process.exitCode = 1;
    return;
  }

  const service = new MirrorService({
    metadata: new GitHubMetadataClient({ token: process.env.GITHUB_TOKEN }),
    cloneClient: new SimpleGitCloneClient(),
    acceptedHost: options.host,
  });
  const source = RepositorySource.fromUrl(url, options.host);
  const listing = await service.refresh(source, cutoffDays);

  if (!listing.success) {
    console.error(chalk.red(listing.error.message));
    process.exitCode = 1;
    return;
  }

  const activeNames = new Set(listing.active.map((branch) => branch.name));
  console.log(chalk.bold(`${source.fullName}`) + chalk.gray(` (default branch: ${source.defaultBranchName})`));
  for (const branch of listing.known) {
    const age = branch.commitDate ? `${daysSinceLastCommit(branch.commitDate)}d ago` : 'unknown';
    const marker = activeNames.has(branch.name) ? chalk.green('active  ') : chalk.gray('inactive');
    console.log(`  ${marker} ${branch.name} ${chalk.gray(`(${age})`)}`);
  }
  console.log(chalk.cyan(`\n${listing.active.length} of ${listing.known.length} branch(es) active`));
}
