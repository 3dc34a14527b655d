import chalk from 'chalk';
import { GitHubMetadataClient, NO_RESPONSE } from '../../github/metadata-client.js';
import { detectGitVersion } from '../../utils/subprocess-handler.js';

interface CheckOptions {
  apiBaseUrl?: string;
}

/**
 * Report whether git is installed and the hosting API answers.
 */
export async function checkCommand(options: CheckOptions): Promise<void> {
  const [gitVersion, apiStatus] = await Promise.all([
    detectGitVersion(),
    new GitHubMetadataClient({ apiBaseUrl: options.apiBaseUrl, token: process.env.GITHUB_TOKEN }).checkServiceReachable(),
  ]);

  console.log(gitVersion ? chalk.green(`git: ${gitVersion}`) : chalk.red('git: not found on PATH'));

  if (apiStatus === NO_RESPONSE) {
    console.log(chalk.red('api: unreachable'));
  } else if (apiStatus === 403) {
    console.log(chalk.yellow('api: rate limited (HTTP 403)'));
  } else {
    console.log((apiStatus === 200 ? chalk.green : chalk.yellow)(`api: HTTP ${apiStatus}`));
  }

  if (!gitVersion || apiStatus !== 200) {
    process.exitCode = 1;
  }
}
