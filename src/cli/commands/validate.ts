import chalk from 'chalk';
import { resolveRepoUrl } from '../../utils/repo.js';

interface ValidateOptions {
  host: string;
}

export function validateCommand(url: string, options: ValidateOptions): void {
  const resolved = resolveRepoUrl(url, options.host);
  if (resolved.success) {
    const { owner, name, host } = resolved.value;
    console.log(chalk.green(`valid: ${host} ${owner}/${name}`));
    return;
  }
  console.log(chalk.red(`invalid: ${resolved.error.message}`));
  process.exitCode = 1;
}
