#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { branchesCommand } from './commands/branches.js';
import { checkCommand } from './commands/check.js';
import { runCommand } from './commands/run.js';
import { validateCommand } from './commands/validate.js';
import { DEFAULT_ACCEPTED_HOST } from '../utils/repo.js';

const program = new Command();

program
  .name('repo-mirror')
  .description(chalk.cyan('repo-mirror') + ' - Keep local clones of remote repositories and their active branches')
  .version('1.0.0');

program
  .command('run', { isDefault: true })
  .description('Mirror every repository listed in mirror.json')
  .option('-c, --config <path>', 'Directory containing mirror.json (defaults to the current directory)')
  .action(runCommand);

program
  .command('branches <url>')
  .description('List branches of a repository and mark the active ones')
  .option('--cutoff-days <days>', 'Days without commits before a branch is inactive (0 disables)', '30')
  .option('--host <host>', 'Accepted hosting domain', DEFAULT_ACCEPTED_HOST)
  .action(branchesCommand);

program
  .command('validate <url>')
  .description('Check that a URL names a repository on the accepted host')
  .option('--host <host>', 'Accepted hosting domain', DEFAULT_ACCEPTED_HOST)
  .action(validateCommand);

program
  .command('check')
  .description('Check that git is installed and the hosting API is reachable')
  .option('--api-base-url <url>', 'Hosting API base URL')
  .action(checkCommand);

await program.parseAsync();
