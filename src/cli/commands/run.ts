import { mkdir } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import chalk from 'chalk';
import { ConfigLoader } from '../../config/loader.js';
import type { MirrorConfig } from '../../config/schema.js';
import { RepositorySource } from '../../mirror/repository.js';
import { createMirrorService, type MirrorReport, type MirrorService } from '../../mirror/service.js';
import { closeIncidentLog, initIncidentLog, setupIncidentHandlers } from '../../utils/incident-log.js';
import { configureLogDirectory, logger, setLogLevel } from '../../utils/logger.js';
import type { TaskResult } from '../../types.js';

interface RunOptions {
  config?: string;
}

/**
 * Resolve log base directory from config
 */
function resolveLogBaseDir(configDir: string, config: MirrorConfig): string {
  const configured = config.logDirectory?.trim() ?? '';
  if (configured.length > 0) {
    return isAbsolute(configured) ? configured : join(configDir, configured);
  }
  return join(configDir, 'logs');
}

/**
 * Create timestamped run log directory
 */
async function createRunLogDirectory(baseDir: string): Promise<string> {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
  const runDir = join(baseDir, `run-${timestamp}`);
  await mkdir(runDir, { recursive: true });
  return runDir;
}

/**
 * Set up signal handlers for graceful shutdown
 */
function setupSignalHandlers(service: MirrorService): void {
  let isShuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (isShuttingDown) {
      logger.warn('Shutdown already in progress, forcing exit...');
      process.exit(1);
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}, waiting for running clones to finish...`);

    try {
      await service.stop();
      closeIncidentLog();
      process.exit(130);
    } catch (err) {
      logger.error('Error during shutdown', err);
      process.exit(1);
    }
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
}

function describeResult(result: TaskResult): string {
  return result.status === 'succeeded' ? chalk.green(`ok  ${result.path}`) : chalk.red(`FAILED  ${result.error.message}`);
}

function printReport(report: MirrorReport): void {
  console.log(chalk.bold(`\n${report.repository}`) + chalk.gray(` (default branch: ${report.defaultBranch})`));
  if (report.metadataError) {
    console.log(chalk.yellow(`  branch metadata unavailable: ${report.metadataError.message}`));
  }
  console.log(`  ${report.defaultBranch}: ${describeResult(report.defaultClone)}`);
  for (const clone of report.branchClones) {
    console.log(`  ${clone.branch}: ${describeResult(clone.result)}`);
  }
}

function countFailures(report: MirrorReport): number {
  const results = [report.defaultClone, ...report.branchClones.map((clone) => clone.result)];
  return results.filter((result) => result.status === 'failed').length;
}

/**
 * Run command handler: mirror every repository listed in mirror.json
 */
export async function runCommand(options: RunOptions): Promise<void> {
  const configDir = resolve(options.config ?? process.cwd());
  const loader = new ConfigLoader(configDir);

  let config: MirrorConfig;
  try {
    config = await loader.loadMirrorConfig();
  } catch (err) {
    console.error(chalk.red(err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
    return;
  }

  if (config.logLevel) {
    setLogLevel(config.logLevel);
  }
  const runLogDir = await createRunLogDirectory(resolveLogBaseDir(configDir, config));
  configureLogDirectory(runLogDir);
  initIncidentLog(runLogDir);
  setupIncidentHandlers();

  const service = createMirrorService(config);
  setupSignalHandlers(service);

  const destinationRoot = isAbsolute(config.destinationRoot)
    ? config.destinationRoot
    : join(configDir, config.destinationRoot);

  const entries = config.repositories.filter((entry) => entry.pull);
  let invalid = 0;
  const sources: Array<{ source: RepositorySource; branches?: string[] }> = [];
  for (const entry of entries) {
    if (!service.validate(entry.url)) {
      invalid++;
      logger.error('Skipping invalid repository URL', { url: entry.url });
      console.log(chalk.red(`Skipping invalid repository URL: ${entry.url}`));
      continue;
    }
    sources.push({ source: RepositorySource.fromUrl(entry.url, config.acceptedHost), branches: entry.branches });
  }

  logger.info(`Mirroring ${sources.length} repositories`, { destinationRoot, logs: runLogDir });

  const reports = await Promise.all(
    sources.map(({ source, branches }) =>
      service.mirror(source, destinationRoot, {
        branches,
        cutoffDays: config.activeBranchCutoffDays,
        mirrorActiveBranches: config.mirrorActiveBranches,
      })
    )
  );

  await service.stop();

  let failures = invalid;
  for (const report of reports) {
    printReport(report);
    failures += countFailures(report);
  }

  const stats = service.primaryQueue.getStats();
  console.log(
    chalk.cyan(`\nDone: ${stats.totalSucceeded} repository clone(s) succeeded, ${failures} failure(s)`) +
      chalk.gray(`\nLogs: ${runLogDir}`)
  );

  closeIncidentLog();
  if (failures > 0) {
    process.exitCode = 1;
  }
}
