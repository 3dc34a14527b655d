/**
 * Subprocess Handler - runs short diagnostic commands (git version checks)
 * with a timeout, returning a result object instead of throwing.
 */

import { execa } from 'execa';
import { logger } from './logger.js';

export interface SubprocessOptions {
  // Maximum time to allow subprocess to run (ms)
  timeout?: number;

  // Working directory
  cwd?: string;

  // Extra environment variables
  env?: Record<string, string>;
}

export interface SubprocessResult {
  success: boolean;
  exitCode: number | null;
  stdout: string;
  stderr: string;
  error?: string;
  timedOut: boolean;
}

/**
 * Execute a subprocess; never rejects.
 */
export async function executeSubprocess(
  command: string,
  args: string[] = [],
  options: SubprocessOptions = {}
): Promise<SubprocessResult> {
  const { timeout = 30000, cwd, env = {} } = options;
  const startTime = Date.now();

  const result = await execa(command, args, {
    timeout,
    cwd,
    env: { ...process.env, ...env },
    reject: false,
  });

  const outcome: SubprocessResult = {
    success: !result.failed,
    exitCode: result.exitCode ?? null,
    stdout: result.stdout,
    stderr: result.stderr,
    timedOut: result.timedOut,
    ...(result.failed ? { error: describeFailure(command, result) } : {}),
  };

  if (!outcome.success) {
    logger.debug('[SUBPROCESS] Failure', {
      command,
      args: args.join(' '),
      exitCode: outcome.exitCode,
      error: outcome.error,
      timedOut: outcome.timedOut,
      duration: `${Date.now() - startTime}ms`,
    });
  }

  return outcome;
}

function describeFailure(command: string, result: { timedOut: boolean; stderr: string; exitCode?: number }): string {
  if (result.timedOut) {
    return `${command} timed out`;
  }
  return result.stderr.trim() || `${command} exited with code ${result.exitCode ?? 'unknown'}`;
}

/**
 * Installed git version (e.g. "2.43.0"), or null when git cannot be run.
 */
export async function detectGitVersion(): Promise<string | null> {
  const result = await executeSubprocess('git', ['--version'], { timeout: 10000 });
  if (!result.success) {
    return null;
  }
  const match = /git version (\S+)/.exec(result.stdout);
  return match ? match[1] : result.stdout.trim() || null;
}
