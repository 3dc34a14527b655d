/**
 * Incident Log - synchronous record of conditions that need a human
 *
 * Rollback failures can leave a mirror in neither its old nor its new state.
 * Those are written with fs.writeSync to `recovery.log` so the entry survives
 * even if the process is killed before winston flushes its file transports.
 */

import { writeSync, openSync, closeSync, mkdirSync } from 'fs';
import { join } from 'path';

let incidentFd: number | null = null;

export function initIncidentLog(logDir: string): void {
  closeIncidentLog();
  mkdirSync(logDir, { recursive: true });
  const incidentLogPath = join(logDir, 'recovery.log');

  try {
    incidentFd = openSync(incidentLogPath, 'a');
    writeSync(incidentFd, `\n--- incident log opened ${new Date().toISOString()} (pid ${process.pid}) ---\n`);
  } catch (err) {
    console.error('[INCIDENT LOG] Failed to open incident log:', err);
    incidentFd = null;
  }
}

// Same rule as the logger's console transport: quiet under the test runner
// unless LOG_LEVEL asks for output.
const echoToStderr = process.env.VITEST === undefined || process.env.LOG_LEVEL !== undefined;

/**
 * Record an incident. Echoed to stderr (except under the test runner) and
 * appended to the log file when one has been opened.
 */
export function logIncident(message: string, metadata?: Record<string, unknown>): void {
  const entry = `[${new Date().toISOString()}] ${message}\n`;
  if (echoToStderr) {
    console.error(entry.trimEnd());
  }

  if (incidentFd === null) {
    return;
  }

  try {
    writeSync(incidentFd, entry);
    if (metadata && Object.keys(metadata).length > 0) {
      writeSync(incidentFd, `  ${JSON.stringify(metadata)}\n`);
    }
  } catch (err) {
    console.error('[INCIDENT LOG] Failed to write incident:', err);
  }
}

export function closeIncidentLog(): void {
  if (incidentFd !== null) {
    try {
      closeSync(incidentFd);
    } catch (err) {
      console.error('[INCIDENT LOG] Failed to close incident log:', err);
    }
    incidentFd = null;
  }
}

/**
 * Route process-level failures to the incident log. Used by the CLI only.
 */
export function setupIncidentHandlers(): void {
  process.on('uncaughtException', (error: Error) => {
    logIncident('UNCAUGHT EXCEPTION', {
      message: error.message,
      stack: error.stack?.split('\n').slice(0, 5).join('\n'),
    });
    closeIncidentLog();
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    logIncident('UNHANDLED REJECTION', { reason: String(reason) });
  });

  process.on('exit', () => {
    closeIncidentLog();
  });
}
