/**
 * Host resource probing for sizing the clone worker pool.
 *
 * Cloning many branches of one repository at once is bounded by CPU (git
 * index/pack work) and by free memory (each clone holds pack data).
 */

import { availableParallelism, freemem } from 'os';
import { logger } from './logger.js';

const BYTES_PER_GB = 1024 ** 3;
const TASKS_PER_FREE_GB = 10;

export interface HostResources {
  cpuCount: number;
  freeMemoryBytes: number;
}

export interface ConcurrencyCapOptions extends Partial<HostResources> {
  /** Concurrent clones per CPU */
  loadFactor?: number;
}

export function getHostResources(): HostResources {
  return {
    cpuCount: availableParallelism(),
    freeMemoryBytes: freemem(),
  };
}

/**
 * `min(cpuCount × loadFactor, freeMemoryGB × 10)`, floored at 1.
 */
export function computeConcurrencyCap(options: ConcurrencyCapOptions = {}): number {
  const host = options.cpuCount === undefined || options.freeMemoryBytes === undefined ? getHostResources() : null;
  const cpuCount = options.cpuCount ?? host?.cpuCount ?? 1;
  const freeMemoryBytes = options.freeMemoryBytes ?? host?.freeMemoryBytes ?? 0;
  const loadFactor = options.loadFactor ?? 2;

  const byCpu = cpuCount * loadFactor;
  const byMemory = (freeMemoryBytes / BYTES_PER_GB) * TASKS_PER_FREE_GB;
  const cap = Math.max(1, Math.floor(Math.min(byCpu, byMemory)));

  logger.debug('Computed clone concurrency cap', {
    cpuCount,
    loadFactor,
    freeMemoryGB: Math.round((freeMemoryBytes / BYTES_PER_GB) * 100) / 100,
    cap,
  });

  return cap;
}
