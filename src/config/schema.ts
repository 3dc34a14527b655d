import { z } from 'zod';

// Git URL pattern: supports HTTPS (https://...) and SSH (git@host:... or ssh://...)
const gitUrlPattern = /^(https?:\/\/|ssh:\/\/|git@)[^\s]+$/;

export const RepositoryEntrySchema = z.object({
  url: z.string().regex(gitUrlPattern, {
    message: 'Repository URL must be a valid git URL (HTTPS or SSH)',
  }),
  pull: z.boolean().default(true), // false: listed but not mirrored
  branches: z.array(z.string().min(1)).optional(), // explicit branches beside the default one
});

export type RepositoryEntry = z.infer<typeof RepositoryEntrySchema>;

export const GitHubSettingsSchema = z.object({
  apiBaseUrl: z.string().url().default('https://api.github.com'),
  token: z.string().min(1).optional(),
  timeoutMs: z.number().int().min(1000).default(10000),
});

/**
 * Mirror Configuration Schema (mirror.json)
 */
export const MirrorConfigSchema = z.object({
  destinationRoot: z.string().min(1),
  repositories: z.array(RepositoryEntrySchema).default([]),

  // Branch selection
  activeBranchCutoffDays: z.number().int().min(0).default(30), // 0 disables the filter
  mirrorActiveBranches: z.boolean().default(false),

  // Concurrency
  maxConcurrentTasks: z.number().int().min(1).max(64).default(3),
  branchConcurrency: z.union([z.literal('auto'), z.number().int().min(1)]).default('auto'),
  loadFactor: z.number().positive().default(2),

  // Clone retries
  maxRetries: z.number().int().min(1).default(3),
  retryDelayMs: z.number().int().min(0).default(30000),
  cloneDepth: z.number().int().min(1).optional(),

  github: GitHubSettingsSchema.default({}),
  acceptedHost: z.string().min(1).default('github.com'),

  // Logging
  logDirectory: z.string().min(1).optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
});

export type MirrorConfig = z.infer<typeof MirrorConfigSchema>;
