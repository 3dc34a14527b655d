import { readFile } from 'fs/promises';
import { join } from 'path';
import { MirrorConfigSchema, type MirrorConfig } from './schema.js';
import { logger } from '../utils/logger.js';

export const CONFIG_FILE_NAME = 'mirror.json';

export class ConfigLoader {
  private configDir: string;
  private env: NodeJS.ProcessEnv;
  private cachedConfig: MirrorConfig | null = null;

  constructor(configDir: string, env: NodeJS.ProcessEnv = process.env) {
    this.configDir = configDir;
    this.env = env;
  }

  get configPath(): string {
    return join(this.configDir, CONFIG_FILE_NAME);
  }

  async loadMirrorConfig(): Promise<MirrorConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const configPath = this.configPath;

    let parsed: unknown;
    try {
      const raw = await readFile(configPath, 'utf-8');
      parsed = JSON.parse(raw);
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        throw new Error(`Config file not found: ${configPath}`);
      }
      if (err instanceof SyntaxError) {
        throw new Error(`Invalid JSON in config file: ${configPath}`);
      }
      throw err;
    }

    const result = MirrorConfigSchema.safeParse(parsed);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new Error(`Invalid config file ${configPath}:\n${issues.join('\n')}`);
    }

    const config = result.data;
    const token = this.env.GITHUB_TOKEN;
    if (token) {
      config.github = { ...config.github, token };
    }

    this.cachedConfig = config;
    logger.info('Loaded mirror config', { path: configPath, repositories: config.repositories.length });
    return config;
  }
}
