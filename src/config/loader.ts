import { readFile } from 'fs/promises';
import { isAbsolute, join, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import { ConfigError } from '../errors/index.js';
import { logger } from '../utils/logger.js';
import { SessionctlConfigSchema, type SessionctlConfig } from './schema.js';

export const CONFIG_FILE_NAMES = ['sessionctl.yaml', 'sessionctl.yml', 'sessionctl.json'];

export class ConfigLoader {
  private configDir: string;
  private cachedConfig: SessionctlConfig | null = null;

  constructor(configDir: string) {
    this.configDir = resolve(configDir);
  }

  /**
   * Load the first config file found in the config directory; defaults apply
   * when there is none.
   */
  async loadConfig(): Promise<SessionctlConfig> {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    let raw: unknown = {};
    let source = 'defaults';

    for (const name of CONFIG_FILE_NAMES) {
      const configPath = join(this.configDir, name);
      const content = await readOptional(configPath);
      if (content === null) continue;

      try {
        // YAML is a superset of JSON, one parser covers both
        raw = parseYaml(content) ?? {};
      } catch (err) {
        throw new ConfigError(`Invalid ${name.endsWith('.json') ? 'JSON' : 'YAML'} in config file: ${configPath}`, err);
      }
      source = configPath;
      break;
    }

    try {
      const parsed = SessionctlConfigSchema.parse(raw);
      const stateDir = this.resolvePath(parsed.stateDir);
      this.cachedConfig = {
        ...parsed,
        configDir: this.configDir,
        stateDir,
        workDir: parsed.workDir ? this.resolvePath(parsed.workDir) : this.configDir,
        logDirectory: parsed.logDirectory ? this.resolvePath(parsed.logDirectory) : join(stateDir, 'logs'),
        serverUrl: `http://${parsed.serverHost}:${parsed.serverPort}`,
      };
    } catch (err) {
      if (err instanceof ZodError) {
        const issues = err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        throw new ConfigError(`Invalid config (${source}): ${issues}`, err);
      }
      throw err;
    }

    logger.info('Loaded sessionctl config', { source });
    return this.cachedConfig;
  }

  private resolvePath(path: string): string {
    return isAbsolute(path) ? path : join(this.configDir, path);
  }
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return null;
    }
    throw err;
  }
}
