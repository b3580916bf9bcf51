import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import { ConfigError, toError } from '@/errors/sitemap-errors';
import { DEFAULT_CONFIG_FILE } from './defaults';
import { ConfigSchema, type Config, type ConfigOverrides } from './schema';

type RawConfig = Record<string, unknown>;

export interface LoadConfigOptions {
  /** Explicit configuration file; it must exist. */
  configPath?: string;
  /** Directory searched for `sitemap-tree.yaml` when no path is given. */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Command line values; `undefined` entries leave lower layers in place. */
  overrides?: ConfigOverrides;
}

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function definedEntries(values: RawConfig): RawConfig {
  return Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined));
}

export class ConfigLoader {
  static readonly ENV_PREFIX = 'SITEMAP_TREE_';

  /**
   * Merges defaults, the YAML file, the environment and `overrides`, in that order
   * of increasing priority, and validates the result.
   *
   * @throws ConfigError when the file cannot be read or the merged values are invalid
   */
  static load(options: LoadConfigOptions = {}): Config {
    const { configPath, cwd = process.cwd(), env = process.env, overrides = {} } = options;

    const merged: RawConfig = {
      ...this.fromFile(configPath, cwd),
      ...this.fromEnv(env),
      ...definedEntries(overrides),
    };

    const result = ConfigSchema.safeParse(merged);
    if (!result.success) {
      throw new ConfigError('Configuration Validation Error', result.error.issues);
    }

    return result.data;
  }

  static fromFile(configPath: string | undefined, cwd: string): RawConfig {
    const targetPath = configPath ? path.resolve(cwd, configPath) : path.join(cwd, DEFAULT_CONFIG_FILE);

    if (!fs.existsSync(targetPath)) {
      if (configPath) {
        throw new ConfigError(`Configuration file not found at ${targetPath}`);
      }
      return {};
    }

    let parsed: unknown;
    try {
      parsed = yaml.load(fs.readFileSync(targetPath, 'utf8'));
    } catch (error) {
      throw new ConfigError(`Failed to load configuration from ${targetPath}: ${toError(error).message}`);
    }

    if (parsed === undefined || parsed === null) {
      return {};
    }
    if (!isRecord(parsed)) {
      throw new ConfigError(`Configuration in ${targetPath} must be a mapping`);
    }
    return parsed;
  }

  static fromEnv(env: NodeJS.ProcessEnv): RawConfig {
    const read = (name: string): string | undefined => {
      const value = env[`${this.ENV_PREFIX}${name}`]?.trim();
      return value === '' ? undefined : value;
    };

    const timeout = read('TIMEOUT');
    const wait = read('WAIT');

    return definedEntries({
      timeout: timeout === undefined ? undefined : Number(timeout),
      wait: wait === undefined ? undefined : Number(wait),
      proxy: read('PROXY'),
      client: read('CLIENT')?.toLowerCase(),
      logLevel: read('LOG_LEVEL')?.toLowerCase(),
    });
  }
}

export function formatConfigError(error: ConfigError): string[] {
  return [
    error.message,
    ...error.issues.map((issue) => `  - ${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
  ];
}
