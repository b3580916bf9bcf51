import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigLoader, formatConfigError } from '@/config/loader';
import { DEFAULT_CONFIG_FILE, DEFAULT_CONFIG_TEMPLATE } from '@/config/defaults';
import { ConfigError } from '@/errors/sitemap-errors';

const DEFAULTS = {
  client: 'axios',
  timeout: 60,
  wait: 0,
  randomWait: false,
  concurrency: 1,
  useRobots: true,
  useKnownPaths: true,
  extraKnownPaths: [],
  exclude: [],
  stripUrl: false,
  format: 'tabtree',
  logLevel: 'warn',
};

function loadError(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('ConfigLoader', () => {
  let cwd: string;

  const writeConfig = (content: string, name = DEFAULT_CONFIG_FILE) =>
    fs.writeFileSync(path.join(cwd, name), content, 'utf8');

  beforeEach(() => {
    cwd = fs.mkdtempSync(path.join(os.tmpdir(), 'sitemap-tree-config-'));
  });

  afterEach(() => {
    fs.rmSync(cwd, { recursive: true, force: true });
  });

  it('should return defaults when nothing is configured', () => {
    expect(ConfigLoader.load({ cwd, env: {} })).toEqual(DEFAULTS);
  });

  it('should read sitemap-tree.yaml from the working directory', () => {
    writeConfig('timeout: 30\nclient: undici\nexclude:\n  - "/archive/**"\n');

    const config = ConfigLoader.load({ cwd, env: {} });

    expect(config.timeout).toBe(30);
    expect(config.client).toBe('undici');
    expect(config.exclude).toEqual(['/archive/**']);
    expect(config.format).toBe('tabtree');
  });

  it('should read an explicit configuration path relative to the working directory', () => {
    writeConfig('concurrency: 4\n', 'custom.yaml');

    expect(ConfigLoader.load({ cwd, env: {}, configPath: 'custom.yaml' }).concurrency).toBe(4);
  });

  it('should let the environment override the file', () => {
    writeConfig('timeout: 30\nwait: 1\n');

    const config = ConfigLoader.load({
      cwd,
      env: {
        SITEMAP_TREE_TIMEOUT: '15',
        SITEMAP_TREE_WAIT: '0.5',
        SITEMAP_TREE_PROXY: 'http://proxy.local:3128',
        SITEMAP_TREE_CLIENT: 'UNDICI',
        SITEMAP_TREE_LOG_LEVEL: 'Debug',
        SITEMAP_TREE_UNRELATED: 'ignored',
      },
    });

    expect(config).toMatchObject({
      timeout: 15,
      wait: 0.5,
      proxy: 'http://proxy.local:3128',
      client: 'undici',
      logLevel: 'debug',
    });
  });

  it('should ignore empty environment values', () => {
    expect(ConfigLoader.load({ cwd, env: { SITEMAP_TREE_TIMEOUT: '  ' } }).timeout).toBe(60);
  });

  it('should let overrides win over every other layer', () => {
    writeConfig('timeout: 30\nformat: pages\n');

    const config = ConfigLoader.load({
      cwd,
      env: { SITEMAP_TREE_TIMEOUT: '15' },
      overrides: { timeout: 5, format: undefined, useRobots: false },
    });

    expect(config.timeout).toBe(5);
    expect(config.format).toBe('pages');
    expect(config.useRobots).toBe(false);
  });

  it('should accept the generated template', () => {
    writeConfig(DEFAULT_CONFIG_TEMPLATE);

    expect(ConfigLoader.load({ cwd, env: {} })).toEqual(DEFAULTS);
  });

  it('should treat an empty file as no configuration', () => {
    writeConfig('# nothing here\n');

    expect(ConfigLoader.load({ cwd, env: {} })).toEqual(DEFAULTS);
  });

  it('should report invalid values with their path', () => {
    writeConfig('timeout: -1\nformat: html\n');

    const error = loadError(() => ConfigLoader.load({ cwd, env: {} }));

    expect(error.code).toBe('CONFIG_ERROR');
    expect(error.issues.map((issue) => issue.path.join('.'))).toEqual(['timeout', 'format']);
    expect(error.issues[0].message).toBe('Timeout must be a positive number of seconds');
  });

  it('should reject unknown keys', () => {
    writeConfig('timout: 30\n');

    const error = loadError(() => ConfigLoader.load({ cwd, env: {} }));

    expect(error.issues[0].code).toBe('unrecognized_keys');
  });

  it('should reject environment values that are not numbers', () => {
    const error = loadError(() => ConfigLoader.load({ cwd, env: { SITEMAP_TREE_TIMEOUT: 'soon' } }));

    expect(error.issues[0].path).toEqual(['timeout']);
  });

  it('should reject proxies that are not HTTP(s) URLs', () => {
    const error = loadError(() => ConfigLoader.load({ cwd, env: { SITEMAP_TREE_PROXY: 'socks5://proxy.local:1080' } }));

    expect(error.issues[0].message).toBe('Proxy must be a HTTP(s) URL');
  });

  it('should fail when an explicit configuration file is missing', () => {
    const error = loadError(() => ConfigLoader.load({ cwd, env: {}, configPath: 'missing.yaml' }));

    expect(error.message).toBe(`Configuration file not found at ${path.join(cwd, 'missing.yaml')}`);
  });

  it('should fail on YAML syntax errors', () => {
    writeConfig('timeout: [1, 2\n');

    const error = loadError(() => ConfigLoader.load({ cwd, env: {} }));

    expect(error.message).toMatch(/^Failed to load configuration from /);
  });

  it('should fail when the file is not a mapping', () => {
    writeConfig('- timeout\n- wait\n');

    const error = loadError(() => ConfigLoader.load({ cwd, env: {} }));

    expect(error.message).toBe(`Configuration in ${path.join(cwd, DEFAULT_CONFIG_FILE)} must be a mapping`);
  });
});

describe('formatConfigError', () => {
  it('should list each issue under the message', () => {
    const error = new ConfigError('Configuration Validation Error', [
      { code: 'custom', path: ['timeout'], message: 'Timeout must be a positive number of seconds' },
      { code: 'custom', path: [], message: 'Broken' },
    ]);

    expect(formatConfigError(error)).toEqual([
      'Configuration Validation Error',
      '  - timeout: Timeout must be a positive number of seconds',
      '  - (root): Broken',
    ]);
  });
});
