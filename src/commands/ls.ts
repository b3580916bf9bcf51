import { Command } from 'commander';
import chalk from 'chalk';
import micromatch from 'micromatch';
import { ConfigLoader, formatConfigError } from '@/config/loader';
import type { Config, ConfigOverrides } from '@/config/schema';
import type { RecurseListCallback } from '@/core/fetcher';
import { MAX_SITEMAP_SIZE, sitemapTreeForHomepage } from '@/core/tree';
import { ConfigError } from '@/errors/sitemap-errors';
import { JsonReporter } from '@/reporters/json-reporter';
import { ConsoleReporter } from '@/reporters/console-reporter';
import type { Reporter } from '@/reporters/base';
import { createLogger, setLogLevel } from '@/utils/logger';
import { urlPath } from '@/utils/url';
import { createWebClient } from '@/web-client';

const log = createLogger('ls');

interface LsOptions {
  format?: string;
  config?: string;
  robots: boolean;
  known: boolean;
  extraPath?: string[];
  exclude?: string[];
  stripUrl?: boolean;
  timeout?: string;
  wait?: string;
  randomWait?: boolean;
  proxy?: string;
  client?: string;
  concurrency?: string;
  output?: string;
  verbose?: boolean;
}

function toNumber(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/** Drops child sitemaps whose URL path matches any of `patterns`. */
export function excludeMatching(patterns: readonly string[]): RecurseListCallback {
  return (urls) =>
    urls.filter((url) => {
      const excluded = micromatch.isMatch(urlPath(url), [...patterns], { nocase: true });
      if (excluded) {
        log.info(`Excluding sitemap ${url}`);
      }
      return !excluded;
    });
}

function cliOverrides(options: LsOptions, command: Command): ConfigOverrides {
  const fromCli = (name: string): boolean => command.getOptionValueSource(name) === 'cli';

  return {
    format: options.format,
    client: options.client,
    useRobots: fromCli('robots') ? options.robots : undefined,
    useKnownPaths: fromCli('known') ? options.known : undefined,
    extraKnownPaths: options.extraPath,
    exclude: options.exclude,
    stripUrl: options.stripUrl,
    timeout: toNumber(options.timeout),
    wait: toNumber(options.wait),
    randomWait: options.randomWait,
    proxy: options.proxy,
    concurrency: toNumber(options.concurrency),
    output: options.output,
    logLevel: options.verbose ? 'debug' : undefined,
  };
}

function reportersFor(config: Config): Reporter[] {
  if (config.format === 'json') {
    return [new JsonReporter(config.output)];
  }

  const reporters: Reporter[] = [new ConsoleReporter({ format: config.format, stripUrl: config.stripUrl })];
  if (config.output !== undefined) {
    reporters.push(new JsonReporter(config.output));
  }
  return reporters;
}

export function createLsCommand(): Command {
  return new Command('ls')
    .description("Discover a website's sitemaps and list the tree")
    .argument('<url>', 'Homepage URL')
    .option('-f, --format <format>', 'Output format (tabtree, pages, json)')
    .option('-c, --config <path>', 'Path to sitemap-tree.yaml')
    .option('--no-robots', 'Do not read sitemap URLs from robots.txt')
    .option('--no-known', 'Do not try the known sitemap paths')
    .option('--extra-path <path...>', 'Additional sitemap paths to try')
    .option('--exclude <glob...>', 'Skip child sitemaps whose URL path matches a glob')
    .option('--strip-url', 'Print URLs relative to the homepage')
    .option('--timeout <seconds>', 'Request timeout in seconds')
    .option('--wait <seconds>', 'Seconds to wait between requests')
    .option('--random-wait', 'Vary the wait between 0.5x and 1.5x')
    .option('--proxy <url>', 'HTTP(s) proxy URL')
    .option('--client <client>', 'Web client (axios, undici)')
    .option('--concurrency <n>', 'Child sitemaps fetched at once')
    .option('-o, --output <file>', 'Write a JSON report to a file')
    .option('-v, --verbose', 'Log debug output')
    .action(async (url: string, options: LsOptions, command: Command) => {
      let config: Config;
      try {
        config = ConfigLoader.load({ configPath: options.config, overrides: cliOverrides(options, command) });
      } catch (error) {
        if (error instanceof ConfigError) {
          const [headline, ...issues] = formatConfigError(error);
          console.error(chalk.red(headline));
          issues.forEach((issue) => console.error(chalk.yellow(issue)));
          process.exit(2);
          return;
        }
        throw error;
      }

      setLogLevel(config.logLevel);

      const webClient = createWebClient({
        client: config.client,
        timeout: config.timeout,
        wait: config.wait,
        randomWait: config.randomWait,
        proxy: config.proxy,
        maxResponseDataLength: MAX_SITEMAP_SIZE,
      });

      let exitCode = 0;
      const startTime = new Date();

      try {
        const tree = await sitemapTreeForHomepage(url, {
          webClient,
          useRobots: config.useRobots,
          useKnownPaths: config.useKnownPaths,
          extraKnownPaths: config.extraKnownPaths,
          recurseListCallback: config.exclude.length > 0 ? excludeMatching(config.exclude) : undefined,
          concurrency: config.concurrency,
        });

        const data = { homepageUrl: url, tree, startTime, endTime: new Date() };
        for (const reporter of reportersFor(config)) {
          await reporter.generate(data);
        }
      } catch (error) {
        console.error(chalk.red('\nSitemap discovery failed:'), error instanceof Error ? error.message : error);
        exitCode = 1;
      } finally {
        await webClient.close();
      }

      process.exit(exitCode);
    });
}

export const lsCommand = createLsCommand();
