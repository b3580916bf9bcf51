import chalk from 'chalk';
import { subSitemaps, uniquePages } from '@/core/traversal';
import { assertNever, type Sitemap } from '@/types/sitemap';
import { summarizeTree, type Reporter, type ReportData } from './base';

export interface ConsoleReporterOptions {
  /** `tabtree` prints the sitemap hierarchy, `pages` one unique page URL per line. */
  format?: 'tabtree' | 'pages';
  /** Print URLs relative to the tree root. */
  stripUrl?: boolean;
}

function label(sitemap: Sitemap): string {
  switch (sitemap.variant) {
    case 'index':
      return sitemap.source === 'website' ? 'website' : 'index';
    case 'index-robots-txt':
      return 'robots.txt';
    case 'pages':
      return `${sitemap.format}, ${sitemap.pages.length} page(s)`;
    case 'invalid':
      return `invalid: ${sitemap.reason}`;
    default:
      return assertNever(sitemap);
  }
}

export class ConsoleReporter implements Reporter {
  private readonly format: 'tabtree' | 'pages';
  private readonly stripUrl: boolean;

  constructor(options: ConsoleReporterOptions = {}) {
    this.format = options.format ?? 'tabtree';
    this.stripUrl = options.stripUrl ?? false;
  }

  async generate(data: ReportData): Promise<void> {
    const prefix = this.stripUrl ? data.tree.url.replace(/\/$/, '') : '';
    const display = (url: string): string =>
      prefix !== '' && url.startsWith(prefix) ? url.slice(prefix.length) || '/' : url;

    if (this.format === 'pages') {
      for (const page of uniquePages(data.tree)) {
        console.log(display(page.url));
      }
      return;
    }

    const printTree = (sitemap: Sitemap, depth: number): void => {
      const indent = '\t'.repeat(depth);
      const line = `${indent}${display(sitemap.url)} ${chalk.gray(`(${label(sitemap)})`)}`;
      console.log(sitemap.variant === 'invalid' ? chalk.red(line) : line);

      if (sitemap.variant === 'pages') {
        for (const page of sitemap.pages) {
          console.log(`${indent}\t${display(page.url)}`);
        }
      }
      for (const child of subSitemaps(sitemap)) {
        printTree(child, depth + 1);
      }
    };

    printTree(data.tree, 0);

    const summary = summarizeTree(data.tree);
    const seconds = ((data.endTime.getTime() - data.startTime.getTime()) / 1000).toFixed(2);
    console.log(
      chalk.bold(
        `\n${summary.sitemaps} sitemap(s), ${summary.invalidSitemaps} invalid, ` +
          `${summary.uniquePages} unique page(s) in ${seconds}s`
      )
    );
  }
}
