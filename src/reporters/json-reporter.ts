import fs from 'node:fs/promises';
import { sitemapToJSON } from '@/core/traversal';
import { summarizeTree, type Reporter, type ReportData } from './base';

export class JsonReporter implements Reporter {
  /** Without a path the report goes to stdout. */
  constructor(private readonly outputPath?: string) {}

  async generate(data: ReportData): Promise<void> {
    const report = {
      metadata: {
        homepageUrl: data.homepageUrl,
        generatedAt: data.endTime.toISOString(),
        durationMs: data.endTime.getTime() - data.startTime.getTime(),
      },
      summary: summarizeTree(data.tree),
      tree: sitemapToJSON(data.tree),
    };
    const json = JSON.stringify(report, null, 2);

    if (this.outputPath === undefined) {
      console.log(json);
      return;
    }

    await fs.writeFile(this.outputPath, json, 'utf8');
    console.error(`JSON report generated at ${this.outputPath}`);
  }
}
