import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { JsonReporter } from '@/reporters/json-reporter';
import { sampleReport } from '../../fixtures/sample-tree';

const EXPECTED_REPORT = {
  metadata: {
    homepageUrl: 'https://example.com/',
    generatedAt: '2024-05-01T12:00:01.500Z',
    durationMs: 1500,
  },
  summary: { sitemaps: 3, invalidSitemaps: 1, pages: 2, uniquePages: 2 },
  tree: {
    variant: 'index',
    source: 'website',
    url: 'https://example.com/',
    subSitemaps: [
      {
        variant: 'index-robots-txt',
        url: 'https://example.com/robots.txt',
        subSitemaps: [
          {
            variant: 'pages',
            format: 'xml',
            url: 'https://example.com/sitemap.xml',
            pages: [
              { url: 'https://example.com/', lastModified: '2024-01-15T10:00:00.000Z' },
              { url: 'https://example.com/about' },
            ],
          },
        ],
      },
      {
        variant: 'invalid',
        code: 'fetch-failed',
        url: 'https://example.com/sitemap.xml.gz',
        reason: 'Unable to fetch sitemap from https://example.com/sitemap.xml.gz: 404 Not Found',
      },
    ],
  },
};

describe('JsonReporter', () => {
  let outDir: string;

  beforeEach(() => {
    outDir = fs.mkdtempSync(path.join(os.tmpdir(), 'sitemap-tree-report-'));
  });

  afterEach(() => {
    fs.rmSync(outDir, { recursive: true, force: true });
  });

  it('should write the report to a file', async () => {
    const outputPath = path.join(outDir, 'report.json');

    await new JsonReporter(outputPath).generate(sampleReport());

    expect(JSON.parse(fs.readFileSync(outputPath, 'utf8'))).toEqual(EXPECTED_REPORT);
    expect(vi.mocked(console.error)).toHaveBeenCalledWith(`JSON report generated at ${outputPath}`);
  });

  it('should print the report to stdout without a path', async () => {
    await new JsonReporter().generate(sampleReport());

    expect(vi.mocked(console.log)).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(vi.mocked(console.log).mock.calls[0][0]))).toEqual(EXPECTED_REPORT);
  });
});
