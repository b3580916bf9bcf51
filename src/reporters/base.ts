import { allPages, allSitemaps, uniquePages } from '@/core/traversal';
import type { IndexSitemap } from '@/types/sitemap';

export interface ReportData {
  homepageUrl: string;
  tree: IndexSitemap;
  startTime: Date;
  endTime: Date;
}

export interface Reporter {
  generate(data: ReportData): Promise<void>;
}

export interface TreeSummary {
  sitemaps: number;
  invalidSitemaps: number;
  pages: number;
  uniquePages: number;
}

export function summarizeTree(tree: IndexSitemap): TreeSummary {
  let sitemaps = 0;
  let invalidSitemaps = 0;
  for (const sitemap of allSitemaps(tree)) {
    sitemaps++;
    if (sitemap.variant === 'invalid') invalidSitemaps++;
  }

  return {
    sitemaps,
    invalidSitemaps,
    pages: Array.from(allPages(tree)).length,
    uniquePages: Array.from(uniquePages(tree)).length,
  };
}
