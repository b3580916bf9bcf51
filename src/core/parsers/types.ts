import type { Page, PagesFormat } from '@/types/sitemap';

/** What a document turned out to be, before any child sitemap is fetched. */
export type ParsedDocument =
  | { kind: 'index'; variant: 'xml' | 'robots-txt'; urls: string[] }
  | { kind: 'pages'; format: PagesFormat; pages: Page[] }
  | { kind: 'unrecognized'; reason: string }
  | { kind: 'parse-error'; reason: string };
