import { ExtractedItem, ExtractionSchema } from '../../extraction/types/extraction-schema';
import { ContentFilterConfig } from '../../extraction/types/content-filter-config';
import { PageImage, PageLinks, WaitCondition } from './rendered-page';

export interface CrawlOptions {
  waitUntil: WaitCondition;
  pageTimeoutMs: number;
  schema: ExtractionSchema | null;
  filter: ContentFilterConfig;
}

export interface CrawlStats {
  crawlTimeMs: number;
  pageSizeBytes: number;
}

export interface CrawlResult {
  url: string;
  rawMarkdown: string;
  fitMarkdown: string;
  extracted: ExtractedItem[] | null;
  wordCount: number;
  links: PageLinks;
  images: PageImage[];
  stats: CrawlStats;
}

export type CrawlOutcome =
  | { success: true; result: CrawlResult }
  | { success: false; url: string; error: string };
