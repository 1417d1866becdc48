import { ExtractedItem } from '../../extraction/types/extraction-schema';
import { PageImage, PageLinks } from '../../crawler/types/rendered-page';
import { CrawlResult } from '../../crawler/types/crawl-result';
import { ItemOutcome } from './batch-stats';

/** One line of results.jsonl. */
export interface SuccessRecord {
  url: string;
  timestamp: string;
  content: {
    title: string;
    raw_markdown: string;
    fit_markdown: string;
  };
  metadata: {
    word_count: number;
    crawl_time_ms: number;
    page_size_bytes: number;
  };
  extracted: ExtractedItem[] | null;
  links: PageLinks;
  images: PageImage[];
}

/** One line of errors.jsonl. */
export interface ErrorRecord {
  url: string;
  timestamp: string;
  outcome: Exclude<ItemOutcome, 'success'>;
  error: string;
}

export interface CrawlFailure {
  url: string;
  outcome: Exclude<ItemOutcome, 'success'>;
  error: string;
}

export function toSuccessRecord(
  result: CrawlResult,
  timestamp: string,
): SuccessRecord {
  const first = result.extracted?.[0];
  const title = first && typeof first.title === 'string' ? first.title : '';
  return {
    url: result.url,
    timestamp,
    content: {
      title,
      raw_markdown: result.rawMarkdown,
      fit_markdown: result.fitMarkdown,
    },
    metadata: {
      word_count: result.wordCount,
      crawl_time_ms: result.stats.crawlTimeMs,
      page_size_bytes: result.stats.pageSizeBytes,
    },
    extracted: result.extracted,
    links: result.links,
    images: result.images,
  };
}
