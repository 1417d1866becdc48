import { CrawlResult } from '../../crawler/types/crawl-result';
import { ExtractedItem } from '../../extraction/types/extraction-schema';
import { PageImage, PageLinks } from '../../crawler/types/rendered-page';
import { TaskStatus } from '../entities/task.entity';

export interface CrawlResultDto {
  url: string;
  raw_markdown: string;
  fit_markdown: string;
  extracted_json: ExtractedItem[] | null;
  word_count: number;
  links: PageLinks;
  images: PageImage[];
  stats: {
    crawl_time_ms: number;
    page_size_bytes: number;
  };
}

export interface TaskStatusDto {
  task_id: string;
  status: TaskStatus;
  result?: CrawlResultDto;
  error?: string;
  created_at: string;
}

export function toCrawlResultDto(result: CrawlResult): CrawlResultDto {
  return {
    url: result.url,
    raw_markdown: result.rawMarkdown,
    fit_markdown: result.fitMarkdown,
    extracted_json: result.extracted,
    word_count: result.wordCount,
    links: result.links,
    images: result.images,
    stats: {
      crawl_time_ms: result.stats.crawlTimeMs,
      page_size_bytes: result.stats.pageSizeBytes,
    },
  };
}

export function isCrawlResultDto(value: unknown): value is CrawlResultDto {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const candidate: Record<string, unknown> = { ...value };
  return (
    typeof candidate.url === 'string' &&
    typeof candidate.raw_markdown === 'string' &&
    typeof candidate.fit_markdown === 'string' &&
    typeof candidate.word_count === 'number' &&
    typeof candidate.links === 'object' &&
    Array.isArray(candidate.images) &&
    typeof candidate.stats === 'object'
  );
}
