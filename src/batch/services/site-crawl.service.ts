import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { readFile } from 'fs/promises';
import { SitemapResolverService } from '../../sitemap/services/sitemap-resolver.service';
import { BatchCrawlCoordinator } from './batch-crawl-coordinator.service';
import { ResultSinkService } from './result-sink.service';
import { CrawlOptions } from '../../crawler/types/crawl-result';
import { WaitCondition } from '../../crawler/types/rendered-page';
import { ExtractionSchema } from '../../extraction/types/extraction-schema';
import {
  ExtractionSchemaDto,
  toExtractionSchema,
} from '../../extraction/dto/extraction-schema.dto';
import { BatchStats } from '../types/batch-stats';
import { ExtractionError, errorMessage } from '../../common/errors/crawl.errors';

const SITE_CRAWL_PRUNING_THRESHOLD = 0.45;
const SITE_CRAWL_PAGE_TIMEOUT_MS = 30000;

export interface SiteCrawlReport {
  base_url: string;
  output_dir: string;
  total: number;
  stats: BatchStats;
  started_at: string;
  finished_at: string;
}

@Injectable()
export class SiteCrawlService {
  private readonly logger = new Logger(SiteCrawlService.name);
  private readonly concurrency: number;
  private readonly schemaPath: string;
  private readonly pruningMinWords: number;

  constructor(
    private readonly sitemapResolver: SitemapResolverService,
    private readonly coordinator: BatchCrawlCoordinator,
    private readonly resultSinkService: ResultSinkService,
    private readonly configService: ConfigService,
  ) {
    this.concurrency = this.configService.get<number>(
      'SITE_CRAWL_CONCURRENCY',
      5,
    );
    this.schemaPath = this.configService.get<string>(
      'EXTRACTION_SCHEMA_PATH',
      'config/article-schema.json',
    );
    this.pruningMinWords = this.configService.get<number>(
      'PRUNING_MIN_WORD_THRESHOLD',
      50,
    );
  }

  /**
   * Discovers the site's URLs and crawls them into a fresh run directory.
   * Resolves to null, without creating a run, when no URL is found.
   */
  async run(baseUrl: string): Promise<SiteCrawlReport | null> {
    const urls = await this.sitemapResolver.discover(baseUrl);
    if (urls.size === 0) {
      this.logger.warn('No URLs found in sitemap; nothing to crawl');
      return null;
    }
    this.logger.log(`Found ${urls.size} URLs to crawl`);

    const startedAt = new Date();
    const sink = await this.resultSinkService.openRun(undefined, startedAt);
    const options = await this.loadCrawlOptions();
    const stats = await this.coordinator.crawlParallel(
      Array.from(urls),
      sink,
      this.concurrency,
      options,
    );

    const report: SiteCrawlReport = {
      base_url: baseUrl,
      output_dir: sink.outputDir,
      total: urls.size,
      stats,
      started_at: startedAt.toISOString(),
      finished_at: new Date().toISOString(),
    };
    await sink.writeStats(report);
    this.logger.log(
      `Crawl completed: ${stats.success}/${urls.size} pages crawled successfully`,
    );
    return report;
  }

  async loadCrawlOptions(): Promise<CrawlOptions> {
    return {
      waitUntil: WaitCondition.DOM_CONTENT_LOADED,
      pageTimeoutMs: SITE_CRAWL_PAGE_TIMEOUT_MS,
      schema: await this.loadSchema(this.schemaPath),
      filter: {
        type: 'pruning',
        threshold: SITE_CRAWL_PRUNING_THRESHOLD,
        minWordThreshold: this.pruningMinWords,
      },
    };
  }

  /** Null (crawl without structured extraction) when the file is unusable. */
  async loadSchema(path: string): Promise<ExtractionSchema | null> {
    try {
      const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
      const dto = plainToInstance(ExtractionSchemaDto, raw);
      const errors = validateSync(dto);
      if (errors.length > 0) {
        throw new ExtractionError(
          errors.flatMap((e) => Object.values(e.constraints ?? {})).join('; ') ||
            'invalid nested field',
        );
      }
      return toExtractionSchema(dto);
    } catch (error) {
      this.logger.warn(
        `Ignoring extraction schema ${path}: ${errorMessage(error)}`,
      );
      return null;
    }
  }
}
