import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { setTimeout as sleep } from 'timers/promises';
import { PageCrawlerService } from '../../crawler/services/page-crawler.service';
import {
  CrawlOptions,
  CrawlOutcome,
  CrawlResult,
} from '../../crawler/types/crawl-result';
import { ResultSink } from './result-sink.service';
import { CrawlFailure } from '../types/result-records';
import {
  BatchStats,
  ItemOutcome,
  addStats,
  emptyStats,
} from '../types/batch-stats';
import { errorMessage } from '../../common/errors/crawl.errors';

export function classifyOutcome(
  settled: PromiseSettledResult<CrawlOutcome>,
): ItemOutcome {
  if (settled.status === 'rejected') {
    return /timeout/i.test(errorMessage(settled.reason)) ? 'timeout' : 'error';
  }
  return settled.value.success ? 'success' : 'failed';
}

@Injectable()
export class BatchCrawlCoordinator {
  private readonly logger = new Logger(BatchCrawlCoordinator.name);
  private readonly batchDelayMs: number;

  constructor(
    private readonly pageCrawler: PageCrawlerService,
    private readonly configService: ConfigService,
  ) {
    this.batchDelayMs = this.configService.get<number>('BATCH_DELAY_MS', 1000);
  }

  /**
   * Crawls `urls` in consecutive batches of `maxConcurrent`. Each batch is
   * fully settled and flushed to `sink` before the next one starts, with a
   * cool-down of BATCH_DELAY_MS in between.
   */
  async crawlParallel(
    urls: string[],
    sink: ResultSink,
    maxConcurrent: number,
    options: CrawlOptions,
  ): Promise<BatchStats> {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(
        `maxConcurrent must be a positive integer, got ${maxConcurrent}`,
      );
    }
    this.logger.log(`Starting parallel crawl of ${urls.length} URLs`);

    let stats = emptyStats();
    for (let start = 0; start < urls.length; start += maxConcurrent) {
      const batch = urls.slice(start, start + maxConcurrent);
      const settled = await Promise.allSettled(
        batch.map((url, offset) =>
          this.pageCrawler.crawl(url, options, `session_${start + offset}`),
        ),
      );

      const batchStats = emptyStats();
      const results: CrawlResult[] = [];
      const failures: CrawlFailure[] = [];

      settled.forEach((outcome, offset) => {
        const url = batch[offset];
        const kind = classifyOutcome(outcome);
        batchStats[kind] += 1;

        if (outcome.status === 'rejected') {
          this.logger.error(
            `Error crawling ${url}: ${errorMessage(outcome.reason)}`,
          );
          failures.push({
            url,
            outcome: kind === 'timeout' ? 'timeout' : 'error',
            error: errorMessage(outcome.reason),
          });
        } else if (outcome.value.success) {
          results.push(outcome.value.result);
        } else {
          this.logger.warn(`Failed to crawl ${url}: ${outcome.value.error}`);
          failures.push({ url, outcome: 'failed', error: outcome.value.error });
        }
      });

      await this.flush(sink, { results, failures });
      stats = addStats(stats, batchStats);
      this.logger.log(
        `Batch ${start / maxConcurrent + 1}/${Math.ceil(urls.length / maxConcurrent)} done: ` +
          `${stats.success}/${urls.length} crawled successfully so far`,
      );

      if (start + maxConcurrent < urls.length && this.batchDelayMs > 0) {
        await sleep(this.batchDelayMs);
      }
    }

    return stats;
  }

  private async flush(
    sink: ResultSink,
    batch: { results: CrawlResult[]; failures: CrawlFailure[] },
  ): Promise<void> {
    try {
      const summary = await sink.flush(batch);
      if (summary.failed > 0) {
        this.logger.warn(`${summary.failed} records could not be persisted`);
      }
    } catch (error) {
      this.logger.error('Failed to persist batch results', error);
    }
  }
}
