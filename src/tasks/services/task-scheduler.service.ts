import {
  Injectable,
  Logger,
  OnModuleDestroy,
  OnModuleInit,
  ServiceUnavailableException,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TaskStoreService } from './task-store.service';
import { PriorityJobQueue } from './priority-job-queue';
import { PageCrawlerService } from '../../crawler/services/page-crawler.service';
import { CrawlOptions } from '../../crawler/types/crawl-result';
import { ContentFilterConfig } from '../../extraction/types/content-filter-config';
import { toExtractionSchema } from '../../extraction/dto/extraction-schema.dto';
import { ContentFilterKind, CrawlRequestDto } from '../dto/crawl-request.dto';
import { TaskStatusDto, toCrawlResultDto } from '../dto/task-status.dto';
import { UnsupportedFeatureException } from '../task.exceptions';
import { errorMessage } from '../../common/errors/crawl.errors';

export const MIN_PAGE_TIMEOUT_MS = 1000;
export const MAX_PAGE_TIMEOUT_MS = 30000;

interface CrawlJob {
  taskId: string;
  url: string;
  options: CrawlOptions;
}

/**
 * Accepts crawl requests and runs them on at most MAX_CONCURRENT_TASKS
 * workers. Workers start on demand, drain the priority queue and exit when
 * it is empty; the queue itself is unbounded.
 */
@Injectable()
export class TaskSchedulerService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(TaskSchedulerService.name);
  private readonly maxConcurrent: number;
  private readonly pruningMinWords: number;
  private readonly queue = new PriorityJobQueue<CrawlJob>();
  private readonly workers = new Set<Promise<void>>();
  private running = 0;
  private accepting = true;

  constructor(
    private readonly configService: ConfigService,
    private readonly taskStore: TaskStoreService,
    private readonly pageCrawler: PageCrawlerService,
  ) {
    this.maxConcurrent = this.configService.get<number>(
      'MAX_CONCURRENT_TASKS',
      5,
    );
    this.pruningMinWords = this.configService.get<number>(
      'PRUNING_MIN_WORD_THRESHOLD',
      50,
    );
  }

  get maxConcurrentTasks(): number {
    return this.maxConcurrent;
  }

  /** Tasks currently being crawled. */
  get activeCount(): number {
    return this.running;
  }

  get queuedCount(): number {
    return this.queue.size;
  }

  onModuleInit() {
    this.logger.log(
      `Task scheduler initialized with ${this.maxConcurrent} workers`,
    );
  }

  async onModuleDestroy() {
    this.accepting = false;
    const dropped = this.queue.clear();
    if (dropped > 0) {
      this.logger.warn(`Dropping ${dropped} queued tasks on shutdown`);
    }
    const pending = Array.from(this.workers);
    if (pending.length > 0) {
      this.logger.log(`Waiting for ${pending.length} workers to finish...`);
      await Promise.allSettled(pending);
    }
  }

  async submit(request: CrawlRequestDto): Promise<string> {
    if (request.use_llm) {
      throw new UnsupportedFeatureException('LLM');
    }
    if (!this.accepting) {
      throw new ServiceUnavailableException('Scheduler is shutting down');
    }

    const [url] = request.urls;
    const options = this.toCrawlOptions(request);
    const task = await this.taskStore.create(url, request.priority);

    this.queue.push({ taskId: task.id, url, options }, request.priority);
    this.logger.log(
      `Queued task ${task.id} for ${url} (priority ${request.priority}, ${this.queue.size} queued)`,
    );
    if (this.workers.size < this.maxConcurrent) {
      this.startWorker();
    }
    return task.id;
  }

  getStatus(taskId: string): Promise<TaskStatusDto> {
    return this.taskStore.get(taskId);
  }

  toCrawlOptions(request: CrawlRequestDto): CrawlOptions {
    return {
      waitUntil: request.wait_for,
      pageTimeoutMs: Math.min(
        Math.max(request.page_timeout, MIN_PAGE_TIMEOUT_MS),
        MAX_PAGE_TIMEOUT_MS,
      ),
      schema:
        request.extract_json && request.custom_schema
          ? toExtractionSchema(request.custom_schema)
          : null,
      filter: this.toFilterConfig(request),
    };
  }

  private toFilterConfig(request: CrawlRequestDto): ContentFilterConfig {
    switch (request.content_filter) {
      case ContentFilterKind.PRUNING:
        return {
          type: 'pruning',
          threshold: request.filter_threshold,
          minWordThreshold: this.pruningMinWords,
        };
      case ContentFilterKind.BM25:
        return {
          type: 'bm25',
          query: request.search_query,
          threshold: request.filter_threshold,
        };
      case ContentFilterKind.NONE:
        return { type: 'none' };
    }
  }

  private startWorker(): void {
    const worker: Promise<void> = this.drainQueue().finally(() => {
      this.workers.delete(worker);
      // a job may have been queued while this worker was winding down
      if (this.accepting && this.queue.size > 0) {
        this.startWorker();
      }
    });
    this.workers.add(worker);
  }

  private async drainQueue(): Promise<void> {
    for (
      let job = this.queue.shift();
      job && this.accepting;
      job = this.queue.shift()
    ) {
      await this.runJob(job);
    }
  }

  private async runJob(job: CrawlJob): Promise<void> {
    this.running += 1;
    try {
      if (!(await this.taskStore.markRunning(job.taskId))) {
        return;
      }
      this.logger.log(
        `Starting crawl for ${job.url} with wait condition: ${job.options.waitUntil}, timeout: ${job.options.pageTimeoutMs}ms`,
      );

      const outcome = await this.pageCrawler.crawl(
        job.url,
        job.options,
        job.taskId,
      );
      if (outcome.success) {
        await this.taskStore.complete(
          job.taskId,
          toCrawlResultDto(outcome.result),
        );
        this.logger.log(`Successfully crawled ${job.url}`);
      } else {
        this.logger.error(`Failed to crawl ${job.url}: ${outcome.error}`);
        await this.taskStore.fail(job.taskId, outcome.error);
      }
    } catch (error) {
      this.logger.error(`Error processing crawl task ${job.taskId}`, error);
      await this.taskStore
        .fail(job.taskId, errorMessage(error))
        .catch((failError: unknown) => {
          this.logger.error(
            `Failed to mark task ${job.taskId} as failed`,
            failError,
          );
        });
    } finally {
      this.running -= 1;
    }
  }
}
