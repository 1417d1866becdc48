import { Injectable } from '@nestjs/common';
import { PageRenderer } from './page-renderer';
import { ContentExtractionService } from '../../extraction/services/content-extraction.service';
import { CrawlOptions, CrawlOutcome } from '../types/crawl-result';
import { WaitCondition } from '../types/rendered-page';
import { PageTimeoutError } from '../../common/errors/crawl.errors';
import { withTimeout } from '../../common/utils/with-timeout';

/**
 * One render + extract operation. An unsuccessful render is returned as a
 * failed outcome; exceptions (timeouts included) propagate to the caller.
 */
@Injectable()
export class PageCrawlerService {
  constructor(
    private readonly renderer: PageRenderer,
    private readonly extractionService: ContentExtractionService,
  ) {}

  async crawl(
    url: string,
    options: CrawlOptions,
    sessionId: string,
  ): Promise<CrawlOutcome> {
    const start = Date.now();
    const page = await withTimeout(
      this.renderer.render(url, {
        // networkidle0 rarely settles on busy pages
        waitUntil:
          options.waitUntil === WaitCondition.NETWORK_IDLE_0
            ? WaitCondition.DOM_CONTENT_LOADED
            : options.waitUntil,
        timeoutMs: options.pageTimeoutMs,
        sessionId,
      }),
      options.pageTimeoutMs,
      () => new PageTimeoutError(url, options.pageTimeoutMs),
    );

    if (!page.success) {
      return {
        success: false,
        url,
        error: page.errorMessage ?? `Failed to render ${url}`,
      };
    }

    const content = this.extractionService.extract(page.html, {
      schema: options.schema,
      filter: options.filter,
    });

    return {
      success: true,
      result: {
        url,
        ...content,
        links: page.links,
        images: page.images,
        stats: {
          crawlTimeMs: Date.now() - start,
          pageSizeBytes: Buffer.byteLength(page.html),
        },
      },
    };
  }
}
