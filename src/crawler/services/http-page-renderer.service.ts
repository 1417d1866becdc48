import { Injectable, Logger } from '@nestjs/common';
import { HttpFetchService } from './http-fetch.service';
import { LinkParserService } from './link-parser.service';
import { PageRenderer } from './page-renderer';
import { RenderOptions, RenderedPage } from '../types/rendered-page';

/**
 * Static renderer: the document as served, without script execution.
 * A complete response satisfies every wait condition, so `waitUntil` only
 * shows up in the log line.
 */
@Injectable()
export class HttpPageRenderer extends PageRenderer {
  private readonly logger = new Logger(HttpPageRenderer.name);

  constructor(
    private readonly httpFetchService: HttpFetchService,
    private readonly linkParserService: LinkParserService,
  ) {
    super();
  }

  async render(url: string, options: RenderOptions): Promise<RenderedPage> {
    this.logger.debug(
      `[${options.sessionId}] rendering ${url} (wait: ${options.waitUntil}, timeout: ${options.timeoutMs}ms)`,
    );
    const response = await this.httpFetchService.fetch(url, {
      timeoutMs: options.timeoutMs,
    });

    const page: RenderedPage = {
      url,
      finalUrl: response.finalUrl,
      html: '',
      statusCode: response.statusCode,
      success: false,
      errorMessage: null,
      links: { internal: [], external: [] },
      images: [],
    };

    if (response.statusCode < 200 || response.statusCode >= 300) {
      return { ...page, errorMessage: `HTTP ${response.statusCode} for ${url}` };
    }
    if (!/text\/html|application\/xhtml\+xml/i.test(response.contentType)) {
      return {
        ...page,
        errorMessage: `Unsupported content type "${response.contentType}" for ${url}`,
      };
    }

    return {
      ...page,
      html: response.body,
      success: true,
      links: this.linkParserService.extractLinks(response.body, response.finalUrl),
      images: this.linkParserService.extractImages(
        response.body,
        response.finalUrl,
      ),
    };
  }
}
