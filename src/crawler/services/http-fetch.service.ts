import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { ConfigService } from '@nestjs/config';
import { firstValueFrom } from 'rxjs';
import { isAxiosError } from 'axios';
import {
  FetchTimeoutError,
  NetworkError,
  errorMessage,
} from '../../common/errors/crawl.errors';

export interface FetchResult {
  statusCode: number;
  contentType: string;
  body: string;
  durationMs: number;
  finalUrl: string;
}

export interface FetchOptions {
  timeoutMs?: number;
}

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (compatible; page-harvest/1.0)';

@Injectable()
export class HttpFetchService {
  private readonly logger = new Logger(HttpFetchService.name);
  private readonly timeout: number;
  private readonly userAgent: string;

  constructor(
    private readonly httpService: HttpService,
    private readonly configService: ConfigService,
  ) {
    this.timeout = this.configService.get<number>('HTTP_TIMEOUT_MS', 10000);
    this.userAgent = this.configService.get<string>(
      'USER_AGENT',
      DEFAULT_USER_AGENT,
    );
  }

  /**
   * GETs `url` as text. Any HTTP status resolves; transport failures reject
   * with a NetworkError (FetchTimeoutError when the timeout elapsed).
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const start = Date.now();
    const timeout = options.timeoutMs ?? this.timeout;
    try {
      const response = await firstValueFrom(
        this.httpService.get<string>(url, {
          timeout,
          maxRedirects: 4,
          responseType: 'text',
          validateStatus: () => true,
          headers: {
            'User-Agent': this.userAgent,
          },
        }),
      );

      const headers = response.headers as Record<
        string,
        string | string[] | undefined
      >;
      const contentTypeHeader =
        headers['content-type'] ?? headers['Content-Type'] ?? '';
      const contentType = Array.isArray(contentTypeHeader)
        ? contentTypeHeader.join(', ')
        : contentTypeHeader;
      const finalUrl =
        (response.request as { res?: { responseUrl?: string } } | undefined)
          ?.res?.responseUrl ?? url;

      return {
        statusCode: response.status,
        contentType,
        body: typeof response.data === 'string' ? response.data : '',
        durationMs: Date.now() - start,
        finalUrl,
      };
    } catch (error) {
      const durationMs = Date.now() - start;
      this.logger.error(
        `Failed to fetch ${url} after ${durationMs}ms: ${errorMessage(error)}`,
      );

      if (
        isAxiosError(error) &&
        (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')
      ) {
        throw new FetchTimeoutError(url, timeout, { cause: error });
      }
      throw new NetworkError(`Failed to fetch ${url}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }
}
