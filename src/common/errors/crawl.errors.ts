export class CrawlError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Transport-level failure while retrieving a sitemap or a page. */
export class NetworkError extends CrawlError {}

export class FetchTimeoutError extends NetworkError {
  constructor(url: string, timeoutMs: number, options?: { cause?: unknown }) {
    super(`Request timeout of ${timeoutMs}ms exceeded for ${url}`, options);
  }
}

export class PageTimeoutError extends CrawlError {
  constructor(
    readonly url: string,
    readonly timeoutMs: number,
  ) {
    super(`Page timeout of ${timeoutMs}ms exceeded for ${url}`);
  }
}

export class SitemapParseError extends CrawlError {}

/** Misconfigured schema or filter; always recovered with defaults. */
export class ExtractionError extends CrawlError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
