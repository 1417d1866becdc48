import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { XMLParser, XMLValidator } from 'fast-xml-parser';
import pLimit from 'p-limit';
import { HttpFetchService } from '../../crawler/services/http-fetch.service';
import {
  NetworkError,
  SitemapParseError,
  errorMessage,
} from '../../common/errors/crawl.errors';

export const SITEMAP_NAMESPACE = 'http://www.sitemaps.org/schemas/sitemap/0.9';

export const SITEMAP_CANDIDATE_PATHS = [
  '/sitemap.xml',
  '/sitemap_index.xml',
  '/sitemap/sitemap.xml',
  '/wp-sitemap.xml',
];

const MAX_INDEX_DEPTH = 3;

type NamespaceScope = ReadonlyMap<string, string>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

@Injectable()
export class SitemapResolverService {
  private readonly logger = new Logger(SitemapResolverService.name);
  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });
  private readonly keepMixedLeaves: boolean;
  private readonly fetchConcurrency: number;

  constructor(
    private readonly httpFetchService: HttpFetchService,
    private readonly configService: ConfigService,
  ) {
    this.keepMixedLeaves = this.configService.get<boolean>(
      'SITEMAP_KEEP_MIXED_LEAVES',
      false,
    );
    this.fetchConcurrency = this.configService.get<number>(
      'SITEMAP_FETCH_CONCURRENCY',
      4,
    );
  }

  /**
   * Tries the conventional sitemap locations in order and returns the URLs
   * of the first one that yields any. Candidate failures are logged and
   * skipped; an empty set means nothing was found.
   */
  async discover(baseUrl: string): Promise<Set<string>> {
    if (!URL.canParse(baseUrl)) {
      this.logger.warn(`Invalid base URL "${baseUrl}"; nothing to discover`);
      return new Set();
    }

    for (const path of SITEMAP_CANDIDATE_PATHS) {
      const sitemapUrl = new URL(path, baseUrl).toString();
      try {
        const urls = await this.resolveSitemap(sitemapUrl, 0, new Set());
        if (urls.size > 0) {
          this.logger.log(`Found ${urls.size} URLs in ${sitemapUrl}`);
          return urls;
        }
      } catch (error) {
        this.logger.warn(
          `Error fetching sitemap ${sitemapUrl}: ${errorMessage(error)}`,
        );
      }
    }

    this.logger.warn(`No sitemap URLs found for ${baseUrl}`);
    return new Set();
  }

  /**
   * A sitemap with any `.xml` entry is an index: its `.xml` entries are
   * resolved recursively and their leaves unioned. Other entries of an
   * index are dropped unless SITEMAP_KEEP_MIXED_LEAVES is set.
   */
  private async resolveSitemap(
    sitemapUrl: string,
    depth: number,
    visited: Set<string>,
  ): Promise<Set<string>> {
    visited.add(sitemapUrl);
    const locs = await this.fetchLocs(sitemapUrl);
    const children = locs.filter((loc) => loc.endsWith('.xml'));

    if (children.length === 0) {
      return new Set(locs);
    }

    const urls = new Set<string>(
      this.keepMixedLeaves ? locs.filter((loc) => !loc.endsWith('.xml')) : [],
    );
    if (depth >= MAX_INDEX_DEPTH) {
      this.logger.warn(
        `Sitemap index depth limit reached at ${sitemapUrl}; skipping ${children.length} nested sitemaps`,
      );
      return urls;
    }

    const limit = pLimit(this.fetchConcurrency);
    const pending = children.filter((child) => !visited.has(child));
    pending.forEach((child) => visited.add(child));

    const results = await Promise.all(
      pending.map((child) =>
        limit(async () => {
          try {
            return await this.resolveSitemap(child, depth + 1, visited);
          } catch (error) {
            this.logger.warn(
              `Error fetching sub-sitemap ${child}: ${errorMessage(error)}`,
            );
            return new Set<string>();
          }
        }),
      ),
    );

    for (const childUrls of results) {
      childUrls.forEach((url) => urls.add(url));
    }
    return urls;
  }

  private async fetchLocs(sitemapUrl: string): Promise<string[]> {
    const response = await this.httpFetchService.fetch(sitemapUrl);
    if (response.statusCode < 200 || response.statusCode >= 300) {
      throw new NetworkError(`HTTP ${response.statusCode} for ${sitemapUrl}`);
    }
    return this.parseLocs(response.body, sitemapUrl);
  }

  /** `loc` values in the sitemap namespace, in document order. */
  parseLocs(xml: string, source: string): string[] {
    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new SitemapParseError(
        `Malformed sitemap ${source}: ${validation.err.msg} (line ${validation.err.line})`,
      );
    }

    const parsed: unknown = this.parser.parse(xml);
    const locs: string[] = [];
    this.collectLocs(parsed, new Map(), locs);
    return locs;
  }

  private collectLocs(
    node: unknown,
    scope: NamespaceScope,
    out: string[],
  ): void {
    if (!isRecord(node)) {
      return;
    }

    for (const [key, value] of Object.entries(node)) {
      if (key.startsWith('@_') || key === '#text' || key.startsWith('?')) {
        continue;
      }
      const elements = Array.isArray(value) ? value : [value];
      for (const element of elements) {
        const elementScope = this.extendScope(scope, element);
        const [prefix, localName] = key.includes(':')
          ? key.split(':', 2)
          : ['', key];

        if (
          localName === 'loc' &&
          elementScope.get(prefix) === SITEMAP_NAMESPACE
        ) {
          const text = this.textOf(element);
          if (text) {
            out.push(text);
          }
          continue;
        }
        this.collectLocs(element, elementScope, out);
      }
    }
  }

  private extendScope(scope: NamespaceScope, element: unknown): NamespaceScope {
    if (!isRecord(element)) {
      return scope;
    }
    let extended: Map<string, string> | null = null;
    for (const [key, value] of Object.entries(element)) {
      if (typeof value !== 'string') continue;
      if (key === '@_xmlns') {
        extended ??= new Map(scope);
        extended.set('', value);
      } else if (key.startsWith('@_xmlns:')) {
        extended ??= new Map(scope);
        extended.set(key.slice('@_xmlns:'.length), value);
      }
    }
    return extended ?? scope;
  }

  private textOf(element: unknown): string {
    if (typeof element === 'string') {
      return element.trim();
    }
    if (isRecord(element) && typeof element['#text'] === 'string') {
      return element['#text'].trim();
    }
    return '';
  }
}
