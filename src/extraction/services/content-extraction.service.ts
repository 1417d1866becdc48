import { Injectable, Logger } from '@nestjs/common';
import * as cheerio from 'cheerio';
import { isComment } from 'domhandler';
import { ExtractedItem, ExtractionSchema } from '../types/extraction-schema';
import { ContentFilterConfig } from '../types/content-filter-config';
import { collectBlocks, ContentFilter } from '../filters/content-blocks';
import { PruningContentFilter } from '../filters/pruning-content.filter';
import { Bm25ContentFilter } from '../filters/bm25-content.filter';
import { SchemaExtractorService } from './schema-extractor.service';
import { MarkdownGeneratorService } from './markdown-generator.service';
import { ExtractionError } from '../../common/errors/crawl.errors';
import { countWords } from '../utils/text';

const NON_CONTENT_TAGS = [
  'script',
  'style',
  'noscript',
  'template',
  'iframe',
  'svg',
  'canvas',
  'object',
  'embed',
];

export interface ExtractionOptions {
  schema: ExtractionSchema | null;
  filter: ContentFilterConfig;
}

export interface ExtractedContent {
  rawMarkdown: string;
  fitMarkdown: string;
  /** Null when no schema was supplied. */
  extracted: ExtractedItem[] | null;
  wordCount: number;
}

/**
 * Turns rendered HTML into schema fields plus raw and fit markdown.
 * Output depends only on the HTML and the options.
 */
@Injectable()
export class ContentExtractionService {
  private readonly logger = new Logger(ContentExtractionService.name);

  constructor(
    private readonly schemaExtractor: SchemaExtractorService,
    private readonly markdownGenerator: MarkdownGeneratorService,
  ) {}

  extract(html: string, options: ExtractionOptions): ExtractedContent {
    const $ = cheerio.load(html);

    const extracted = options.schema
      ? this.schemaExtractor.extract($, options.schema)
      : null;

    $(NON_CONTENT_TAGS.join(',')).remove();
    $('*')
      .contents()
      .filter((_, node) => isComment(node))
      .remove();

    const body = $('body');
    const rawMarkdown = this.markdownGenerator.toMarkdown(body.html() ?? '');

    let fitMarkdown = rawMarkdown;
    const filter = this.createFilter(options.filter);
    const root = body.get(0);
    if (filter && root) {
      const blocks = collectBlocks($, root);
      const kept = filter.selectBlocks(blocks);
      for (const block of blocks) {
        if (!kept.has(block.index)) {
          $(block.element).remove();
        }
      }
      fitMarkdown = this.markdownGenerator.toMarkdown(body.html() ?? '');
    }

    return {
      rawMarkdown,
      fitMarkdown,
      extracted,
      wordCount: countWords(rawMarkdown),
    };
  }

  /** Null means fit markdown is the unfiltered markdown. */
  createFilter(config: ContentFilterConfig): ContentFilter | null {
    switch (config.type) {
      case 'none':
        return null;
      case 'pruning':
        if (!Number.isFinite(config.threshold) || config.threshold < 0) {
          this.recover(`Invalid pruning threshold ${config.threshold}`);
          return null;
        }
        return new PruningContentFilter({
          threshold: config.threshold,
          minWordThreshold: config.minWordThreshold,
        });
      case 'bm25': {
        if (!config.query?.trim()) {
          return null;
        }
        const filter = new Bm25ContentFilter({
          query: config.query,
          threshold: config.threshold,
        });
        if (!filter.hasQueryTerms) {
          this.recover(`BM25 query "${config.query}" has no searchable terms`);
          return null;
        }
        return filter;
      }
    }
  }

  private recover(reason: string): void {
    const error = new ExtractionError(reason);
    this.logger.warn(`${error.message}; using unfiltered markdown`);
  }
}
