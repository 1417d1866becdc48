import { Injectable, Logger } from '@nestjs/common';
import type { Cheerio, CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import {
  ExtractedItem,
  ExtractedValue,
  ExtractionSchema,
  SchemaField,
} from '../types/extraction-schema';
import { ExtractionError, errorMessage } from '../../common/errors/crawl.errors';
import { normalizeWhitespace } from '../utils/text';

@Injectable()
export class SchemaExtractorService {
  private readonly logger = new Logger(SchemaExtractorService.name);

  /** Never throws: unmatched or invalid selectors fall back to field defaults. */
  extract($: CheerioAPI, schema: ExtractionSchema): ExtractedItem[] {
    const bases = this.select($.root(), schema.baseSelector);
    return bases
      .toArray()
      .map((element) => this.extractFields($, $(element), schema.fields));
  }

  private extractFields(
    $: CheerioAPI,
    scope: Cheerio<Element>,
    fields: SchemaField[],
  ): ExtractedItem {
    const item: ExtractedItem = {};
    for (const field of fields) {
      item[field.name] = this.extractField($, scope, field);
    }
    return item;
  }

  private extractField(
    $: CheerioAPI,
    scope: Cheerio<Element>,
    field: SchemaField,
  ): ExtractedValue {
    const matches = field.selector ? this.select(scope, field.selector) : scope;

    switch (field.type) {
      case 'list':
        return matches
          .toArray()
          .map((element) => this.extractFields($, $(element), field.fields));
      case 'text': {
        const first = matches.first();
        return first.length > 0
          ? normalizeWhitespace(first.text())
          : (field.default ?? '');
      }
      case 'html': {
        const first = matches.first();
        return first.length > 0 ? $.html(first) : (field.default ?? '');
      }
      case 'attribute':
        return matches.first().attr(field.attribute) ?? field.default ?? '';
    }
  }

  private select<T extends AnyNode>(
    scope: Cheerio<T>,
    selector: string,
  ): Cheerio<Element> {
    try {
      return scope.find(selector);
    } catch (error) {
      const failure = new ExtractionError(
        `Invalid selector "${selector}": ${errorMessage(error)}`,
        { cause: error },
      );
      this.logger.warn(failure.message);
      return scope.children().slice(0, 0);
    }
  }
}
