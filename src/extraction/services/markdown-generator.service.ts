import { Injectable } from '@nestjs/common';
import TurndownService from 'turndown';

@Injectable()
export class MarkdownGeneratorService {
  private readonly turndown = new TurndownService({
    headingStyle: 'atx',
    codeBlockStyle: 'fenced',
    bulletListMarker: '-',
    emDelimiter: '_',
  });

  toMarkdown(html: string): string {
    if (!html.trim()) {
      return '';
    }
    return this.turndown.turndown(html).trim();
  }
}
