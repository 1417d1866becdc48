import { Injectable } from '@nestjs/common';
import * as cheerio from 'cheerio';
import * as urlParser from 'url';
import { LinkRef, PageImage, PageLinks } from '../types/rendered-page';

@Injectable()
export class LinkParserService {
  extractLinks(html: string, baseUrl: string): PageLinks {
    const links: PageLinks = { internal: [], external: [] };
    if (!html) {
      return links;
    }

    const $ = cheerio.load(html);
    const seen = new Set<string>();
    const baseHost = this.hostOf(baseUrl);

    $('a').each((_, element) => {
      const href = $(element).attr('href');
      if (!href) return;

      const absoluteUrl = this.resolve(href, baseUrl);
      if (!absoluteUrl || seen.has(absoluteUrl)) return;
      seen.add(absoluteUrl);

      const link: LinkRef = {
        href: absoluteUrl,
        text: $(element).text().replace(/\s+/g, ' ').trim(),
      };
      if (this.hostOf(absoluteUrl) === baseHost) {
        links.internal.push(link);
      } else {
        links.external.push(link);
      }
    });

    return links;
  }

  extractImages(html: string, baseUrl: string): PageImage[] {
    if (!html) {
      return [];
    }

    const $ = cheerio.load(html);
    const images: PageImage[] = [];
    const seen = new Set<string>();

    $('img').each((_, element) => {
      const src = $(element).attr('src') ?? $(element).attr('data-src');
      if (!src) return;

      const absoluteUrl = this.resolve(src, baseUrl);
      if (!absoluteUrl || seen.has(absoluteUrl)) return;
      seen.add(absoluteUrl);
      images.push({ src: absoluteUrl, alt: $(element).attr('alt') ?? '' });
    });

    return images;
  }

  /** Absolute http(s) URL without fragment, or null. */
  private resolve(href: string, baseUrl: string): string | null {
    try {
      const parsedUrl = new urlParser.URL(href, baseUrl);
      parsedUrl.hash = '';
      return ['http:', 'https:'].includes(parsedUrl.protocol)
        ? parsedUrl.toString()
        : null;
    } catch {
      // Ignore invalid URLs
      return null;
    }
  }

  private hostOf(url: string): string | null {
    try {
      return new urlParser.URL(url).host;
    } catch {
      return null;
    }
  }
}
