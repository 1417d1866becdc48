import { Test, TestingModule } from '@nestjs/testing';
import { LinkParserService } from '../link-parser.service';

describe('LinkParserService', () => {
  let service: LinkParserService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [LinkParserService],
    }).compile();

    service = module.get<LinkParserService>(LinkParserService);
  });

  it('should resolve links and split them by host', () => {
    const html = `
      <html>
        <body>
          <a href="/relative">Relative</a>
          <a href="https://example.com/absolute">  Absolute
            link </a>
          <a href="https://other.org/page">Elsewhere</a>
        </body>
      </html>
    `;
    const links = service.extractLinks(html, 'https://example.com');

    expect(links.internal).toEqual([
      { href: 'https://example.com/relative', text: 'Relative' },
      { href: 'https://example.com/absolute', text: 'Absolute link' },
    ]);
    expect(links.external).toEqual([
      { href: 'https://other.org/page', text: 'Elsewhere' },
    ]);
  });

  it('should filter invalid protocols and normalize fragments', () => {
    const html = `
      <html lang="">
        <body>
          <a href="mailto:test@test.com">Mail</a>
          <a href="javascript:void(0)">JS</a>
          <a href="/page#fragment">Fragment</a>
          <a href="/page#other">Same page</a>
        </body>
      </html>
    `;
    const links = service.extractLinks(html, 'https://example.com');

    expect(links.internal).toEqual([
      { href: 'https://example.com/page', text: 'Fragment' },
    ]);
    expect(links.external).toEqual([]);
  });

  it('should return empty groups for empty html', () => {
    expect(service.extractLinks('', 'https://example.com')).toEqual({
      internal: [],
      external: [],
    });
  });

  it('should collect images from src or data-src', () => {
    const html = `
      <img src="/a.png" alt="First">
      <img data-src="https://cdn.example.com/b.jpg">
      <img src="/a.png" alt="Duplicate">
      <img alt="No source">
    `;

    expect(service.extractImages(html, 'https://example.com/post')).toEqual([
      { src: 'https://example.com/a.png', alt: 'First' },
      { src: 'https://cdn.example.com/b.jpg', alt: '' },
    ]);
  });
});
