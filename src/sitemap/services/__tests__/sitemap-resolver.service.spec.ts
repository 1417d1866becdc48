import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import {
  SITEMAP_NAMESPACE,
  SitemapResolverService,
} from '../sitemap-resolver.service';
import {
  FetchResult,
  HttpFetchService,
} from '../../../crawler/services/http-fetch.service';
import {
  NetworkError,
  SitemapParseError,
} from '../../../common/errors/crawl.errors';

const urlset = (...locs: string[]) =>
  `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="${SITEMAP_NAMESPACE}">
${locs.map((loc) => `  <url><loc>${loc}</loc></url>`).join('\n')}
</urlset>`;

const sitemapIndex = (...locs: string[]) =>
  `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="${SITEMAP_NAMESPACE}">
${locs.map((loc) => `  <sitemap><loc>${loc}</loc></sitemap>`).join('\n')}
</sitemapindex>`;

describe('SitemapResolverService', () => {
  let service: SitemapResolverService;
  let documents: Map<string, string>;
  let fetch: jest.Mock<Promise<FetchResult>, [string]>;
  let keepMixedLeaves: boolean;

  const build = async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        SitemapResolverService,
        { provide: HttpFetchService, useValue: { fetch } },
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string, defaultValue: unknown) =>
              key === 'SITEMAP_KEEP_MIXED_LEAVES' ? keepMixedLeaves : defaultValue,
            ),
          },
        },
      ],
    }).compile();
    service = module.get<SitemapResolverService>(SitemapResolverService);
  };

  beforeEach(async () => {
    documents = new Map();
    keepMixedLeaves = false;
    fetch = jest.fn<Promise<FetchResult>, [string]>(async (url) => {
      const body = documents.get(url);
      return {
        statusCode: body === undefined ? 404 : 200,
        contentType: 'application/xml',
        body: body ?? 'Not Found',
        durationMs: 1,
        finalUrl: url,
      };
    });
    await build();
  });

  it('should return the URLs of a flat sitemap', async () => {
    documents.set(
      'https://example.com/sitemap.xml',
      urlset('https://example.com/a', 'https://example.com/b'),
    );

    const urls = await service.discover('https://example.com');

    expect(Array.from(urls)).toEqual([
      'https://example.com/a',
      'https://example.com/b',
    ]);
    expect(fetch).toHaveBeenCalledTimes(1);
  });

  it('should union the leaves of an index and dedupe them', async () => {
    documents.set(
      'https://example.com/sitemap.xml',
      sitemapIndex(
        'https://example.com/posts.xml',
        'https://example.com/pages.xml',
      ),
    );
    documents.set(
      'https://example.com/posts.xml',
      urlset(
        'https://example.com/1',
        'https://example.com/2',
        'https://example.com/3',
      ),
    );
    documents.set(
      'https://example.com/pages.xml',
      urlset(
        'https://example.com/3',
        'https://example.com/4',
        'https://example.com/5',
      ),
    );

    const urls = await service.discover('https://example.com');

    expect(urls).toEqual(
      new Set([1, 2, 3, 4, 5].map((n) => `https://example.com/${n}`)),
    );
  });

  it('should skip a failing sub-sitemap and keep the others', async () => {
    documents.set(
      'https://example.com/sitemap.xml',
      sitemapIndex(
        'https://example.com/broken.xml',
        'https://example.com/pages.xml',
      ),
    );
    documents.set('https://example.com/broken.xml', '<urlset><url>');
    documents.set(
      'https://example.com/pages.xml',
      urlset('https://example.com/about'),
    );

    await expect(service.discover('https://example.com')).resolves.toEqual(
      new Set(['https://example.com/about']),
    );
  });

  it('should drop non-sitemap entries of an index unless configured', async () => {
    documents.set(
      'https://example.com/sitemap.xml',
      urlset('https://example.com/home', 'https://example.com/posts.xml'),
    );
    documents.set(
      'https://example.com/posts.xml',
      urlset('https://example.com/post-1'),
    );

    await expect(service.discover('https://example.com')).resolves.toEqual(
      new Set(['https://example.com/post-1']),
    );

    keepMixedLeaves = true;
    await build();
    await expect(service.discover('https://example.com')).resolves.toEqual(
      new Set(['https://example.com/home', 'https://example.com/post-1']),
    );
  });

  it('should fall back to the next candidate location', async () => {
    documents.set(
      'https://example.com/sitemap_index.xml',
      urlset('https://example.com/only'),
    );

    const urls = await service.discover('https://example.com/blog/');

    expect(urls).toEqual(new Set(['https://example.com/only']));
    expect(fetch.mock.calls.map(([url]) => url)).toEqual([
      'https://example.com/sitemap.xml',
      'https://example.com/sitemap_index.xml',
    ]);
  });

  it('should return an empty set when no candidate yields URLs', async () => {
    fetch.mockRejectedValueOnce(new NetworkError('connection refused'));

    await expect(service.discover('https://example.com')).resolves.toEqual(
      new Set(),
    );
    expect(fetch).toHaveBeenCalledTimes(4);
  });

  it('should return an empty set for a malformed base url', async () => {
    await expect(service.discover('not a url')).resolves.toEqual(new Set());
    expect(fetch).not.toHaveBeenCalled();
  });

  it('should not revisit sitemaps that reference each other', async () => {
    documents.set(
      'https://example.com/sitemap.xml',
      sitemapIndex('https://example.com/a.xml'),
    );
    documents.set(
      'https://example.com/a.xml',
      sitemapIndex('https://example.com/sitemap.xml'),
    );

    await service.discover('https://example.com');

    const fetched = fetch.mock.calls.map(([url]) => url);
    expect(
      fetched.filter((url) => url === 'https://example.com/a.xml'),
    ).toHaveLength(1);
  });

  describe('parseLocs', () => {
    it('should only read loc elements in the sitemap namespace', () => {
      const xml = `<?xml version="1.0"?>
<urlset xmlns="http://example.com/not-a-sitemap">
  <url><loc>https://example.com/ignored</loc></url>
</urlset>`;

      expect(service.parseLocs(xml, 'test')).toEqual([]);
    });

    it('should resolve prefixed namespaces', () => {
      const xml = `<sm:urlset xmlns:sm="${SITEMAP_NAMESPACE}">
  <sm:url><sm:loc> https://example.com/prefixed </sm:loc></sm:url>
</sm:urlset>`;

      expect(service.parseLocs(xml, 'test')).toEqual([
        'https://example.com/prefixed',
      ]);
    });

    it('should reject malformed documents', () => {
      expect(() => service.parseLocs('<urlset><url>', 'broken.xml')).toThrow(
        SitemapParseError,
      );
    });
  });
});
