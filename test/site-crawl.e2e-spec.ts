import { Test, TestingModule } from '@nestjs/testing';
import { HttpService } from '@nestjs/axios';
import { of } from 'rxjs';
import { AxiosHeaders, AxiosResponse } from 'axios';
import { rm } from 'fs/promises';
import { join } from 'path';
import { SiteCrawlModule } from '../src/site-crawl.module';
import { SiteCrawlService } from '../src/batch/services/site-crawl.service';
import { readRecords } from '../src/batch/services/result-sink.service';
import { SITEMAP_NAMESPACE } from '../src/sitemap/services/sitemap-resolver.service';

const urlset = (...locs: string[]) =>
  `<urlset xmlns="${SITEMAP_NAMESPACE}">${locs
    .map((loc) => `<url><loc>${loc}</loc></url>`)
    .join('')}</urlset>`;

const article = (title: string) =>
  `<html><body><article><h1>${title}</h1>` +
  `<div class="entry-content"><p>Notes about ${title}.</p></div>` +
  `<span class="cat-links"><a href="/c/notes">Notes</a></span>` +
  `</article></body></html>`;

const DOCUMENTS: Record<string, string> = {
  'https://blog.test/sitemap.xml': `<sitemapindex xmlns="${SITEMAP_NAMESPACE}">
    <sitemap><loc>https://blog.test/post-sitemap.xml</loc></sitemap>
    <sitemap><loc>https://blog.test/page-sitemap.xml</loc></sitemap>
  </sitemapindex>`,
  'https://blog.test/post-sitemap.xml': urlset(
    'https://blog.test/one',
    'https://blog.test/two',
    'https://blog.test/three',
  ),
  'https://blog.test/page-sitemap.xml': urlset(
    'https://blog.test/three',
    'https://blog.test/about',
    'https://blog.test/broken',
  ),
  'https://blog.test/one': article('One'),
  'https://blog.test/two': article('Two'),
  'https://blog.test/three': article('Three'),
  'https://blog.test/about': article('About'),
};

describe('Site crawl (e2e)', () => {
  let moduleFixture: TestingModule;

  beforeAll(async () => {
    moduleFixture = await Test.createTestingModule({
      imports: [SiteCrawlModule],
    })
      .overrideProvider(HttpService)
      .useValue({
        get: jest.fn((url: string) => {
          const body = DOCUMENTS[url];
          const response: AxiosResponse<string> = {
            data: body ?? 'Server Error',
            status: body === undefined ? 500 : 200,
            statusText: body === undefined ? 'Internal Server Error' : 'OK',
            headers: {
              'content-type': url.endsWith('.xml')
                ? 'application/xml'
                : 'text/html',
            },
            config: { headers: new AxiosHeaders() },
            request: { res: { responseUrl: url } },
          };
          return of(response);
        }),
      })
      .compile();
  });

  afterAll(async () => {
    await moduleFixture.close();
    await rm(process.env.OUTPUT_DIR ?? '', { recursive: true, force: true });
  });

  it('should crawl every unique sitemap url into the run logs', async () => {
    const report = await moduleFixture
      .get<SiteCrawlService>(SiteCrawlService)
      .run('https://blog.test');

    expect(report).not.toBeNull();
    if (!report) return;
    expect(report.total).toBe(5);
    expect(report.stats).toEqual({
      success: 4,
      failed: 1,
      timeout: 0,
      error: 0,
    });

    const results = (await readRecords(
      join(report.output_dir, 'results.jsonl'),
    )) as Array<{ url: string; content: { title: string } }>;
    expect(
      results.map((record) => [record.url, record.content.title]).sort(),
    ).toEqual([
      ['https://blog.test/about', 'About'],
      ['https://blog.test/one', 'One'],
      ['https://blog.test/three', 'Three'],
      ['https://blog.test/two', 'Two'],
    ]);

    const errors = await readRecords(join(report.output_dir, 'errors.jsonl'));
    expect(errors).toEqual([
      expect.objectContaining({
        url: 'https://blog.test/broken',
        outcome: 'failed',
        error: 'HTTP 500 for https://blog.test/broken',
      }),
    ]);
  });
});
