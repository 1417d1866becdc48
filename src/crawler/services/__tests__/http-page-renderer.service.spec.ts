import { Test, TestingModule } from '@nestjs/testing';
import { HttpPageRenderer } from '../http-page-renderer.service';
import { FetchResult, HttpFetchService } from '../http-fetch.service';
import { LinkParserService } from '../link-parser.service';
import { WaitCondition } from '../../types/rendered-page';

describe('HttpPageRenderer', () => {
  let renderer: HttpPageRenderer;
  let fetch: jest.Mock<Promise<FetchResult>, [string, { timeoutMs?: number }]>;

  const renderOptions = {
    waitUntil: WaitCondition.LOAD,
    timeoutMs: 5000,
    sessionId: 'session_0',
  };

  const response = (overrides: Partial<FetchResult>): FetchResult => ({
    statusCode: 200,
    contentType: 'text/html; charset=utf-8',
    body: '<a href="/next">Next</a><img src="/logo.png" alt="Logo">',
    durationMs: 3,
    finalUrl: 'https://example.com/start',
    ...overrides,
  });

  beforeEach(async () => {
    fetch = jest.fn();
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        HttpPageRenderer,
        LinkParserService,
        { provide: HttpFetchService, useValue: { fetch } },
      ],
    }).compile();

    renderer = module.get<HttpPageRenderer>(HttpPageRenderer);
  });

  it('should return the document with links resolved against the final url', async () => {
    fetch.mockResolvedValue(response({}));

    const page = await renderer.render('https://example.com', renderOptions);

    expect(fetch).toHaveBeenCalledWith('https://example.com', {
      timeoutMs: 5000,
    });
    expect(page.success).toBe(true);
    expect(page.finalUrl).toBe('https://example.com/start');
    expect(page.links.internal).toEqual([
      { href: 'https://example.com/next', text: 'Next' },
    ]);
    expect(page.images).toEqual([
      { src: 'https://example.com/logo.png', alt: 'Logo' },
    ]);
  });

  it('should fail on error statuses', async () => {
    fetch.mockResolvedValue(response({ statusCode: 503, body: 'busy' }));

    const page = await renderer.render('https://example.com', renderOptions);

    expect(page.success).toBe(false);
    expect(page.statusCode).toBe(503);
    expect(page.html).toBe('');
    expect(page.errorMessage).toBe('HTTP 503 for https://example.com');
  });

  it('should fail on non-HTML documents', async () => {
    fetch.mockResolvedValue(response({ contentType: 'application/pdf' }));

    const page = await renderer.render('https://example.com/a.pdf', renderOptions);

    expect(page.success).toBe(false);
    expect(page.errorMessage).toBe(
      'Unsupported content type "application/pdf" for https://example.com/a.pdf',
    );
  });
});
