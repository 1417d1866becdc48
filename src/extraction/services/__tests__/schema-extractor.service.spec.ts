import { Test, TestingModule } from '@nestjs/testing';
import * as cheerio from 'cheerio';
import { SchemaExtractorService } from '../schema-extractor.service';
import { ExtractionSchema } from '../../types/extraction-schema';

describe('SchemaExtractorService', () => {
  let service: SchemaExtractorService;

  const html = `
    <div class="post">
      <h2>  Title
        one </h2>
      <a class="more" href="/one">more</a>
      <ul class="tags"><li>x</li><li>y</li></ul>
    </div>
    <div class="post"><h2>Title two</h2></div>
  `;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [SchemaExtractorService],
    }).compile();

    service = module.get<SchemaExtractorService>(SchemaExtractorService);
  });

  it('should yield an empty item per base element when no fields are given', () => {
    const schema: ExtractionSchema = {
      name: 'bare',
      baseSelector: 'div.post',
      fields: [],
    };

    expect(service.extract(cheerio.load(html), schema)).toEqual([{}, {}]);
  });

  it('should produce one item per base element', () => {
    const schema: ExtractionSchema = {
      name: 'posts',
      baseSelector: 'div.post',
      fields: [
        { name: 'title', selector: 'h2', type: 'text' },
        {
          name: 'link',
          selector: 'a.more',
          type: 'attribute',
          attribute: 'href',
          default: '#',
        },
        {
          name: 'tags',
          selector: 'ul.tags li',
          type: 'list',
          fields: [{ name: 'tag', type: 'text' }],
        },
      ],
    };

    expect(service.extract(cheerio.load(html), schema)).toEqual([
      {
        title: 'Title one',
        link: '/one',
        tags: [{ tag: 'x' }, { tag: 'y' }],
      },
      { title: 'Title two', link: '#', tags: [] },
    ]);
  });

  it('should return outer html for html fields', () => {
    const schema: ExtractionSchema = {
      name: 'headings',
      baseSelector: 'div.post:last-child',
      fields: [{ name: 'heading', selector: 'h2', type: 'html' }],
    };

    expect(service.extract(cheerio.load(html), schema)).toEqual([
      { heading: '<h2>Title two</h2>' },
    ]);
  });

  it('should fall back to defaults for unmatched fields', () => {
    const schema: ExtractionSchema = {
      name: 'dates',
      baseSelector: 'div.post',
      fields: [
        { name: 'date', selector: 'time', type: 'text', default: 'unknown' },
        { name: 'body', selector: '.missing', type: 'html' },
      ],
    };

    expect(service.extract(cheerio.load(html), schema)).toEqual([
      { date: 'unknown', body: '' },
      { date: 'unknown', body: '' },
    ]);
  });

  it('should treat invalid selectors as matching nothing', () => {
    const $ = cheerio.load(html);

    expect(
      service.extract($, {
        name: 'broken',
        baseSelector: '[[',
        fields: [{ name: 'title', selector: 'h2', type: 'text' }],
      }),
    ).toEqual([]);
    expect(
      service.extract($, {
        name: 'broken-field',
        baseSelector: 'div.post',
        fields: [{ name: 'title', selector: 'h2[', type: 'text', default: '-' }],
      }),
    ).toEqual([{ title: '-' }, { title: '-' }]);
  });
});
