import * as cheerio from 'cheerio';
import { collectBlocks, ContentBlock } from '../content-blocks';
import { PruningContentFilter } from '../pruning-content.filter';

function blocksOf(html: string): ContentBlock[] {
  const $ = cheerio.load(html);
  const body = $('body').get(0);
  if (!body) {
    throw new Error('fixture has no body');
  }
  return collectBlocks($, body);
}

describe('PruningContentFilter', () => {
  it('should collect outermost blocks in document order', () => {
    const blocks = blocksOf(
      '<div><h2>Intro</h2><blockquote><p>Quoted</p></blockquote></div><p>End</p>',
    );

    expect(blocks.map((block) => [block.index, block.tag, block.text])).toEqual([
      [0, 'h2', 'Intro'],
      [1, 'blockquote', 'Quoted'],
      [2, 'p', 'End'],
    ]);
  });

  it('should score a plain paragraph from its composite metrics', () => {
    const [block] = blocksOf('<p>Hello world</p>');
    const filter = new PruningContentFilter({
      threshold: 0.5,
      minWordThreshold: 0,
    });

    // density 1, no links, p weight 1, neutral class, ln(12) length
    expect(filter.score(block)).toBeCloseTo(
      0.4 + 0.2 + 0.2 + 0.1 + 0.1 * Math.log(12),
    );
    expect(filter.threshold(block)).toBeCloseTo(0.45);
  });

  it('should relax the threshold for weighted headings', () => {
    const [block] = blocksOf('<h1>Title</h1>');
    const filter = new PruningContentFilter({
      threshold: 1,
      minWordThreshold: 0,
    });

    expect(filter.threshold(block)).toBeCloseTo(0.72);
  });

  it('should drop link-heavy navigation blocks and keep prose', () => {
    const blocks = blocksOf(`
      <nav class="menu"><ul><li><a href="/">Home</a></li></ul></nav>
      <p>Readers keep coming back for the long form articles.</p>
    `);
    const filter = new PruningContentFilter({
      threshold: 0.48,
      minWordThreshold: 0,
    });

    expect(filter.threshold(blocks[0])).toBeCloseTo(0.576);
    expect(filter.score(blocks[0])).toBeLessThan(0.576);
    expect(filter.selectBlocks(blocks)).toEqual(new Set([1]));
  });

  it('should always drop empty blocks', () => {
    const blocks = blocksOf('<p>   </p><p>Text</p>');
    const filter = new PruningContentFilter({
      threshold: 0,
      minWordThreshold: 0,
    });

    expect(filter.selectBlocks(blocks)).toEqual(new Set([1]));
  });

  it('should drop blocks under the minimum word count', () => {
    const blocks = blocksOf(
      '<p>Hello world</p><p>Three words here</p>',
    );
    const filter = new PruningContentFilter({
      threshold: 0,
      minWordThreshold: 3,
    });

    expect(filter.selectBlocks(blocks)).toEqual(new Set([1]));
  });
});
