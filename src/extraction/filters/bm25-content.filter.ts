import { ContentBlock, ContentFilter } from './content-blocks';
import { tokenize } from '../utils/text';

export interface Bm25Options {
  query: string;
  threshold: number;
  k1?: number;
  b?: number;
}

/** Keeps the blocks whose BM25 relevance to the query reaches the threshold. */
export class Bm25ContentFilter implements ContentFilter {
  private readonly queryTerms: string[];
  private readonly k1: number;
  private readonly b: number;

  constructor(private readonly options: Bm25Options) {
    this.queryTerms = Array.from(new Set(tokenize(options.query)));
    this.k1 = options.k1 ?? 1.2;
    this.b = options.b ?? 0.75;
  }

  get hasQueryTerms(): boolean {
    return this.queryTerms.length > 0;
  }

  selectBlocks(blocks: ContentBlock[]): Set<number> {
    const scores = this.scoreBlocks(blocks);
    const kept = new Set<number>();
    blocks.forEach((block, i) => {
      if (scores[i] >= this.options.threshold) {
        kept.add(block.index);
      }
    });
    return kept;
  }

  scoreBlocks(blocks: ContentBlock[]): number[] {
    const documents = blocks.map((block) => tokenize(block.text));
    const total = documents.length;
    if (total === 0) {
      return [];
    }
    const avgLength =
      documents.reduce((sum, doc) => sum + doc.length, 0) / total || 1;

    const idf = new Map<string, number>();
    for (const term of this.queryTerms) {
      const df = documents.filter((doc) => doc.includes(term)).length;
      idf.set(term, Math.log((total - df + 0.5) / (df + 0.5) + 1));
    }

    return documents.map((doc) => {
      const frequencies = new Map<string, number>();
      for (const token of doc) {
        frequencies.set(token, (frequencies.get(token) ?? 0) + 1);
      }
      let score = 0;
      for (const term of this.queryTerms) {
        const tf = frequencies.get(term) ?? 0;
        if (tf === 0) continue;
        const norm = this.k1 * (1 - this.b + (this.b * doc.length) / avgLength);
        score += (idf.get(term) ?? 0) * ((tf * (this.k1 + 1)) / (tf + norm));
      }
      return score;
    });
  }
}
