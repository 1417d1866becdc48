import { ContentBlock, ContentFilter } from './content-blocks';

const TAG_WEIGHTS: Record<string, number> = {
  p: 1.0,
  h1: 1.2,
  h2: 1.1,
  h3: 1.0,
  h4: 0.9,
  h5: 0.8,
  h6: 0.7,
  li: 0.5,
  pre: 1.0,
  blockquote: 1.0,
  table: 0.8,
  dt: 0.6,
  dd: 0.6,
  figcaption: 0.6,
};

const METRIC_WEIGHTS = {
  textDensity: 0.4,
  linkDensity: 0.2,
  tagWeight: 0.2,
  classId: 0.1,
  textLength: 0.1,
};

const BOILERPLATE_PATTERN =
  /\b(nav|navbar|menu|footer|header|sidebar|ads?|advert\w*|banner|comments?|promo|social|share|cookie\w*|breadcrumbs?)\b/i;

export interface PruningOptions {
  threshold: number;
  /** Blocks with fewer words are dropped outright; 0 disables the check. */
  minWordThreshold: number;
}

/**
 * Drops low-value blocks. Each block gets a composite score from its text
 * density, link density, tag, class/id hints and length, compared with a
 * threshold that is relaxed for important tags and text-heavy blocks and
 * tightened for link-heavy ones.
 */
export class PruningContentFilter implements ContentFilter {
  constructor(private readonly options: PruningOptions) {}

  selectBlocks(blocks: ContentBlock[]): Set<number> {
    const kept = new Set<number>();
    for (const block of blocks) {
      if (this.shouldKeep(block)) {
        kept.add(block.index);
      }
    }
    return kept;
  }

  score(block: ContentBlock): number {
    const textDensity =
      block.htmlLength > 0 ? Math.min(block.textLength / block.htmlLength, 1) : 0;
    const linkDensity =
      block.textLength > 0 ? 1 - block.linkTextLength / block.textLength : 0;
    const tagWeight = TAG_WEIGHTS[block.tag] ?? 0.5;
    const classId = BOILERPLATE_PATTERN.test(block.classIdSignature) ? 0 : 1;
    const textLength = Math.log(block.textLength + 1);

    return (
      METRIC_WEIGHTS.textDensity * textDensity +
      METRIC_WEIGHTS.linkDensity * linkDensity +
      METRIC_WEIGHTS.tagWeight * tagWeight +
      METRIC_WEIGHTS.classId * classId +
      METRIC_WEIGHTS.textLength * textLength
    );
  }

  threshold(block: ContentBlock): number {
    let threshold = this.options.threshold;
    const tagWeight = TAG_WEIGHTS[block.tag] ?? 0.5;
    const textRatio = block.htmlLength > 0 ? block.textLength / block.htmlLength : 0;
    const linkRatio =
      block.textLength > 0 ? block.linkTextLength / block.textLength : 0;

    if (tagWeight > 1) threshold *= 0.8;
    if (textRatio > 0.4) threshold *= 0.9;
    if (linkRatio > 0.6) threshold *= 1.2;
    return threshold;
  }

  private shouldKeep(block: ContentBlock): boolean {
    if (block.textLength === 0) {
      return false;
    }
    if (
      this.options.minWordThreshold > 0 &&
      block.wordCount < this.options.minWordThreshold
    ) {
      return false;
    }
    return this.score(block) >= this.threshold(block);
  }
}
