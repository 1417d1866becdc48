export type ContentFilterConfig =
  | { type: 'pruning'; threshold: number; minWordThreshold: number }
  | { type: 'bm25'; query?: string; threshold: number }
  | { type: 'none' };
