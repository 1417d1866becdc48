import { RenderOptions, RenderedPage } from '../types/rendered-page';

/**
 * Rendering capability consumed by the crawler. Implementations are shared
 * across concurrent crawls and must keep sessions isolated by `sessionId`.
 */
export abstract class PageRenderer {
  abstract render(url: string, options: RenderOptions): Promise<RenderedPage>;
}
