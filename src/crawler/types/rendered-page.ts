export enum WaitCondition {
  DOM_CONTENT_LOADED = 'domcontentloaded',
  LOAD = 'load',
  NETWORK_IDLE_0 = 'networkidle0',
  NETWORK_IDLE_2 = 'networkidle2',
}

export interface LinkRef {
  href: string;
  text: string;
}

export interface PageLinks {
  internal: LinkRef[];
  external: LinkRef[];
}

export interface PageImage {
  src: string;
  alt: string;
}

export interface RenderOptions {
  waitUntil: WaitCondition;
  timeoutMs: number;
  /** Isolates cookie and DOM state between concurrently rendered pages. */
  sessionId: string;
}

export interface RenderedPage {
  url: string;
  finalUrl: string;
  html: string;
  statusCode: number | null;
  success: boolean;
  errorMessage: string | null;
  links: PageLinks;
  images: PageImage[];
}
