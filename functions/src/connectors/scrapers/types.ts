import type { ScrapedRawEvent } from '../../models/event';

export interface ScrapedPage {
  html: string;
  pageUrl: string;
  sourceName: string;
  now: Date;
}

/**
 * Site-specific extraction. A source gets its own strategy instead of
 * branching inside a shared parser.
 */
export interface ScrapeStrategy {
  readonly name: string;
  extract(page: ScrapedPage): ScrapedRawEvent[];
}
