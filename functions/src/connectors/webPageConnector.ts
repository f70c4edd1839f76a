import type { ScrapedRawEvent } from '../models/event';
import { DEFAULT_TIMEOUT_MS, fetchHtml } from './http';
import { CardScrapeStrategy } from './scrapers/cardStrategy';
import type { ScrapeStrategy } from './scrapers/types';
import type { SourceTarget } from './sourceConfig';
import type { FetchFn, SourceConnector } from './types';

export interface WebPageConnectorConfig {
  target: SourceTarget;
  strategy?: ScrapeStrategy;
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  now?: () => Date;
}

export class WebPageConnector implements SourceConnector<ScrapedRawEvent> {
  private readonly target: SourceTarget;
  private readonly strategy: ScrapeStrategy;
  private readonly timeoutMs: number;
  private readonly fetchImpl?: FetchFn;
  private readonly now: () => Date;

  constructor(config: WebPageConnectorConfig) {
    this.target = config.target;
    this.strategy = config.strategy ?? new CardScrapeStrategy();
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl;
    this.now = config.now ?? (() => new Date());
  }

  get sourceName(): string {
    return this.target.name;
  }

  get sourceUrl(): string {
    return this.target.url;
  }

  async fetchRawEvents(): Promise<ScrapedRawEvent[]> {
    const html = await fetchHtml(this.target.url, {
      timeoutMs: this.timeoutMs,
      fetchImpl: this.fetchImpl,
    });

    const events = this.strategy.extract({
      html,
      pageUrl: this.target.url,
      sourceName: this.target.name,
      now: this.now(),
    });

    console.log(
      `[SCRAPER] source=${this.target.name} strategy=${this.strategy.name} extracted=${events.length}`
    );
    return events;
  }
}
