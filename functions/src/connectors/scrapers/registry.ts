import { CardScrapeStrategy } from './cardStrategy';
import { HeadingSegmentStrategy } from './headingSegmentStrategy';
import type { ScrapeStrategy } from './types';

/**
 * Picks the extraction strategy for a source by name; unknown sources get the fallback.
 */
export class ScrapeStrategyRegistry {
  private readonly strategies = new Map<string, ScrapeStrategy>();
  private readonly fallback: ScrapeStrategy;

  constructor(fallback: ScrapeStrategy) {
    this.fallback = fallback;
  }

  register(sourceName: string, strategy: ScrapeStrategy): this {
    this.strategies.set(sourceName, strategy);
    return this;
  }

  resolve(sourceName: string): ScrapeStrategy {
    return this.strategies.get(sourceName) ?? this.fallback;
  }
}

export function createDefaultStrategyRegistry(): ScrapeStrategyRegistry {
  return new ScrapeStrategyRegistry(new CardScrapeStrategy())
    .register('anisah_immersive', new HeadingSegmentStrategy());
}
