import type { EventInput, ScrapedRawEvent } from '../models/event';
import { parseIsoDate } from './dateHeuristics';
import { firstNonEmpty, UNTITLED_EVENT } from './openDataNormalizer';
import { parsePrice } from './priceHeuristics';
import { extractTags } from './tagExtraction';

export function normalizeScrapedEvent(raw: ScrapedRawEvent): EventInput {
  const title = firstNonEmpty(raw.title) || UNTITLED_EVENT;
  const description = firstNonEmpty(raw.description);
  const price = parsePrice(raw.priceText);

  return {
    title,
    description,
    dateStart: parseIsoDate(raw.dateStart),
    dateEnd: parseIsoDate(raw.dateEnd),
    location: firstNonEmpty(raw.location),
    priceMin: price.min,
    priceMax: price.max,
    url: firstNonEmpty(raw.url),
    source: 'scraped',
    sourceId: firstNonEmpty(raw.sourceId) || title,
    raw,
    tags: extractTags(`${title} ${description}`),
  };
}

export function normalizeScrapedEvents(rawEvents: ScrapedRawEvent[]): EventInput[] {
  return rawEvents.map(normalizeScrapedEvent);
}
