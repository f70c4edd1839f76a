import { stripHtml } from '../utils/html';
import type { EventInput, OpenDataRawEvent } from '../models/event';
import { parseIsoDate } from './dateHeuristics';
import { parsePrice } from './priceHeuristics';
import { extractTags } from './tagExtraction';

export const UNTITLED_EVENT = 'Untitled Event';

export function normalizeOpenDataEvent(raw: OpenDataRawEvent): EventInput {
  const title = firstNonEmpty(raw.eventName, raw.title) || UNTITLED_EVENT;
  const description = stripHtml(firstNonEmpty(raw.description, raw.shortDescription));
  const price = raw.free ? { min: 0, max: 0 } : parsePrice(raw.price);

  return {
    title,
    description,
    dateStart: parseIsoDate(raw.startDateTime),
    dateEnd: parseIsoDate(raw.endDateTime),
    location: firstNonEmpty(raw.location, raw.eventLocation),
    priceMin: price.min,
    priceMax: price.max,
    url: firstNonEmpty(raw.eventUrl, raw.url),
    source: 'api',
    sourceId: firstNonEmpty(raw.eventId, raw.rowId) || title,
    raw,
    tags: extractTags(`${title} ${description}`),
  };
}

export function normalizeOpenDataEvents(rawEvents: OpenDataRawEvent[]): EventInput[] {
  return rawEvents.map(normalizeOpenDataEvent);
}

export function firstNonEmpty(...values: Array<string | null | undefined>): string {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return '';
}
