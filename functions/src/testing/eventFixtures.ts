import type { EventInput } from '../models/event';

export function makeEventInput(overrides: Partial<EventInput> = {}): EventInput {
  const title = overrides.title ?? 'Sample Event';
  return {
    title,
    description: '',
    dateStart: '2026-05-01T00:00:00.000Z',
    dateEnd: null,
    location: '',
    priceMin: null,
    priceMax: null,
    url: 'https://example.com/event',
    source: 'scraped',
    sourceId: title,
    raw: null,
    tags: [],
    ...overrides,
  };
}
