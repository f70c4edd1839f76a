import assert from 'node:assert/strict';
import test from 'node:test';
import type { ScrapedRawEvent } from '../models/event';
import { normalizeOpenDataEvent } from './openDataNormalizer';
import { normalizeScrapedEvent } from './scrapedEventNormalizer';
import { extractTags } from './tagExtraction';

test('normalizeOpenDataEvent maps the open data columns', () => {
  const raw = {
    kind: 'api' as const,
    eventName: '  Jazz in the Park ',
    description: '<p>Live music &amp; picnic</p>',
    startDateTime: '2026-06-01T18:00:00',
    free: true,
    price: '$30',
    eventLocation: 'Central Park',
    url: 'https://example.org/jazz',
    rowId: 'row-1',
  };

  assert.deepEqual(normalizeOpenDataEvent(raw), {
    title: 'Jazz in the Park',
    description: 'Live music & picnic',
    dateStart: '2026-06-01T18:00:00.000Z',
    dateEnd: null,
    location: 'Central Park',
    priceMin: 0,
    priceMax: 0,
    url: 'https://example.org/jazz',
    source: 'api',
    sourceId: 'row-1',
    raw,
    tags: ['outdoor'],
  });
});

test('normalizeOpenDataEvent prefers eventId and falls back to a default title', () => {
  const event = normalizeOpenDataEvent({ kind: 'api', eventId: 'E-9', rowId: 'row-2', price: '$10 - $20' });
  assert.equal(event.title, 'Untitled Event');
  assert.equal(event.sourceId, 'E-9');
  assert.equal(event.priceMin, 10);
  assert.equal(event.priceMax, 20);
  assert.equal(event.description, '');
  assert.equal(event.dateStart, null);
});

test('normalizeOpenDataEvent uses the title as the last source id', () => {
  const event = normalizeOpenDataEvent({ kind: 'api', title: 'Poetry Night' });
  assert.equal(event.sourceId, 'Poetry Night');
});

test('normalizeScrapedEvent keeps the scraped identity and parses the price text', () => {
  const raw: ScrapedRawEvent = {
    kind: 'scraped',
    sourceName: 'secretnyc',
    sourceId: 'secretnyc-0123456789ab',
    title: 'Immersive Garden Show',
    description: 'An interactive garden experience',
    dateStart: '2026-05-02T00:00:00.000Z',
    dateEnd: null,
    dateStatus: 'single',
    priceText: '$25',
    imageUrl: null,
    url: 'https://example.com/show',
    location: '',
    pageUrl: 'https://example.com/',
  };

  const event = normalizeScrapedEvent(raw);
  assert.equal(event.source, 'scraped');
  assert.equal(event.sourceId, 'secretnyc-0123456789ab');
  assert.equal(event.priceMin, 25);
  assert.equal(event.priceMax, 25);
  assert.equal(event.dateStart, '2026-05-02T00:00:00.000Z');
  assert.deepEqual(event.tags, ['immersive', 'outdoor']);
  assert.equal(event.raw, raw);
});

test('extractTags matches keywords by substring and sorts the result', () => {
  assert.deepEqual(extractTags('Rooftop DJ party for kids'), ['artsy', 'family', 'nightlife', 'outdoor']);
  assert.deepEqual(extractTags('Poetry reading'), []);
});
