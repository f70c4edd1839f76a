import assert from 'node:assert/strict';
import { createHash } from 'node:crypto';
import test from 'node:test';
import { Timestamp } from 'firebase-admin/firestore';
import { makeEventInput } from '../testing/eventFixtures';
import { MemoryEventStore } from '../testing/memoryStores';
import { applyEventFilter, buildEventKey, fromEventDocument, matchesEventFilter } from './eventStore';

const clock = () => new Date('2026-03-01T00:00:00Z');

test('buildEventKey hashes the source id under the source kind', () => {
  const digest = createHash('sha1').update('row-42').digest('hex');
  assert.equal(buildEventKey('api', 'row-42'), `api__${digest}`);
});

test('re-ingesting the same source record updates it in place', async () => {
  const store = new MemoryEventStore(clock);
  const first = await store.upsertEvent(makeEventInput({ sourceId: 'abc', title: 'Old title', priceMin: 10, priceMax: 20 }));
  const second = await store.upsertEvent(makeEventInput({ sourceId: 'abc', title: 'New title' }));

  assert.equal(second.id, first.id);
  assert.equal(second.title, 'New title');
  assert.equal(second.priceMin, 10);
  assert.equal(second.priceMax, 20);
  assert.equal(store.all().length, 1);
});

test('the same source id from another source is a different event', async () => {
  const store = new MemoryEventStore(clock);
  const scraped = await store.upsertEvent(makeEventInput({ sourceId: 'abc' }));
  const api = await store.upsertEvent(makeEventInput({ sourceId: 'abc', source: 'api' }));
  assert.notEqual(scraped.id, api.id);
});

test('a null incoming date keeps the stored one', async () => {
  const store = new MemoryEventStore(clock);
  await store.upsertEvent(makeEventInput({ sourceId: 'abc', dateStart: '2026-05-01T00:00:00.000Z' }));
  const updated = await store.upsertEvent(makeEventInput({ sourceId: 'abc', dateStart: null, priceMin: 5, priceMax: null }));
  assert.equal(updated.dateStart, '2026-05-01T00:00:00.000Z');
  assert.equal(updated.priceMin, 5);
  assert.equal(updated.priceMax, null);
});

test('matchesEventFilter compares dates on the day prefix', async () => {
  const store = new MemoryEventStore(clock);
  const event = await store.upsertEvent(makeEventInput({ dateStart: '2026-05-31T22:00:00.000Z' }));
  assert.equal(matchesEventFilter(event, { dateStart: '2026-05-01', dateEnd: '2026-05-31' }), true);
  assert.equal(matchesEventFilter(event, { dateEnd: '2026-05-30' }), false);
  assert.equal(matchesEventFilter({ ...event, dateStart: null }, { dateStart: '2026-05-01' }), false);
});

test('matchesEventFilter lets unknown prices through the price ceiling', async () => {
  const store = new MemoryEventStore(clock);
  const unpriced = await store.upsertEvent(makeEventInput({ sourceId: 'a' }));
  const pricey = await store.upsertEvent(makeEventInput({ sourceId: 'b', priceMin: 40, priceMax: 90 }));
  assert.equal(matchesEventFilter(unpriced, { priceMax: 50 }), true);
  assert.equal(matchesEventFilter(pricey, { priceMax: 50 }), false);
});

test('matchesEventFilter intersects tags and searches text', async () => {
  const store = new MemoryEventStore(clock);
  const event = await store.upsertEvent(
    makeEventInput({ title: 'Jazz on the Lawn', location: 'Bryant Park', tags: ['outdoor'] }),
  );
  assert.equal(matchesEventFilter(event, { tags: ['family', 'outdoor'] }), true);
  assert.equal(matchesEventFilter(event, { tags: ['nightlife'] }), false);
  assert.equal(matchesEventFilter(event, { query: 'bryant' }), true);
  assert.equal(matchesEventFilter(event, { query: 'opera' }), false);
});

test('applyEventFilter orders by date with undated events last', async () => {
  const store = new MemoryEventStore(clock);
  await store.upsertEvent(makeEventInput({ sourceId: 'undated', dateStart: null }));
  await store.upsertEvent(makeEventInput({ sourceId: 'late', dateStart: '2026-06-01T00:00:00.000Z' }));
  await store.upsertEvent(makeEventInput({ sourceId: 'early', dateStart: '2026-04-01T00:00:00.000Z' }));

  assert.deepEqual(applyEventFilter(store.all()).map(event => event.sourceId), ['early', 'late', 'undated']);
  assert.deepEqual(applyEventFilter(store.all(), { limit: 1 }).map(event => event.sourceId), ['early']);
});

test('fromEventDocument reads stored documents', () => {
  const record = fromEventDocument({
    id: 3,
    source: 'api',
    sourceId: 'row-3',
    title: 'Stored',
    priceMin: 0,
    tags: ['artsy', 5],
    raw: { kind: 'api', title: 'Stored', unknown: true },
    createdAt: Timestamp.fromDate(new Date('2026-01-01T00:00:00Z')),
    updatedAt: '2026-01-02T00:00:00.000Z',
  });

  assert.deepEqual(record, {
    id: 3,
    title: 'Stored',
    description: '',
    dateStart: null,
    dateEnd: null,
    location: '',
    priceMin: 0,
    priceMax: null,
    url: '',
    source: 'api',
    sourceId: 'row-3',
    raw: { kind: 'api', title: 'Stored' },
    tags: ['artsy'],
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-02T00:00:00.000Z',
  });
  assert.equal(fromEventDocument({ id: 4, source: 'web' }), null);
});
