import assert from 'node:assert/strict';
import test from 'node:test';
import type { EmbeddingProvider } from '../classification/embeddings';
import { makeEventInput } from '../testing/eventFixtures';
import { MemoryEventStore, MemoryVectorIndex } from '../testing/memoryStores';
import { searchEvents } from './eventSearch';

const KEYWORDS = ['jazz', 'museum'];

class KeywordEmbeddings implements EmbeddingProvider {
  async embed(text: string): Promise<number[]> {
    const lower = text.toLowerCase();
    return KEYWORDS.map(keyword => (lower.includes(keyword) ? 1 : 0));
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    return Promise.all(texts.map(text => this.embed(text)));
  }
}

class FailingEmbeddings implements EmbeddingProvider {
  async embed(): Promise<number[]> {
    throw new Error('embedding service unavailable');
  }

  async embedMany(): Promise<number[][]> {
    throw new Error('embedding service unavailable');
  }
}

async function seed() {
  const events = new MemoryEventStore(() => new Date('2026-04-01T00:00:00Z'));
  const vectorIndex = new MemoryVectorIndex();
  const embeddings = new KeywordEmbeddings();
  const inputs = [
    makeEventInput({ title: 'Jazz Night', dateStart: '2026-05-01T20:00:00.000Z' }),
    makeEventInput({ title: 'Museum Late', dateStart: '2026-05-02T20:00:00.000Z' }),
    makeEventInput({ title: 'Jazz Brunch', dateStart: '2026-05-03T11:00:00.000Z', tags: ['food'] }),
  ];
  for (const input of inputs) {
    const record = await events.upsertEvent(input);
    await vectorIndex.upsert([{
      eventId: record.id,
      vector: await embeddings.embed(record.title),
      metadata: { dateStart: record.dateStart, priceMax: record.priceMax, source: record.source },
    }]);
  }
  return { events, vectorIndex, embeddings };
}

test('searchEvents ranks by vector similarity', async () => {
  const deps = await seed();
  const results = await searchEvents(deps, { query: 'jazz' });
  assert.deepEqual(results.map(event => event.title), ['Jazz Night', 'Jazz Brunch', 'Museum Late']);
});

test('searchEvents applies metadata filters and tags on the vector path', async () => {
  const deps = await seed();
  const byDate = await searchEvents(deps, { query: 'jazz', dateEnd: '2026-05-02' });
  assert.deepEqual(byDate.map(event => event.title), ['Jazz Night', 'Museum Late']);

  const byTag = await searchEvents(deps, { query: 'jazz', tags: ['food'] });
  assert.deepEqual(byTag.map(event => event.title), ['Jazz Brunch']);
});

test('searchEvents falls back to the filtered listing when embedding fails', async t => {
  const warn = t.mock.method(console, 'warn', () => undefined);
  const { events, vectorIndex } = await seed();
  const results = await searchEvents(
    { events, vectorIndex, embeddings: new FailingEmbeddings() },
    { query: 'jazz' },
  );
  assert.deepEqual(results.map(event => event.title), ['Jazz Night', 'Jazz Brunch']);
  assert.equal(warn.mock.callCount(), 1);
});

test('searchEvents without embeddings lists events by date', async () => {
  const { events } = await seed();
  const results = await searchEvents({ events }, { query: 'jazz', limit: 1 });
  assert.deepEqual(results.map(event => event.title), ['Jazz Night']);

  const all = await searchEvents({ events }, {});
  assert.deepEqual(all.map(event => event.id), [1, 2, 3]);
});
