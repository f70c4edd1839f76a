import assert from 'node:assert/strict';
import test from 'node:test';
import type { FetchFn } from '../connectors/types';
import { isRecord } from '../models/event';
import { OpenAIEmbeddingProvider } from './embeddings';

function readInputCount(body: unknown): number {
  if (typeof body !== 'string') {
    return 0;
  }
  const payload: unknown = JSON.parse(body);
  return isRecord(payload) && Array.isArray(payload.input) ? payload.input.length : 0;
}

test('embedMany sends batches of one hundred', async () => {
  const batchSizes: number[] = [];
  const fetchImpl: FetchFn = async (_input, init) => {
    const count = readInputCount(init?.body);
    batchSizes.push(count);
    const data = Array.from({ length: count }, (_, index) => ({ embedding: [index, 1] }));
    return new Response(JSON.stringify({ data }), { status: 200 });
  };
  const provider = new OpenAIEmbeddingProvider({ apiKey: 'test-secret', fetchImpl });

  const vectors = await provider.embedMany(Array.from({ length: 150 }, (_, index) => `text ${index}`));

  assert.deepEqual(batchSizes, [100, 50]);
  assert.equal(vectors.length, 150);
  assert.deepEqual(vectors[100], [0, 1]);
});

test('embedMany rejects a response with the wrong number of vectors', async () => {
  const provider = new OpenAIEmbeddingProvider({
    apiKey: 'test-secret',
    fetchImpl: async () => new Response(JSON.stringify({ data: [] }), { status: 200 }),
  });
  await assert.rejects(provider.embed('hello'), /Expected 1 embeddings, received 0/);
});

test('embedMany rejects vectors with non-numeric components', async () => {
  const provider = new OpenAIEmbeddingProvider({
    apiKey: 'test-secret',
    fetchImpl: async () => new Response(JSON.stringify({ data: [{ embedding: [0.1, 'x'] }] }), { status: 200 }),
  });
  await assert.rejects(provider.embed('hello'), /Malformed embeddings response/);
});

test('embedMany surfaces HTTP failures', async () => {
  const provider = new OpenAIEmbeddingProvider({
    apiKey: 'test-secret',
    fetchImpl: async () => new Response('quota exceeded', { status: 429 }),
  });
  await assert.rejects(provider.embedMany(['hello']), /Failed to fetch embeddings: 429 quota exceeded/);
});

test('the provider requires an API key', () => {
  assert.throws(() => new OpenAIEmbeddingProvider({ apiKey: '' }), /OPENAI_API_KEY is not set/);
});
