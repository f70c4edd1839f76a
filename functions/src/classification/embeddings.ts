import type { FetchFn } from '../connectors/types';
import { isRecord } from '../models/event';

export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';
export const EMBEDDING_BATCH_SIZE = 100;

export interface EmbeddingProvider {
  embed(text: string): Promise<number[]>;
  embedMany(texts: string[]): Promise<number[][]>;
}

export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly fetchImpl: FetchFn;

  constructor(options: { apiKey: string; model?: string; fetchImpl?: FetchFn }) {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY is not set');
    }
    this.apiKey = options.apiKey;
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    if (!vector) {
      throw new Error('Embedding response was empty');
    }
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let index = 0; index < texts.length; index += EMBEDDING_BATCH_SIZE) {
      const batch = texts.slice(index, index + EMBEDDING_BATCH_SIZE);
      vectors.push(...(await this.requestBatch(batch)));
    }
    return vectors;
  }

  private async requestBatch(texts: string[]): Promise<number[][]> {
    const response = await this.fetchImpl('https://api.openai.com/v1/embeddings', {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ input: texts, model: this.model }),
    });

    if (!response.ok) {
      const errorBody = await response.text();
      throw new Error(`Failed to fetch embeddings: ${response.status} ${errorBody}`);
    }

    const vectors = readEmbeddingData(await response.json());
    if (vectors.length !== texts.length) {
      throw new Error(`Expected ${texts.length} embeddings, received ${vectors.length}`);
    }
    return vectors;
  }
}

function readEmbeddingData(payload: unknown): number[][] {
  if (!isRecord(payload) || !Array.isArray(payload.data)) {
    throw new Error('Malformed embeddings response');
  }
  return payload.data.map((item: unknown) => {
    if (!isRecord(item) || !Array.isArray(item.embedding)) {
      throw new Error('Malformed embeddings response');
    }
    const vector: unknown[] = item.embedding;
    if (!vector.every((value): value is number => typeof value === 'number' && Number.isFinite(value))) {
      throw new Error('Malformed embeddings response');
    }
    return vector;
  });
}
