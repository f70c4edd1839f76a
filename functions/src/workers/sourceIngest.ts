import type { EmbeddingProvider } from '../classification/embeddings';
import type { EventInput, EventRecord } from '../models/event';
import { parseIsoDate } from '../normalizers/dateHeuristics';
import type { EventRepository } from '../services/eventStore';
import type { VectorEntry, VectorIndex } from '../services/vectorIndex';

export interface UpsertDependencies {
  events: EventRepository;
  embeddings?: EmbeddingProvider | null;
  vectorIndex?: VectorIndex | null;
}

export interface UpsertStats {
  inserted: number;
  skippedInvalidDate: number;
  skippedUpsertError: number;
  records: EventRecord[];
}

/**
 * Writes normalized events one by one. Events without a parseable start are
 * skipped; a failed write is logged and counted, never fatal to the batch.
 */
export async function upsertEvents(
  deps: UpsertDependencies,
  sourceName: string,
  inputs: readonly EventInput[],
): Promise<UpsertStats> {
  const records: EventRecord[] = [];
  let skippedInvalidDate = 0;
  let skippedUpsertError = 0;

  for (const input of inputs) {
    const dateStart = parseIsoDate(input.dateStart);
    if (!dateStart) {
      skippedInvalidDate += 1;
      console.warn(
        `[INGESTION] skip_event reason=invalid_date_start source=${sourceName} title=${JSON.stringify(input.title)} date_start=${JSON.stringify(input.dateStart)}`,
      );
      continue;
    }

    try {
      records.push(await deps.events.upsertEvent({ ...input, dateStart }));
    } catch (error) {
      skippedUpsertError += 1;
      console.error(
        `[INGESTION] skip_event reason=upsert_error source=${sourceName} title=${JSON.stringify(input.title)}`,
        error,
      );
    }
  }

  await embedEvents(deps, records);

  return { inserted: records.length, skippedInvalidDate, skippedUpsertError, records };
}

export function buildEmbeddingDocument(event: Pick<EventRecord, 'title' | 'description' | 'location'>): string {
  return [event.title, event.description, event.location].join(' | ');
}

/**
 * Best effort: runs only when both an embedding provider and an index are
 * configured, and a failure is only logged.
 */
export async function embedEvents(deps: UpsertDependencies, records: readonly EventRecord[]): Promise<void> {
  const { embeddings, vectorIndex } = deps;
  if (!embeddings || !vectorIndex || records.length === 0) {
    return;
  }

  try {
    const vectors = await embeddings.embedMany(records.map(buildEmbeddingDocument));
    const entries: VectorEntry[] = records.map((record, index) => ({
      eventId: record.id,
      vector: vectors[index] ?? [],
      metadata: { dateStart: record.dateStart, priceMax: record.priceMax, source: record.source },
    }));
    await vectorIndex.upsert(entries.filter(entry => entry.vector.length > 0));
  } catch (error) {
    console.warn(`[INGESTION] embedding_failed events=${records.length}`, error);
  }
}
