import type { EmbeddingProvider } from '../classification/embeddings';
import type { EventRecord } from '../models/event';
import { resolveListLimit, type EventRepository } from './eventStore';
import type { VectorFilter, VectorIndex } from './vectorIndex';

export interface EventSearchDependencies {
  events: EventRepository;
  embeddings?: EmbeddingProvider | null;
  vectorIndex?: VectorIndex | null;
}

export interface EventSearchRequest {
  query?: string | null;
  dateStart?: string | null;
  dateEnd?: string | null;
  priceMax?: number | null;
  tags?: string[];
  limit?: number;
}

/**
 * Semantic search when embeddings and an index are available and there is a
 * query; otherwise, or when that path fails, the store's filtered listing.
 */
export async function searchEvents(deps: EventSearchDependencies, request: EventSearchRequest): Promise<EventRecord[]> {
  const query = request.query?.trim() ?? '';
  const limit = resolveListLimit(request.limit);

  if (query && deps.embeddings && deps.vectorIndex) {
    try {
      const vector = await deps.embeddings.embed(query);
      const filter: VectorFilter = {
        dateStart: request.dateStart ?? null,
        dateEnd: request.dateEnd ?? null,
        priceMax: request.priceMax ?? null,
      };
      const ids = await deps.vectorIndex.query(vector, { limit, filter });
      const records = await deps.events.getEventsByIds(ids);
      const byId = new Map(records.map(record => [record.id, record]));
      const ordered = ids.flatMap(id => {
        const record = byId.get(id);
        return record ? [record] : [];
      });
      return filterByTags(ordered, request.tags);
    } catch (error) {
      console.warn('[SEARCH] vector search failed, falling back to filtered listing', error);
    }
  }

  return deps.events.listEvents({
    query: query || null,
    dateStart: request.dateStart ?? null,
    dateEnd: request.dateEnd ?? null,
    priceMax: request.priceMax ?? null,
    tags: request.tags,
    limit,
  });
}

function filterByTags(events: EventRecord[], tags: string[] | undefined): EventRecord[] {
  if (!tags || tags.length === 0) {
    return events;
  }
  // Keeps vector order; applyEventFilter would re-sort by date.
  const wanted = new Set(tags);
  return events.filter(event => event.tags.some(tag => wanted.has(tag)));
}
