import { FieldValue, type DocumentData, type Firestore } from 'firebase-admin/firestore';
import { isEventSourceKind, type EventSourceKind } from '../models/event';

export const EVENT_EMBEDDINGS_COLLECTION = 'eventEmbeddings';
const MAX_NEAREST_NEIGHBORS = 1000;
const OVERFETCH_FACTOR = 4;

export interface VectorFilter {
  dateStart?: string | null;
  dateEnd?: string | null;
  priceMax?: number | null;
  source?: EventSourceKind | null;
}

export interface VectorMetadata {
  dateStart: string | null;
  priceMax: number | null;
  source: EventSourceKind;
}

export interface VectorEntry {
  eventId: number;
  vector: number[];
  metadata: VectorMetadata;
}

export interface VectorQuery {
  limit: number;
  filter?: VectorFilter;
}

export interface VectorIndex {
  upsert(entries: VectorEntry[]): Promise<void>;
  /** Event ids, nearest first. */
  query(vector: number[], options: VectorQuery): Promise<number[]>;
  count(): Promise<number>;
}

export function vectorDocumentId(eventId: number): string {
  return `event_${eventId}`;
}

export function parseVectorDocumentId(documentId: string): number | null {
  const match = /^event_(\d+)$/.exec(documentId);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function matchesVectorFilter(metadata: VectorMetadata, filter: VectorFilter = {}): boolean {
  if (filter.source && metadata.source !== filter.source) {
    return false;
  }
  if (filter.dateStart || filter.dateEnd) {
    const day = metadata.dateStart?.slice(0, 10);
    if (!day) {
      return false;
    }
    if (filter.dateStart && day < filter.dateStart.slice(0, 10)) {
      return false;
    }
    if (filter.dateEnd && day > filter.dateEnd.slice(0, 10)) {
      return false;
    }
  }
  if (filter.priceMax !== null && filter.priceMax !== undefined && metadata.priceMax !== null) {
    return metadata.priceMax <= filter.priceMax;
  }
  return true;
}

/**
 * Cosine of the angle between two vectors; 0 when either has no magnitude.
 */
export function cosineScore(left: readonly number[], right: readonly number[]): number {
  if (left.length !== right.length) {
    throw new Error(`Vector length mismatch: ${left.length} vs ${right.length}`);
  }
  const dot = left.reduce((sum, value, index) => sum + value * right[index], 0);
  const magnitude = Math.hypot(...left) * Math.hypot(...right);
  return magnitude === 0 ? 0 : dot / magnitude;
}

/**
 * Vectors live on `eventEmbeddings/event_<id>` and are searched with
 * Firestore's nearest-neighbour query. Metadata filters run on the
 * over-fetched neighbours so no composite vector index is needed.
 */
export class FirestoreVectorIndex implements VectorIndex {
  private readonly db: Firestore;

  constructor(db: Firestore) {
    this.db = db;
  }

  async upsert(entries: VectorEntry[]): Promise<void> {
    if (entries.length === 0) {
      return;
    }
    const batch = this.db.batch();
    for (const entry of entries) {
      const docRef = this.db.collection(EVENT_EMBEDDINGS_COLLECTION).doc(vectorDocumentId(entry.eventId));
      batch.set(docRef, {
        eventId: entry.eventId,
        embedding: FieldValue.vector(entry.vector),
        dateStart: entry.metadata.dateStart,
        priceMax: entry.metadata.priceMax,
        source: entry.metadata.source,
      });
    }
    await batch.commit();
  }

  async query(vector: number[], options: VectorQuery): Promise<number[]> {
    if (options.limit <= 0) {
      return [];
    }
    const snapshot = await this.db
      .collection(EVENT_EMBEDDINGS_COLLECTION)
      .findNearest('embedding', FieldValue.vector(vector), {
        limit: Math.min(options.limit * OVERFETCH_FACTOR, MAX_NEAREST_NEIGHBORS),
        distanceMeasure: 'COSINE',
      })
      .get();

    const ids: number[] = [];
    for (const doc of snapshot.docs) {
      const eventId = parseVectorDocumentId(doc.id);
      const metadata = readMetadata(doc.data());
      if (eventId === null || !metadata || !matchesVectorFilter(metadata, options.filter)) {
        continue;
      }
      ids.push(eventId);
      if (ids.length >= options.limit) {
        break;
      }
    }
    return ids;
  }

  async count(): Promise<number> {
    const snapshot = await this.db.collection(EVENT_EMBEDDINGS_COLLECTION).count().get();
    return snapshot.data().count;
  }
}

function readMetadata(data: DocumentData): VectorMetadata | null {
  if (!isEventSourceKind(data.source)) {
    return null;
  }
  return {
    dateStart: typeof data.dateStart === 'string' ? data.dateStart : null,
    priceMax: typeof data.priceMax === 'number' ? data.priceMax : null,
    source: data.source,
  };
}
